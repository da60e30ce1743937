export enum OpCode {
    Constant,
    Return,
    Negate,
    Add,
    Subtract,
    Multiply,
    Divide,
}

export function isOpCode(byte: number): byte is OpCode {
    return byte in OpCode && typeof OpCode[byte] === "string";
}
