import { Chunk } from "./Chunk";
import { isOpCode, OpCode } from "./OpCode";

export enum InterpretResult {
    Ok = "Ok",
    CompileError = "CompileError",
    RuntimeError = "RuntimeError",
}

export interface VmResult {
    result: InterpretResult;
    value?: number;
    error?: string;
}

export interface VmOptions {
    /** Receives the stack and each instruction before it executes */
    trace?: (line: string) => void;
}

export const STACK_MAX = 256;

/**
 * Stack machine over number values. Not yet fed by the parser: chunks are
 * built by hand.
 */
export class Vm {
    private chunk: Chunk = new Chunk();
    private ip: number = 0;
    private stack: number[] = [];

    constructor(private options: VmOptions = {}) {}

    public interpret(chunk: Chunk): VmResult {
        this.chunk = chunk;
        this.ip = 0;
        this.stack = [];
        return this.run();
    }

    private run(): VmResult {
        while (this.ip < this.chunk.code.length) {
            if (this.options.trace) {
                this.options.trace(
                    `Stack: ${this.stack.map((v) => `[ ${v} ]`).join("")}`,
                );
                this.options.trace(this.chunk.disassembleInstruction(this.ip)[0]);
            }

            const instruction = this.readByte();
            if (!isOpCode(instruction)) {
                return this.fail(`Unknown opcode ${instruction}.`);
            }

            switch (instruction) {
                case OpCode.Return: {
                    const value = this.pop();
                    if (value === undefined) {
                        return this.fail("Stack underflow.");
                    }
                    return { result: InterpretResult.Ok, value };
                }
                case OpCode.Constant: {
                    const value = this.chunk.constants[this.readByte()];
                    if (value === undefined) {
                        return this.fail("Constant index out of range.");
                    }
                    if (!this.push(value)) {
                        return this.fail("Stack overflow.");
                    }
                    break;
                }
                case OpCode.Negate: {
                    const value = this.pop();
                    if (value === undefined) {
                        return this.fail("Stack underflow.");
                    }
                    this.push(-value);
                    break;
                }
                case OpCode.Add:
                case OpCode.Subtract:
                case OpCode.Multiply:
                case OpCode.Divide: {
                    const b = this.pop();
                    const a = this.pop();
                    if (a === undefined || b === undefined) {
                        return this.fail("Stack underflow.");
                    }
                    this.push(binaryOp(instruction, a, b));
                    break;
                }
            }
        }

        return this.fail("Reached end of chunk without a return.");
    }

    private readByte(): number {
        return this.chunk.code[this.ip++];
    }

    private push(value: number): boolean {
        if (this.stack.length >= STACK_MAX) return false;
        this.stack.push(value);
        return true;
    }

    private pop(): number | undefined {
        return this.stack.pop();
    }

    private fail(error: string): VmResult {
        return { result: InterpretResult.RuntimeError, error };
    }
}

function binaryOp(
    op: OpCode.Add | OpCode.Subtract | OpCode.Multiply | OpCode.Divide,
    a: number,
    b: number,
): number {
    switch (op) {
        case OpCode.Add:
            return a + b;
        case OpCode.Subtract:
            return a - b;
        case OpCode.Multiply:
            return a * b;
        case OpCode.Divide:
            return a / b;
    }
}
