import { isOpCode, OpCode } from "./OpCode";

export interface SrcLocation {
    line: number;
    col: number;
}

// Constant operands are a single byte
export const MAX_CONSTANTS = 256;

/**
 * A sequence of instructions with its constant pool and the source location
 * of every byte.
 */
export class Chunk {
    public readonly code: number[] = [];
    public readonly constants: number[] = [];
    public readonly locations: SrcLocation[] = [];

    public write(byte: number, loc: SrcLocation): void {
        this.code.push(byte);
        this.locations.push(loc);
    }

    /**
     * Adds a value to the constant pool and returns its index.
     */
    public addConstant(value: number): number {
        if (this.constants.length >= MAX_CONSTANTS) {
            throw new RangeError(
                `Too many constants in one chunk (max ${MAX_CONSTANTS}).`,
            );
        }
        this.constants.push(value);
        return this.constants.length - 1;
    }

    public disassemble(name: string): string[] {
        const lines = [`== ${name} ==`];
        let offset = 0;
        while (offset < this.code.length) {
            const [text, next] = this.disassembleInstruction(offset);
            lines.push(text);
            offset = next;
        }
        return lines;
    }

    /**
     * Renders the instruction at `offset`; returns the text and the offset of
     * the next instruction.
     */
    public disassembleInstruction(offset: number): [string, number] {
        const loc = this.locations[offset];
        const prev = offset > 0 ? this.locations[offset - 1] : undefined;
        const where =
            prev && prev.line === loc.line && prev.col === loc.col
                ? "   |".padEnd(9)
                : `${loc.line}:${loc.col}`.padStart(4).padEnd(9);
        const head = `${String(offset).padStart(4, "0")} ${where}`;

        const byte = this.code[offset];
        if (!isOpCode(byte)) {
            return [`${head}Unknown opcode ${byte}`, offset + 1];
        }

        if (byte === OpCode.Constant) {
            const index = this.code[offset + 1];
            const value = this.constants[index];
            return [
                `${head}${OpCode[byte].padEnd(16)} ${String(index).padStart(4, "0")} '${value}'`,
                offset + 2,
            ];
        }

        return [`${head}${OpCode[byte]}`, offset + 1];
    }
}
