import { Statement } from "../parser/statements";

export interface SourceLocation {
    line: number;
    col: number;
    len?: number;
    endLine: number;
    endCol: number;
}

export interface AST {
    statements: Statement[];
}
