import { BaseStatement } from "./BaseStatement";
import { SourceLocation } from "../../types/ast";
import { Token } from "../../lexer/Token";
import { Statement } from "./index";

export class FunctionStatement implements BaseStatement {
    kind = "FunctionStatement" as const;

    constructor(
        public readonly name: Token,
        public readonly params: Token[],
        public readonly body: Statement[],
        public readonly loc?: SourceLocation,
    ) {}
}
