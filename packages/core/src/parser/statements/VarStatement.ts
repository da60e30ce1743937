import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { Token } from "../../lexer/Token";

/**
 * `var name;` or `var name = initializer;`. Without an initializer the
 * binding is declared but uninitialized.
 */
export class VarStatement implements BaseStatement {
    kind = "VarStatement" as const;

    constructor(
        public readonly name: Token,
        public readonly initializer: Expression | undefined,
        public readonly loc?: SourceLocation,
    ) {}
}
