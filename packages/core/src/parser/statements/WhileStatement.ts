import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export class WhileStatement implements BaseStatement {
    kind = "WhileStatement" as const;

    constructor(
        public readonly condition: Expression,
        public readonly body: Statement,
        public readonly loc?: SourceLocation,
    ) {}
}
