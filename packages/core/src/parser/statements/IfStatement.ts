import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { SourceLocation } from "../../types/ast";
import { Statement } from "./index";

export class IfStatement implements BaseStatement {
    kind = "IfStatement" as const;

    constructor(
        public readonly condition: Expression,
        public readonly thenBranch: Statement,
        public readonly elseBranch: Statement | undefined,
        public readonly loc?: SourceLocation,
    ) {}
}
