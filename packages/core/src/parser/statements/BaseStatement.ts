import { SourceLocation } from "../../types/ast";

/**
 * Fields every statement node has. `kind` discriminates the `Statement`
 * union; `loc` spans the whole statement when the parser knows it.
 */
export interface BaseStatement {
    readonly kind: string;
    readonly loc?: SourceLocation;
}
