import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";
import { Token } from "../../lexer/Token";

/**
 * `return;` or `return value;`. The keyword token locates errors.
 */
export interface ReturnStatement extends BaseStatement {
    kind: "ReturnStatement";
    keyword: Token;
    value?: Expression;
}
