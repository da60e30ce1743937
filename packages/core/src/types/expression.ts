import { Literal, Token } from "../lexer/Token";
import { SourceLocation } from "./ast";

export type Expression =
    | LiteralExpression
    | UnaryExpression
    | BinaryExpression
    | LogicalExpression
    | CallExpression
    | GroupingExpression
    | VarReference
    | AssignExpression;

export interface LiteralExpression {
    readonly type: "LiteralExpression";
    readonly value: Literal;
    readonly loc?: SourceLocation;
}

export interface UnaryExpression {
    readonly type: "UnaryExpression";
    readonly operator: Token; // "-" or "!"
    readonly right: Expression;
    readonly loc?: SourceLocation;
}

export interface BinaryExpression {
    readonly type: "BinaryExpression";
    readonly left: Expression;
    readonly operator: Token;
    readonly right: Expression;
    readonly loc?: SourceLocation;
}

/**
 * `and` / `or`. The right operand is only evaluated when the left one does
 * not decide the result.
 */
export interface LogicalExpression {
    readonly type: "LogicalExpression";
    readonly left: Expression;
    readonly operator: Token;
    readonly right: Expression;
    readonly loc?: SourceLocation;
}

export interface CallExpression {
    readonly type: "CallExpression";
    readonly callee: Expression;
    /** Closing parenthesis, the location runtime call errors point at */
    readonly paren: Token;
    readonly arguments: readonly Expression[];
    readonly loc?: SourceLocation;
}

export interface GroupingExpression {
    readonly type: "GroupingExpression";
    readonly expression: Expression;
    readonly loc?: SourceLocation;
}

export interface VarReference {
    readonly type: "VarReference";
    readonly name: Token;
    readonly loc?: SourceLocation;
}

export interface AssignExpression {
    readonly type: "AssignExpression";
    readonly name: Token;
    readonly value: Expression;
    readonly loc?: SourceLocation;
}
