import { TokenType } from "./TokenType";

/**
 * Literal payload, as scanned into a token and as carried by a literal node.
 */
export type Literal =
    | { kind: "Null" }
    | { kind: "Identifier"; name: string }
    | { kind: "String"; value: string }
    | { kind: "Number"; value: number }
    | { kind: "True" }
    | { kind: "False" };

export interface Token {
    readonly type: TokenType;
    readonly lexeme: string;
    readonly literal: Literal;
    readonly line: number;
    readonly col: number;
}

export const NULL_LITERAL: Literal = { kind: "Null" };

export function formatLiteral(literal: Literal): string {
    switch (literal.kind) {
        case "Null":
            return "null";
        case "Identifier":
            return literal.name;
        case "String":
            return literal.value;
        case "Number":
            return String(literal.value);
        case "True":
            return "true";
        case "False":
            return "false";
    }
}

/**
 * One-line dump of a token, used by the `--tokens` flag of the CLI.
 */
export function formatToken(token: Token): string {
    return `${token.type} ${token.lexeme} ${formatLiteral(token.literal)} ${token.line}:${token.col}`;
}
