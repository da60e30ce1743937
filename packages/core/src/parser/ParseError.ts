import { TokenType } from "../lexer/TokenType";
import { LumenError, ErrorLocation } from "../utils/Error";

export abstract class ParseError extends LumenError {
    constructor(
        message: string,
        public readonly found: TokenType,
        loc: ErrorLocation,
        source?: string,
        hint?: string,
    ) {
        super(message, loc, source, hint);
        this.name = "ParseError";
    }
}

/**
 * A specific token was required and another one was found.
 */
export class UnexpectedTokenError extends ParseError {
    constructor(
        public readonly expected: TokenType,
        found: TokenType,
        message: string,
        loc: ErrorLocation,
        source?: string,
    ) {
        super(message, found, loc, source);
        this.name = "UnexpectedTokenError";
    }
}

/**
 * No primary expression starts with the token found.
 */
export class ExpectedExpressionError extends ParseError {
    constructor(
        public readonly expected: TokenType[],
        found: TokenType,
        loc: ErrorLocation,
        source?: string,
    ) {
        super(
            `Expected expression, found ${found}.`,
            found,
            loc,
            source,
            `Expected one of: ${expected.join(", ")}`,
        );
        this.name = "ExpectedExpressionError";
    }
}
