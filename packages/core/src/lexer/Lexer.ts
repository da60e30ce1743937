import { Literal, NULL_LITERAL, Token } from "./Token";
import { TokenType } from "./TokenType";
import { ScanError } from "./ScanError";
import { Reporter } from "../utils/Reporter";

const KEYWORDS = new Map<string, TokenType>([
    ["and", TokenType.And],
    ["class", TokenType.Class],
    ["else", TokenType.Else],
    ["false", TokenType.False],
    ["for", TokenType.For],
    ["fun", TokenType.Fun],
    ["if", TokenType.If],
    ["nil", TokenType.Nil],
    ["or", TokenType.Or],
    ["print", TokenType.Print],
    ["return", TokenType.Return],
    ["super", TokenType.Super],
    ["this", TokenType.This],
    ["true", TokenType.True],
    ["var", TokenType.Var],
    ["while", TokenType.While],
]);

const KEYWORD_LITERALS: Partial<Record<TokenType, Literal>> = {
    [TokenType.True]: { kind: "True" },
    [TokenType.False]: { kind: "False" },
    [TokenType.Nil]: NULL_LITERAL,
};

const SINGLE_CHAR_TOKENS = new Map<string, TokenType>([
    ["(", TokenType.LeftParen],
    [")", TokenType.RightParen],
    ["{", TokenType.LeftBrace],
    ["}", TokenType.RightBrace],
    [",", TokenType.Comma],
    [".", TokenType.Dot],
    ["-", TokenType.Minus],
    ["+", TokenType.Plus],
    [";", TokenType.Semicolon],
    ["*", TokenType.Star],
]);

// Operators that become a two-character token when followed by "="
const EQUAL_PAIRS = new Map<string, [TokenType, TokenType]>([
    ["!", [TokenType.Bang, TokenType.BangEqual]],
    ["=", [TokenType.Equal, TokenType.EqualEqual]],
    ["<", [TokenType.Less, TokenType.LessEqual]],
    [">", [TokenType.Greater, TokenType.GreaterEqual]],
]);

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    // Start of the lexeme being scanned
    private start: number = 0;
    private startLine: number = 1;
    private startCol: number = 1;

    private tokens: Token[] = [];
    public readonly errors: ScanError[] = [];

    constructor(
        input: string,
        private reporter?: Reporter,
    ) {
        this.input = input;
    }

    /**
     * Whether any error was recorded while scanning.
     */
    public get hadError(): boolean {
        return this.errors.length > 0;
    }

    public tokenize(): Token[] {
        this.position = 0;
        this.line = 1;
        this.col = 1;
        this.tokens = [];
        this.errors.length = 0;

        while (!this.isAtEnd()) {
            this.markStart();
            this.scanToken();
        }

        this.markStart();
        this.addToken(TokenType.EOF);
        return this.tokens;
    }

    private scanToken(): void {
        const char = this.advance();

        const single = SINGLE_CHAR_TOKENS.get(char);
        if (single) {
            this.addToken(single);
            return;
        }

        const pair = EQUAL_PAIRS.get(char);
        if (pair) {
            this.addToken(this.match("=") ? pair[1] : pair[0]);
            return;
        }

        switch (char) {
            case "/":
                if (this.match("/")) {
                    this.skipLineComment();
                } else if (this.match("*")) {
                    this.skipBlockComment();
                } else {
                    this.addToken(TokenType.Slash);
                }
                return;
            case " ":
            case "\r":
            case "\t":
            case "\n":
                return;
            case '"':
                this.readString();
                return;
        }

        if (this.isDigit(char)) {
            this.readNumber();
            return;
        }

        if (this.isAlpha(char)) {
            this.readIdentifier();
            return;
        }

        this.error(`Unexpected character '${char}'.`);
    }

    private markStart(): void {
        this.start = this.position;
        this.startLine = this.line;
        this.startCol = this.col;
    }

    private addToken(type: TokenType, literal: Literal = NULL_LITERAL): void {
        this.tokens.push({
            type,
            lexeme: this.input.substring(this.start, this.position),
            literal,
            line: this.startLine,
            col: this.startCol,
        });
    }

    private advance(): string {
        const char = this.input[this.position];
        if (char === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
        return char;
    }

    private match(expected: string): boolean {
        if (this.isAtEnd() || this.currentChar() !== expected) return false;
        this.advance();
        return true;
    }

    private isAtEnd(): boolean {
        return this.position >= this.input.length;
    }

    private currentChar(): string {
        if (this.isAtEnd()) return "";
        return this.input[this.position];
    }

    private peekChar(offset = 1): string {
        if (this.position + offset >= this.input.length) return "";
        return this.input[this.position + offset];
    }

    private isAlpha(char: string): boolean {
        return /^[a-zA-Z_]$/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /^[a-zA-Z0-9_]$/.test(char);
    }

    private isDigit(char: string): boolean {
        return /^[0-9]$/.test(char);
    }

    private readNumber(): void {
        while (this.isDigit(this.currentChar())) {
            this.advance();
        }

        // A fractional part needs at least one digit after the dot
        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            this.advance();
            while (this.isDigit(this.currentChar())) {
                this.advance();
            }
        }

        const text = this.input.substring(this.start, this.position);
        this.addToken(TokenType.Number, {
            kind: "Number",
            value: parseFloat(text),
        });
    }

    private readString(): void {
        while (!this.isAtEnd() && this.currentChar() !== '"') {
            this.advance();
        }

        if (this.isAtEnd()) {
            this.error("Unterminated string.");
            return;
        }
        this.advance(); // closing quote

        this.addToken(TokenType.String, {
            kind: "String",
            value: this.input.substring(this.start + 1, this.position - 1),
        });
    }

    private readIdentifier(): void {
        while (this.isAlphaNumeric(this.currentChar())) {
            this.advance();
        }

        const text = this.input.substring(this.start, this.position);
        const keyword = KEYWORDS.get(text);
        if (keyword) {
            this.addToken(keyword, KEYWORD_LITERALS[keyword]);
            return;
        }
        this.addToken(TokenType.Identifier, { kind: "Identifier", name: text });
    }

    private skipLineComment(): void {
        while (!this.isAtEnd() && this.currentChar() !== "\n") {
            this.advance();
        }
    }

    private skipBlockComment(): void {
        while (!this.isAtEnd()) {
            if (this.currentChar() === "*" && this.peekChar() === "/") {
                this.advance();
                this.advance();
                return;
            }
            this.advance();
        }
        this.error("Unterminated block comment.");
    }

    private error(message: string): void {
        const error = new ScanError(
            message,
            { line: this.startLine, col: this.startCol },
            this.input,
        );
        this.errors.push(error);
        this.reporter?.report(error);
    }
}
