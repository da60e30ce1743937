import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST, SourceLocation } from "./types";
import { Expression } from "./expressions";
import {
    Statement,
    BlockStatement,
    ExpressionStatement,
    FunctionStatement,
    IfStatement,
    PrintStatement,
    ReturnStatement,
    VarStatement,
    WhileStatement,
} from "./statements";
import {
    ExpectedExpressionError,
    ParseError,
    UnexpectedTokenError,
} from "./ParseError";
import { Reporter } from "../utils/Reporter";

export const MAX_ARGUMENTS = 255;

// Tokens a primary expression can start with
const PRIMARY_TOKENS = [
    TokenType.False,
    TokenType.True,
    TokenType.Nil,
    TokenType.Number,
    TokenType.String,
    TokenType.Identifier,
    TokenType.LeftParen,
];

// Tokens that begin a declaration or statement, where recovery resumes
const SYNC_TOKENS = [
    TokenType.Class,
    TokenType.Fun,
    TokenType.Var,
    TokenType.For,
    TokenType.If,
    TokenType.While,
    TokenType.Print,
    TokenType.Return,
];

/**
 * Recursive-descent parser. Precedence, lowest first:
 * assignment, or, and, equality, comparison, term, factor, unary, call,
 * primary.
 */
export class Parser {
    private tokens: Token[];
    private current: number = 0;
    public readonly errors: ParseError[] = [];

    constructor(
        tokens: Token[],
        private source?: string,
        private reporter?: Reporter,
    ) {
        this.tokens = tokens;
    }

    public get hadError(): boolean {
        return this.errors.length > 0;
    }

    /**
     * Parses every declaration up to the end of input. A declaration that
     * fails is reported and skipped, so one pass can collect several errors.
     */
    public parse(): AST {
        this.current = 0;
        this.errors.length = 0;

        const statements: Statement[] = [];
        while (!this.isAtEnd()) {
            try {
                statements.push(this.declaration());
            } catch (e) {
                if (!(e instanceof ParseError)) throw e;
                this.errors.push(e);
                this.reporter?.report(e);
                this.synchronize();
            }
        }
        return { statements };
    }

    private getLoc(token: Token): SourceLocation {
        return {
            line: token.line,
            col: token.col,
            len: token.lexeme.length,
            endLine: token.line,
            endCol: token.col + token.lexeme.length,
        };
    }

    private mergeLoc(
        start: SourceLocation | undefined,
        end: SourceLocation | undefined,
    ): SourceLocation | undefined {
        if (!start) return end;
        if (!end) return start;

        const len =
            start.line === end.endLine ? end.endCol - start.col : start.len;

        return {
            line: start.line,
            col: start.col,
            len,
            endLine: end.endLine,
            endCol: end.endCol,
        };
    }

    private declaration(): Statement {
        if (this.match(TokenType.Fun)) {
            return this.funcDeclaration("function");
        }
        if (this.match(TokenType.Var)) {
            return this.varDeclaration();
        }
        return this.statement();
    }

    private funcDeclaration(kind: string): FunctionStatement {
        const keyword = this.previous();
        const name = this.consume(TokenType.Identifier, `Expect ${kind} name.`);

        this.consume(TokenType.LeftParen, `Expect '(' after ${kind} name.`);
        const params: Token[] = [];
        if (!this.check(TokenType.RightParen)) {
            do {
                if (params.length >= MAX_ARGUMENTS) {
                    throw this.error(
                        this.peek(),
                        TokenType.RightParen,
                        `Can't have more than ${MAX_ARGUMENTS} parameters.`,
                    );
                }
                params.push(
                    this.consume(
                        TokenType.Identifier,
                        "Expect parameter name.",
                    ),
                );
            } while (this.match(TokenType.Comma));
        }
        this.consume(TokenType.RightParen, "Expect ')' after parameters.");

        this.consume(TokenType.LeftBrace, `Expect '{' before ${kind} body.`);
        const body = this.block();

        return new FunctionStatement(
            name,
            params,
            body,
            this.mergeLoc(this.getLoc(keyword), this.getLoc(this.previous())),
        );
    }

    private varDeclaration(): VarStatement {
        const keyword = this.previous();
        const name = this.consume(
            TokenType.Identifier,
            "Expect variable name.",
        );

        let initializer: Expression | undefined;
        if (this.match(TokenType.Equal)) {
            initializer = this.expression();
        }

        const end = this.consume(
            TokenType.Semicolon,
            "Expect ';' after variable declaration.",
        );
        return new VarStatement(
            name,
            initializer,
            this.mergeLoc(this.getLoc(keyword), this.getLoc(end)),
        );
    }

    private statement(): Statement {
        if (this.match(TokenType.Print)) {
            return this.printStatement();
        }
        if (this.match(TokenType.Return)) {
            return this.returnStatement();
        }
        if (this.match(TokenType.While)) {
            return this.whileStatement();
        }
        if (this.match(TokenType.For)) {
            return this.forStatement();
        }
        if (this.match(TokenType.If)) {
            return this.ifStatement();
        }
        if (this.match(TokenType.LeftBrace)) {
            const startToken = this.previous();
            const statements = this.block();
            return {
                kind: "BlockStatement",
                statements,
                loc: this.mergeLoc(
                    this.getLoc(startToken),
                    this.getLoc(this.previous()),
                ),
            };
        }
        return this.expressionStatement();
    }

    private printStatement(): PrintStatement {
        const keyword = this.previous();
        const expression = this.expression();
        this.consume(TokenType.Semicolon, "Expect ';' after value.");
        return {
            kind: "PrintStatement",
            expression,
            loc: this.mergeLoc(this.getLoc(keyword), expression.loc),
        };
    }

    private returnStatement(): ReturnStatement {
        const keyword = this.previous();
        let value: Expression | undefined;
        if (!this.check(TokenType.Semicolon)) {
            value = this.expression();
        }
        this.consume(TokenType.Semicolon, "Expect ';' after return value.");

        return {
            kind: "ReturnStatement",
            keyword,
            value,
            loc: this.mergeLoc(this.getLoc(keyword), value?.loc),
        };
    }

    private whileStatement(): WhileStatement {
        const keyword = this.previous();
        this.consume(TokenType.LeftParen, "Expect '(' after 'while'.");
        const condition = this.expression();
        this.consume(TokenType.RightParen, "Expect ')' after condition.");
        const body = this.statement();

        return new WhileStatement(
            condition,
            body,
            this.mergeLoc(this.getLoc(keyword), body.loc),
        );
    }

    private ifStatement(): IfStatement {
        const keyword = this.previous();
        this.consume(TokenType.LeftParen, "Expect '(' after 'if'.");
        const condition = this.expression();
        this.consume(TokenType.RightParen, "Expect ')' after if condition.");

        const thenBranch = this.statement();
        let elseBranch: Statement | undefined;
        if (this.match(TokenType.Else)) {
            elseBranch = this.statement();
        }

        return new IfStatement(
            condition,
            thenBranch,
            elseBranch,
            this.mergeLoc(
                this.getLoc(keyword),
                (elseBranch ?? thenBranch).loc,
            ),
        );
    }

    /**
     * `for` has no node of its own: it becomes
     * `{ initializer; while (condition) { body; increment; } }`.
     */
    private forStatement(): Statement {
        const keyword = this.previous();
        this.consume(TokenType.LeftParen, "Expect '(' after 'for'.");

        let initializer: Statement | undefined;
        if (this.match(TokenType.Semicolon)) {
            initializer = undefined;
        } else if (this.match(TokenType.Var)) {
            initializer = this.varDeclaration();
        } else {
            initializer = this.expressionStatement();
        }

        let condition: Expression | undefined;
        if (!this.check(TokenType.Semicolon)) {
            condition = this.expression();
        }
        this.consume(TokenType.Semicolon, "Expect ';' after loop condition.");

        let increment: Expression | undefined;
        if (!this.check(TokenType.RightParen)) {
            increment = this.expression();
        }
        this.consume(TokenType.RightParen, "Expect ')' after for clauses.");

        let body = this.statement();
        const loc = this.mergeLoc(this.getLoc(keyword), body.loc);

        if (increment) {
            const step: ExpressionStatement = {
                kind: "ExpressionStatement",
                expression: increment,
                loc: increment.loc,
            };
            const block: BlockStatement = {
                kind: "BlockStatement",
                statements: [body, step],
                loc: body.loc,
            };
            body = block;
        }

        body = new WhileStatement(
            condition ?? {
                type: "LiteralExpression",
                value: { kind: "True" },
                loc: this.getLoc(keyword),
            },
            body,
            loc,
        );

        if (initializer) {
            const block: BlockStatement = {
                kind: "BlockStatement",
                statements: [initializer, body],
                loc,
            };
            body = block;
        }

        return body;
    }

    private block(): Statement[] {
        const statements: Statement[] = [];
        while (!this.check(TokenType.RightBrace) && !this.isAtEnd()) {
            statements.push(this.declaration());
        }
        this.consume(TokenType.RightBrace, "Expect '}' after block.");
        return statements;
    }

    private expressionStatement(): ExpressionStatement {
        const expression = this.expression();
        this.consume(TokenType.Semicolon, "Expect ';' after expression.");
        return {
            kind: "ExpressionStatement",
            expression,
            loc: expression.loc,
        };
    }

    private expression(): Expression {
        return this.assignment();
    }

    private assignment(): Expression {
        const startToken = this.peek();
        const expr = this.or();

        if (this.match(TokenType.Equal)) {
            // Right-associative: a = b = c is a = (b = c)
            const value = this.assignment();

            if (expr.type === "VarReference") {
                return {
                    type: "AssignExpression",
                    name: expr.name,
                    value,
                    loc: this.mergeLoc(expr.loc, value.loc),
                };
            }

            throw this.error(
                startToken,
                TokenType.Identifier,
                "Invalid assignment target.",
            );
        }

        return expr;
    }

    private or(): Expression {
        let left = this.and();

        while (this.match(TokenType.Or)) {
            const operator = this.previous();
            const right = this.and();
            left = {
                type: "LogicalExpression",
                left,
                operator,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private and(): Expression {
        let left = this.equality();

        while (this.match(TokenType.And)) {
            const operator = this.previous();
            const right = this.equality();
            left = {
                type: "LogicalExpression",
                left,
                operator,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private equality(): Expression {
        return this.binary(
            () => this.comparison(),
            TokenType.BangEqual,
            TokenType.EqualEqual,
        );
    }

    private comparison(): Expression {
        return this.binary(
            () => this.term(),
            TokenType.Greater,
            TokenType.GreaterEqual,
            TokenType.Less,
            TokenType.LessEqual,
        );
    }

    private term(): Expression {
        return this.binary(
            () => this.factor(),
            TokenType.Minus,
            TokenType.Plus,
        );
    }

    private factor(): Expression {
        return this.binary(
            () => this.unary(),
            TokenType.Slash,
            TokenType.Star,
        );
    }

    /**
     * Left-associative binary level: operand (op operand)*
     */
    private binary(
        operand: () => Expression,
        ...operators: TokenType[]
    ): Expression {
        let left = operand();

        while (this.match(...operators)) {
            const operator = this.previous();
            const right = operand();
            left = {
                type: "BinaryExpression",
                left,
                operator,
                right,
                loc: this.mergeLoc(left.loc, right.loc),
            };
        }

        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.Bang, TokenType.Minus)) {
            const operator = this.previous();
            const right = this.unary();
            return {
                type: "UnaryExpression",
                operator,
                right,
                loc: this.mergeLoc(this.getLoc(operator), right.loc),
            };
        }

        return this.call();
    }

    private call(): Expression {
        let expr = this.primary();

        while (this.match(TokenType.LeftParen)) {
            expr = this.finishCall(expr);
        }

        return expr;
    }

    private finishCall(callee: Expression): Expression {
        const args: Expression[] = [];
        if (!this.check(TokenType.RightParen)) {
            do {
                if (args.length >= MAX_ARGUMENTS) {
                    throw this.error(
                        this.peek(),
                        TokenType.RightParen,
                        `Can't have more than ${MAX_ARGUMENTS} arguments.`,
                    );
                }
                args.push(this.expression());
            } while (this.match(TokenType.Comma));
        }

        const paren = this.consume(
            TokenType.RightParen,
            "Expect ')' after arguments.",
        );

        return {
            type: "CallExpression",
            callee,
            paren,
            arguments: args,
            loc: this.mergeLoc(callee.loc, this.getLoc(paren)),
        };
    }

    private primary(): Expression {
        if (
            this.match(
                TokenType.False,
                TokenType.True,
                TokenType.Nil,
                TokenType.Number,
                TokenType.String,
            )
        ) {
            const token = this.previous();
            return {
                type: "LiteralExpression",
                value: token.literal,
                loc: this.getLoc(token),
            };
        }

        if (this.match(TokenType.Identifier)) {
            const token = this.previous();
            return {
                type: "VarReference",
                name: token,
                loc: this.getLoc(token),
            };
        }

        if (this.match(TokenType.LeftParen)) {
            const startParen = this.previous();
            const expression = this.expression();
            const endParen = this.consume(
                TokenType.RightParen,
                "Expect ')' after expression.",
            );
            return {
                type: "GroupingExpression",
                expression,
                loc: this.mergeLoc(
                    this.getLoc(startParen),
                    this.getLoc(endParen),
                ),
            };
        }

        const found = this.peek();
        throw new ExpectedExpressionError(
            PRIMARY_TOKENS,
            found.type,
            this.getLoc(found),
            this.source,
        );
    }

    /**
     * Skips tokens until just after a semicolon or just before a token that
     * starts a new declaration.
     */
    private synchronize(): void {
        this.advance();

        while (!this.isAtEnd()) {
            if (this.previous().type === TokenType.Semicolon) return;
            if (SYNC_TOKENS.includes(this.peek().type)) return;
            this.advance();
        }
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), type, message);
    }

    private check(type: TokenType): boolean {
        if (this.isAtEnd()) return false;
        return this.peek().type === type;
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private error(
        token: Token,
        expected: TokenType,
        message: string,
    ): UnexpectedTokenError {
        return new UnexpectedTokenError(
            expected,
            token.type,
            message,
            this.getLoc(token),
            this.source,
        );
    }
}
