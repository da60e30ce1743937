import { NativeFunction, NIL, natives, unify } from "@lumen/library";

import { AST } from "../types/ast";
import { Statement } from "../parser/statements";
import {
    BinaryExpression,
    CallExpression,
    Expression,
    LiteralExpression,
    LogicalExpression,
    UnaryExpression,
} from "../types/expression";
import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { ErrorLocation } from "../utils/Error";
import { Environment } from "./Environment";
import { RuntimeError, RuntimeErrorKind } from "./RuntimeError";
import { isTruthy, LumenFunction, makeFunction, typeName, Value } from "./Value";

/**
 * How a statement finished. A `return` travels up through blocks and loops
 * until the enclosing call consumes it.
 */
export type ControlOutcome =
    | { kind: "normal" }
    | { kind: "return"; value: Value };

const NORMAL: ControlOutcome = { kind: "normal" };

// Deepest chain of user function calls before a run is aborted
export const MAX_CALL_DEPTH = 256;

export interface InterpreterOptions {
    /** Receives each line written to standard output */
    output?: (line: string) => void;
    /** Write the value of every expression statement (default true) */
    echoExpressions?: boolean;
    /** Source text, used to render error excerpts */
    source?: string;
    /** Native functions bound in the global frame */
    natives?: NativeFunction[];
}

export class Interpreter {
    private globals: Environment = new Environment();
    private environment: Environment = this.globals;
    private callDepth: number = 0;

    private output: (line: string) => void;
    private echoExpressions: boolean;
    private source?: string;
    private natives: NativeFunction[];

    constructor(options: InterpreterOptions = {}) {
        this.output = options.output ?? ((line) => console.log(line));
        this.echoExpressions = options.echoExpressions ?? true;
        this.source = options.source;
        this.natives = options.natives ?? natives;
        this.reset();
    }

    /**
     * Runs a program against a fresh global frame. A runtime error aborts
     * the run and is thrown to the caller.
     */
    public run(ast: AST, source?: string): void {
        if (source !== undefined) this.source = source;
        this.reset();

        for (const statement of ast.statements) {
            const outcome = this.execute(statement);
            // A top-level return ends the program
            if (outcome.kind === "return") return;
        }
    }

    public getVariable(name: string): Value {
        return this.globals.get(name);
    }

    private reset(): void {
        this.globals = new Environment();
        for (const fn of this.natives) {
            this.globals.define(fn.name, { type: "native", value: fn });
        }
        this.environment = this.globals;
        this.callDepth = 0;
    }

    public execute(stmt: Statement): ControlOutcome {
        switch (stmt.kind) {
            case "PrintStatement": {
                const value = this.evaluate(stmt.expression);
                this.output(unify(value));
                return NORMAL;
            }

            case "ExpressionStatement": {
                const value = this.evaluate(stmt.expression);
                if (this.echoExpressions) {
                    this.output(unify(value));
                }
                return NORMAL;
            }

            case "VarStatement": {
                const value = stmt.initializer
                    ? this.evaluate(stmt.initializer)
                    : undefined;
                this.environment.define(stmt.name.lexeme, value);
                return NORMAL;
            }

            case "BlockStatement":
                return this.executeBlock(
                    stmt.statements,
                    new Environment(this.environment),
                );

            case "IfStatement":
                if (isTruthy(this.evaluate(stmt.condition))) {
                    return this.execute(stmt.thenBranch);
                }
                if (stmt.elseBranch) {
                    return this.execute(stmt.elseBranch);
                }
                return NORMAL;

            case "WhileStatement":
                while (isTruthy(this.evaluate(stmt.condition))) {
                    const outcome = this.execute(stmt.body);
                    if (outcome.kind === "return") return outcome;
                }
                return NORMAL;

            case "FunctionStatement":
                this.environment.define(stmt.name.lexeme, {
                    type: "func",
                    value: makeFunction(stmt),
                });
                return NORMAL;

            case "ReturnStatement":
                return {
                    kind: "return",
                    value: stmt.value ? this.evaluate(stmt.value) : NIL,
                };
        }
    }

    /**
     * Executes statements with `environment` as the current frame. The
     * previous frame is restored on every exit, errors included.
     */
    public executeBlock(
        statements: Statement[],
        environment: Environment,
    ): ControlOutcome {
        const previous = this.environment;
        this.environment = environment;
        try {
            for (const statement of statements) {
                const outcome = this.execute(statement);
                if (outcome.kind !== "normal") return outcome;
            }
            return NORMAL;
        } finally {
            this.environment = previous;
        }
    }

    public evaluate(expr: Expression): Value {
        switch (expr.type) {
            case "LiteralExpression":
                return this.evaluateLiteral(expr);
            case "GroupingExpression":
                return this.evaluate(expr.expression);
            case "VarReference":
                return this.located(expr.loc, () =>
                    this.environment.get(expr.name.lexeme),
                );
            case "AssignExpression": {
                const value = this.evaluate(expr.value);
                this.located(expr.loc, () =>
                    this.environment.assign(expr.name.lexeme, value),
                );
                return value;
            }
            case "UnaryExpression":
                return this.evaluateUnary(expr);
            case "BinaryExpression":
                return this.evaluateBinary(expr);
            case "LogicalExpression":
                return this.evaluateLogical(expr);
            case "CallExpression":
                return this.evaluateCall(expr);
        }
    }

    private evaluateLiteral(expr: LiteralExpression): Value {
        const literal = expr.value;
        switch (literal.kind) {
            case "Null":
                return NIL;
            case "True":
                return { type: "bool", value: true };
            case "False":
                return { type: "bool", value: false };
            case "String":
                return { type: "str", value: literal.value };
            case "Number":
                return { type: "num", value: literal.value };
            case "Identifier":
                return this.located(expr.loc, () =>
                    this.environment.get(literal.name),
                );
        }
    }

    private evaluateUnary(expr: UnaryExpression): Value {
        const right = this.evaluate(expr.right);

        switch (expr.operator.type) {
            case TokenType.Minus:
                if (right.type !== "num") {
                    throw this.error(
                        "UnaryOperation",
                        `Operand of '-' must be a number, got ${typeName(right)}.`,
                        expr.operator,
                    );
                }
                return { type: "num", value: -right.value };
            case TokenType.Bang:
                return { type: "bool", value: !isTruthy(right) };
            default:
                throw this.error(
                    "UnaryOperation",
                    `Unknown unary operator '${expr.operator.lexeme}'.`,
                    expr.operator,
                );
        }
    }

    private evaluateBinary(expr: BinaryExpression): Value {
        const left = this.evaluate(expr.left);
        const right = this.evaluate(expr.right);
        const operator = expr.operator;

        if (left.type === "num" && right.type === "num") {
            const l = left.value;
            const r = right.value;
            switch (operator.type) {
                case TokenType.Plus:
                    return { type: "num", value: l + r };
                case TokenType.Minus:
                    return { type: "num", value: l - r };
                case TokenType.Star:
                    return { type: "num", value: l * r };
                case TokenType.Slash:
                    return { type: "num", value: l / r };
                case TokenType.Greater:
                    return { type: "bool", value: l > r };
                case TokenType.GreaterEqual:
                    return { type: "bool", value: l >= r };
                case TokenType.Less:
                    return { type: "bool", value: l < r };
                case TokenType.LessEqual:
                    return { type: "bool", value: l <= r };
                case TokenType.BangEqual:
                    return { type: "bool", value: l !== r };
                case TokenType.EqualEqual:
                    return { type: "bool", value: l === r };
            }
        }

        if (
            left.type === "str" &&
            right.type === "str" &&
            operator.type === TokenType.Plus
        ) {
            return { type: "str", value: left.value + right.value };
        }

        throw this.error(
            "BinaryOperation",
            `Operator '${operator.lexeme}' cannot be applied to ${typeName(left)} and ${typeName(right)}.`,
            operator,
        );
    }

    private evaluateLogical(expr: LogicalExpression): Value {
        const left = this.evaluate(expr.left);

        switch (expr.operator.type) {
            case TokenType.Or:
                if (isTruthy(left)) return left;
                break;
            case TokenType.And:
                if (!isTruthy(left)) return left;
                break;
            default:
                throw this.error(
                    "LogicalOperator",
                    `Unknown logical operator '${expr.operator.lexeme}'.`,
                    expr.operator,
                );
        }

        return this.evaluate(expr.right);
    }

    private evaluateCall(expr: CallExpression): Value {
        const callee = this.evaluate(expr.callee);
        const args = expr.arguments.map((arg) => this.evaluate(arg));

        if (callee.type === "func") {
            return this.callFunction(callee.value, args, expr.paren);
        }

        if (callee.type === "native") {
            this.checkArity(callee.value.arity, args.length, expr.paren);
            return callee.value.call(...args);
        }

        throw this.error(
            "InvalidCall",
            `Can only call functions, got ${typeName(callee)}.`,
            expr.paren,
        );
    }

    /**
     * Calls run in a new frame enclosed by the global frame: the body sees
     * its parameters, its own locals and globals.
     */
    private callFunction(
        fn: LumenFunction,
        args: Value[],
        paren: Token,
    ): Value {
        this.checkArity(fn.arity, args.length, paren);
        if (this.callDepth >= MAX_CALL_DEPTH) {
            throw this.error(
                "StackOverflow",
                `Stack overflow: more than ${MAX_CALL_DEPTH} nested calls.`,
                paren,
            );
        }

        const environment = new Environment(this.globals);
        fn.params.forEach((param, i) => environment.define(param, args[i]));

        this.callDepth++;
        try {
            const outcome = this.executeBlock(fn.declaration.body, environment);
            return outcome.kind === "return" ? outcome.value : NIL;
        } finally {
            this.callDepth--;
        }
    }

    private checkArity(arity: number, count: number, paren: Token): void {
        if (arity !== count) {
            throw this.error(
                "Arity",
                `Expected ${arity} arguments but got ${count}.`,
                paren,
            );
        }
    }

    /**
     * Points errors raised by the environment, which knows no locations, at
     * the node being evaluated.
     */
    private located<T>(loc: ErrorLocation | undefined, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (e instanceof RuntimeError && !e.loc) {
                throw e.at(loc, this.source);
            }
            throw e;
        }
    }

    private error(
        kind: RuntimeErrorKind,
        message: string,
        token: Token,
    ): RuntimeError {
        return new RuntimeError(
            kind,
            message,
            { line: token.line, col: token.col, len: token.lexeme.length },
            this.source,
        );
    }
}
