import { Lexer } from "./lexer/Lexer";
import { Token } from "./lexer/Token";
import { Parser } from "./parser/Parser";
import { AST } from "./types/ast";
import { Interpreter, InterpreterOptions } from "./interpreter/Interpreter";
import { RuntimeError } from "./interpreter/RuntimeError";
import { consoleReporter, Reporter } from "./utils/Reporter";

export { Lexer } from "./lexer/Lexer";
export { TokenType } from "./lexer/TokenType";
export * from "./lexer/Token";
export { ScanError } from "./lexer/ScanError";
export { Parser, MAX_ARGUMENTS } from "./parser/Parser";
export * from "./parser/ParseError";
export * from "./parser/types";
export * from "./parser/statements";
export { Interpreter, MAX_CALL_DEPTH } from "./interpreter/Interpreter";
export type {
    ControlOutcome,
    InterpreterOptions,
} from "./interpreter/Interpreter";
export { Environment } from "./interpreter/Environment";
export { RuntimeError } from "./interpreter/RuntimeError";
export type { RuntimeErrorKind } from "./interpreter/RuntimeError";
export * from "./interpreter/Value";
export { LumenError, makeError } from "./utils/Error";
export type { ErrorLocation } from "./utils/Error";
export * from "./utils/Reporter";
export * from "./utils/ast";
export * from "./vm";

export type RunStatus = "ok" | "scan-error" | "parse-error" | "runtime-error";

export interface RunResult {
    status: RunStatus;
    tokens: Token[];
    ast: AST;
}

export interface InterpretOptions extends Omit<InterpreterOptions, "source"> {
    reporter?: Reporter;
    /** Called with the scanned tokens before parsing */
    onTokens?: (tokens: Token[]) => void;
    /** Called with the parsed program before it runs */
    onAst?: (ast: AST) => void;
}

/**
 * Lexes, parses and runs `code`. Diagnostics go to the reporter; the program
 * is only run when scanning and parsing were clean.
 */
export function interpret(
    code: string,
    options: InterpretOptions = {},
): RunResult {
    const {
        reporter = consoleReporter,
        onTokens,
        onAst,
        ...interpreterOptions
    } = options;

    const lexer = new Lexer(code, reporter);
    const tokens = lexer.tokenize();
    onTokens?.(tokens);

    const parser = new Parser(tokens, code, reporter);
    const ast = parser.parse();
    onAst?.(ast);

    if (lexer.hadError) return { status: "scan-error", tokens, ast };
    if (parser.hadError) return { status: "parse-error", tokens, ast };

    const interpreter = new Interpreter({
        ...interpreterOptions,
        source: code,
    });
    try {
        interpreter.run(ast);
    } catch (e) {
        if (!(e instanceof RuntimeError)) throw e;
        reporter.report(e);
        return { status: "runtime-error", tokens, ast };
    }

    return { status: "ok", tokens, ast };
}
