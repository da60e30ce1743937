import fs from "node:fs/promises";
import chalk from "chalk";
import { formatToken, interpret, printAst, RunStatus } from "@lumen/core";

export interface RunFlags {
    tokens: boolean;
    ast: boolean;
    echo: boolean;
}

export const EXIT_CODES: Record<RunStatus, number> = {
    ok: 0,
    "scan-error": 64,
    "parse-error": 65,
    "runtime-error": 70,
};

/**
 * Runs one piece of source through the whole pipeline.
 */
export function runSource(code: string, flags: RunFlags): RunStatus {
    const { status } = interpret(code, {
        echoExpressions: flags.echo,
        onTokens: flags.tokens
            ? (tokens) => {
                  for (const token of tokens) {
                      console.log(chalk.gray("Token:"), formatToken(token));
                  }
              }
            : undefined,
        onAst: flags.ast
            ? (ast) => console.log(chalk.gray(printAst(ast)))
            : undefined,
    });
    return status;
}

/**
 * Runs a script file and returns the process exit code.
 */
export async function runFile(path: string, flags: RunFlags): Promise<number> {
    const code = await fs.readFile(path, "utf-8");
    return EXIT_CODES[runSource(code, flags)];
}
