import readline from "node:readline";
import chalk from "chalk";
import { runSource, RunFlags } from "./run";

/**
 * Runs one prompt line. Failures that escape the pipeline, such as the host
 * running out of stack on deeply nested source, are printed here and the
 * prompt carries on.
 */
export function runLine(line: string, flags: RunFlags): void {
    try {
        runSource(line, flags);
    } catch (e) {
        console.error(
            chalk.red("Error:"),
            e instanceof Error ? e.message : String(e),
        );
    }
}

/**
 * Interactive prompt: every line is a separate program. Errors are reported
 * and the prompt carries on until end of input.
 */
export function runPrompt(
    flags: RunFlags,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): Promise<void> {
    return new Promise((resolve) => {
        const rl = readline.createInterface({
            input,
            output,
            prompt: chalk.green("> "),
        });

        rl.on("line", (line) => {
            runLine(line, flags);
            rl.prompt();
        });
        rl.on("close", () => resolve());

        rl.prompt();
    });
}
