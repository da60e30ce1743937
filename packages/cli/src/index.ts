#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { runFile } from "./commands/run";
import { runPrompt } from "./commands/prompt";

yargs(hideBin(process.argv))
    .scriptName("lumen")
    .usage("$0 [path]")
    .command(
        "$0 [path]",
        "Run a Lumen script, or start a prompt when no path is given",
        (yargs) =>
            yargs
                .positional("path", {
                    describe: "Script to run",
                    type: "string",
                })
                .option("tokens", {
                    describe: "Print the scanned tokens",
                    type: "boolean",
                    default: false,
                })
                .option("ast", {
                    describe: "Print the parsed program",
                    type: "boolean",
                    default: false,
                })
                .option("echo", {
                    describe: "Print the value of expression statements",
                    type: "boolean",
                    default: true,
                }),
        async (argv) => {
            const flags = {
                tokens: argv.tokens,
                ast: argv.ast,
                echo: argv.echo,
            };

            if (!argv.path) {
                await runPrompt(flags);
                return;
            }

            try {
                process.exitCode = await runFile(argv.path, flags);
            } catch (e) {
                console.error(
                    chalk.red(`Error in ${argv.path}: `),
                    e instanceof Error ? e.message : String(e),
                );
                process.exitCode = 1;
            }
        },
    )
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(
            chalk.red("Error:"),
            e instanceof Error ? e.message : String(e),
        );
        process.exitCode = 1;
    });
