import chalk from "chalk";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
}

/**
 * Base class of every diagnostic. `message` is the formatted, coloured
 * report; `rawMessage` is the bare text.
 */
export class LumenError extends Error {
    public rawMessage: string;
    public loc?: ErrorLocation;
    public source?: string;
    public hint?: string;

    constructor(
        message: string,
        loc?: ErrorLocation,
        source?: string,
        hint?: string,
    ) {
        super(formatError(message, loc, source, hint));
        this.name = "LumenError";
        this.rawMessage = message;
        this.loc = loc;
        this.source = source;
        this.hint = hint;
    }
}

export function formatError(
    message: string,
    loc?: ErrorLocation,
    source?: string,
    hint?: string,
): string {
    const errorHeader = `${chalk.red.bold("Error:")} ${chalk.bold(message)}`;
    if (!loc) {
        return errorHeader;
    }

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);
    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`;

    // Without the source only the location can be shown
    if (source === undefined) {
        return [errorHeader, locationLine].join("\n");
    }

    const lines = source.split("\n");
    const lineContent = lines[loc.line - 1] ?? "";

    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const underlineLen = Math.max(1, loc.len || 1);
    const pointer = chalk.red.bold("^".repeat(underlineLen));
    const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

    const output = [
        errorHeader,
        locationLine,
        pipeLine,
        codeLine,
        pointerLine,
        pipeLine,
    ];

    if (hint) {
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${hint}`);
    }

    return output.join("\n");
}

export function makeError(
    source: string,
    loc: ErrorLocation,
    message: string,
    hint?: string,
): LumenError {
    return new LumenError(message, loc, source, hint);
}
