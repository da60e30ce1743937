import { LumenError } from "./Error";

/**
 * Sink for diagnostics produced while scanning, parsing or running.
 */
export interface Reporter {
    report(error: LumenError): void;
}

export const consoleReporter: Reporter = {
    report(error) {
        console.error(error.message);
    },
};

/**
 * Reporter that keeps every diagnostic, for callers that print later.
 */
export class CollectingReporter implements Reporter {
    public readonly errors: LumenError[] = [];

    report(error: LumenError): void {
        this.errors.push(error);
    }
}
