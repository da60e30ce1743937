import { LumenError, ErrorLocation } from "../utils/Error";

export class ScanError extends LumenError {
    constructor(message: string, loc: ErrorLocation, source?: string) {
        super(message, loc, source);
        this.name = "ScanError";
    }
}
