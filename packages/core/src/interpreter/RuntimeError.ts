import { LumenError, ErrorLocation } from "../utils/Error";

export type RuntimeErrorKind =
    | "BinaryOperation"
    | "UnaryOperation"
    | "VariableNotFound"
    | "VariableNotInitialized"
    | "LogicalOperator"
    | "InvalidCall"
    | "Arity"
    | "StackOverflow";

export class RuntimeError extends LumenError {
    constructor(
        public readonly kind: RuntimeErrorKind,
        message: string,
        loc?: ErrorLocation,
        source?: string,
    ) {
        super(message, loc, source);
        this.name = "RuntimeError";
    }

    /**
     * Same error, pointed at a location in the source.
     */
    public at(loc: ErrorLocation | undefined, source?: string): RuntimeError {
        return new RuntimeError(this.kind, this.rawMessage, loc, source);
    }
}
