import { Value } from "./Value";
import { RuntimeError } from "./RuntimeError";

/**
 * One scope frame. A name bound to `undefined` is declared but not yet
 * initialized; a name missing from the map is not declared in this frame.
 */
export class Environment {
    private variables: Map<string, Value | undefined> = new Map();

    constructor(public readonly enclosing?: Environment) {}

    /**
     * Binds a name in this frame, replacing any earlier binding of the same
     * name in this frame.
     */
    public define(name: string, value?: Value): void {
        this.variables.set(name, value);
    }

    public get(name: string): Value {
        if (this.variables.has(name)) {
            const value = this.variables.get(name);
            if (value === undefined) {
                throw new RuntimeError(
                    "VariableNotInitialized",
                    `Variable '${name}' is not initialized.`,
                );
            }
            return value;
        }
        if (this.enclosing) {
            return this.enclosing.get(name);
        }
        throw new RuntimeError(
            "VariableNotFound",
            `Undefined variable '${name}'.`,
        );
    }

    public assign(name: string, value: Value): void {
        if (this.variables.has(name)) {
            this.variables.set(name, value);
            return;
        }
        if (this.enclosing) {
            this.enclosing.assign(name, value);
            return;
        }
        throw new RuntimeError(
            "VariableNotFound",
            `Undefined variable '${name}'.`,
        );
    }
}
