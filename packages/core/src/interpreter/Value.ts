import { FunctionRef, RuntimeValue } from "@lumen/library";
import { FunctionStatement } from "../parser/statements";

/**
 * A function declared in source. It carries its declaration by value and
 * holds no reference to the frame it was declared in.
 */
export interface LumenFunction extends FunctionRef {
    readonly declaration: FunctionStatement;
}

export type Value = RuntimeValue<LumenFunction>;

export function makeFunction(declaration: FunctionStatement): LumenFunction {
    const params = declaration.params.map((param) => param.lexeme);
    return {
        name: declaration.name.lexeme,
        params,
        arity: params.length,
        declaration,
    };
}

/**
 * Falsy values: `false`, `nil`, `0`, `""`, and every callable.
 */
export function isTruthy(value: Value): boolean {
    switch (value.type) {
        case "bool":
            return value.value;
        case "nil":
            return false;
        case "num":
            return value.value !== 0;
        case "str":
            return value.value.length !== 0;
        case "func":
        case "native":
            return false;
    }
}

/**
 * Type name used in runtime error messages.
 */
export function typeName(value: Value): string {
    switch (value.type) {
        case "bool":
            return "boolean";
        case "nil":
            return "nil";
        case "num":
            return "number";
        case "str":
            return "string";
        case "func":
            return "function";
        case "native":
            return "native function";
    }
}
