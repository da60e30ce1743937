export type PrimitiveValue =
    | { type: "bool"; value: boolean }
    | { type: "nil"; value: null }
    | { type: "num"; value: number }
    | { type: "str"; value: string };

/**
 * The part of a user-defined function the library can see. The interpreter
 * extends it with the function body.
 */
export interface FunctionRef {
    readonly name: string;
    readonly params: readonly string[];
    readonly arity: number;
}

export type RuntimeValue<F extends FunctionRef = FunctionRef> =
    | PrimitiveValue
    | { type: "native"; value: NativeFunction }
    | { type: "func"; value: F };

export interface FunctionSignature {
    params: { name: string; type: string; description?: string }[];
    returnType: string;
    description?: string;
}

export interface NativeFunction {
    readonly name: string;
    readonly arity: number;
    readonly signature: FunctionSignature;
    call(...args: RuntimeValue[]): PrimitiveValue;
}

export const NIL: PrimitiveValue = { type: "nil", value: null };
