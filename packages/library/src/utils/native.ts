import {
    FunctionSignature,
    NativeFunction,
    PrimitiveValue,
    RuntimeValue,
} from "../types";

/**
 * Define a native function with signature. The arity is the number of
 * parameters in the signature.
 * @param name name the function is bound to
 * @param fn Implementation
 * @param signature Signature metadata
 */
export function native(
    name: string,
    fn: (...args: RuntimeValue[]) => PrimitiveValue,
    signature: FunctionSignature,
): NativeFunction {
    return {
        name,
        arity: signature.params.length,
        signature,
        call: fn,
    };
}
