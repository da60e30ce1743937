import { RuntimeValue } from "../types";

/**
 * This function unifies the value to its display string, the form `print`
 * writes.
 * @param val
 */
export function unify(val: RuntimeValue): string {
    switch (val.type) {
        case "str":
            return val.value;
        case "num":
            return String(val.value);
        case "bool":
            return val.value ? "true" : "false";
        case "nil":
            return "nil";
        case "func":
            return `<fn ${val.value.name}>`;
        case "native":
            return `<native fn ${val.value.name}>`;
    }
}
