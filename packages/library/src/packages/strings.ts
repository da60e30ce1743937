import { native } from "../utils/native";
import { unify } from "../utils/unify";

export const strings = {
    /**
     * Convert any value to its display string
     * @param value value to convert
     */
    str: native("str", (value) => ({ type: "str", value: unify(value) }), {
        params: [
            {
                name: "value",
                type: "unknown",
                description: "value to convert",
            },
        ],
        returnType: "str",
        description: "Convert any value to its display string",
    }),
};
