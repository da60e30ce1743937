import { native } from "../utils/native";

export const time = {
    /**
     * Seconds elapsed since the Unix epoch
     * @returns seconds, with a fractional part
     */
    clock: native(
        "clock",
        () => ({ type: "num", value: Date.now() / 1000 }),
        {
            params: [],
            returnType: "num",
            description: "Seconds elapsed since the Unix epoch",
        },
    ),
};
