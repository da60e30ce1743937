import { time } from "./packages/time";
import { strings } from "./packages/strings";
import { NativeFunction } from "./types";

export * from "./types";
export { native } from "./utils/native";
export { unify } from "./utils/unify";

/**
 * Native functions bound in the global frame of every run.
 */
export const natives: NativeFunction[] = [
    ...Object.values(time),
    ...Object.values(strings),
];
