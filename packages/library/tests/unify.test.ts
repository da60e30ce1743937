import { NIL, native, RuntimeValue, unify } from "../src";

describe("unify", () => {
    const noop = native("noop", () => NIL, { params: [], returnType: "nil" });

    test.each<[RuntimeValue, string]>([
        [{ type: "str", value: "plain" }, "plain"],
        [{ type: "num", value: 3 }, "3"],
        [{ type: "num", value: 2.5 }, "2.5"],
        [{ type: "bool", value: true }, "true"],
        [{ type: "bool", value: false }, "false"],
        [NIL, "nil"],
        [{ type: "native", value: noop }, "<native fn noop>"],
        [{ type: "func", value: { name: "add", params: ["a", "b"], arity: 2 } }, "<fn add>"],
    ])("display %j", (value, expected) => {
        expect(unify(value)).toBe(expected);
    });
});
