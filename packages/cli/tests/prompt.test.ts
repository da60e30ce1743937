import { PassThrough, Readable } from "node:stream";
import chalk from "chalk";
import { runLine, runPrompt } from "../src/commands/prompt";

describe("prompt", () => {
    const flags = { tokens: false, ast: false, echo: true };
    // Nesting deep enough to exhaust the host stack while parsing
    const deep = "(".repeat(100000) + "1" + ")".repeat(100000) + ";";
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeAll(() => {
        chalk.level = 0;
    });

    beforeEach(() => {
        log = jest.spyOn(console, "log").mockImplementation(() => undefined);
        error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("a failing line is reported, not thrown", () => {
        expect(() => runLine(deep, flags)).not.toThrow();
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toBe("Error:");
    });

    test("runaway recursion is a reported runtime error", () => {
        runLine("fun f() { f(); } f();", flags);
        expect(error).toHaveBeenCalledTimes(1);
        expect(error.mock.calls[0][0]).toContain(
            "Stack overflow: more than 256 nested calls.",
        );
    });

    test("keep reading after an error", async () => {
        const input = Readable.from([
            Buffer.from(`print 1;\n${deep}\nprint nil + 1;\nprint 2;\n`),
        ]);
        const output = new PassThrough();
        output.resume();

        await runPrompt(flags, input, output);

        expect(log.mock.calls).toEqual([["1"], ["2"]]);
        expect(error).toHaveBeenCalledTimes(2);
    });
});
