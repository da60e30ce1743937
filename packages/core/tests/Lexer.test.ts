import { Lexer } from "../src/lexer/Lexer";
import { TokenType } from "../src/lexer/TokenType";
import { formatToken } from "../src/lexer/Token";
import { CollectingReporter } from "../src/utils/Reporter";

describe("Lexer", () => {
    function types(input: string) {
        return new Lexer(input).tokenize().map((t) => t.type);
    }

    test("tokenize simple arithmetic", () => {
        const tokens = new Lexer("1+2").tokenize();

        expect(tokens.map((t) => t.type)).toEqual([
            TokenType.Number,
            TokenType.Plus,
            TokenType.Number,
            TokenType.EOF,
        ]);
        expect(tokens[0].literal).toEqual({ kind: "Number", value: 1 });
        expect(tokens[2].literal).toEqual({ kind: "Number", value: 2 });
        expect(tokens[3].lexeme).toBe("");
    });

    test("one and two character operators", () => {
        expect(types("!= == <= >= ! = < >")).toEqual([
            TokenType.BangEqual,
            TokenType.EqualEqual,
            TokenType.LessEqual,
            TokenType.GreaterEqual,
            TokenType.Bang,
            TokenType.Equal,
            TokenType.Less,
            TokenType.Greater,
            TokenType.EOF,
        ]);
    });

    test("keywords override identifiers", () => {
        const tokens = new Lexer("var variable = nil;").tokenize();

        expect(tokens.map((t) => t.type)).toEqual([
            TokenType.Var,
            TokenType.Identifier,
            TokenType.Equal,
            TokenType.Nil,
            TokenType.Semicolon,
            TokenType.EOF,
        ]);
        expect(tokens[1].literal).toEqual({
            kind: "Identifier",
            name: "variable",
        });
        expect(tokens[3].literal).toEqual({ kind: "Null" });
    });

    test("names shared with object properties are identifiers", () => {
        const tokens = new Lexer("toString constructor __proto__").tokenize();

        expect(tokens.map((t) => t.type)).toEqual([
            TokenType.Identifier,
            TokenType.Identifier,
            TokenType.Identifier,
            TokenType.EOF,
        ]);
        expect(tokens[2].literal).toEqual({
            kind: "Identifier",
            name: "__proto__",
        });
    });

    test("boolean keywords carry their literal", () => {
        const tokens = new Lexer("true false").tokenize();
        expect(tokens[0].literal).toEqual({ kind: "True" });
        expect(tokens[1].literal).toEqual({ kind: "False" });
    });

    test("numbers with and without a fractional part", () => {
        const tokens = new Lexer("12.5 7").tokenize();
        expect(tokens[0].literal).toEqual({ kind: "Number", value: 12.5 });
        expect(tokens[0].lexeme).toBe("12.5");
        expect(tokens[1].literal).toEqual({ kind: "Number", value: 7 });
    });

    test("trailing dot is not part of a number", () => {
        expect(types("1.")).toEqual([
            TokenType.Number,
            TokenType.Dot,
            TokenType.EOF,
        ]);
    });

    test("minus is not absorbed into a number", () => {
        expect(types("-3")).toEqual([
            TokenType.Minus,
            TokenType.Number,
            TokenType.EOF,
        ]);
    });

    test("string literal excludes the quotes", () => {
        const tokens = new Lexer('"hi there"').tokenize();
        expect(tokens[0].type).toBe(TokenType.String);
        expect(tokens[0].lexeme).toBe('"hi there"');
        expect(tokens[0].literal).toEqual({ kind: "String", value: "hi there" });
    });

    test("handle long strings", () => {
        const longStr = "a".repeat(10000);
        const tokens = new Lexer(`"${longStr}";`).tokenize();

        expect(tokens).toHaveLength(3); // String, Semicolon, EOF
        expect(tokens[0].literal).toEqual({ kind: "String", value: longStr });
    });

    test("skip line and block comments", () => {
        const input = "// header\nprint 1; /* a\nb */ print 2;";
        const tokens = new Lexer(input).tokenize();

        expect(tokens.map((t) => t.type)).toEqual([
            TokenType.Print,
            TokenType.Number,
            TokenType.Semicolon,
            TokenType.Print,
            TokenType.Number,
            TokenType.Semicolon,
            TokenType.EOF,
        ]);
        expect(tokens[0].line).toBe(2);
        expect(tokens[3].line).toBe(3);
        expect(tokens[3].col).toBe(6);
    });

    test("track line and column", () => {
        const tokens = new Lexer("var a;\n  a = 1;").tokenize();

        expect(tokens[0]).toMatchObject({ line: 1, col: 1 });
        expect(tokens[1]).toMatchObject({ line: 1, col: 5 });
        expect(tokens[3]).toMatchObject({ lexeme: "a", line: 2, col: 3 });
        expect(tokens[4]).toMatchObject({ lexeme: "=", line: 2, col: 5 });
    });

    test("strings may span lines", () => {
        const tokens = new Lexer('"a\nb" x').tokenize();
        expect(tokens[0]).toMatchObject({ line: 1, col: 1 });
        expect(tokens[1]).toMatchObject({ lexeme: "x", line: 2, col: 4 });
    });

    test("unterminated string emits no token", () => {
        const lexer = new Lexer('"Hello World');
        const tokens = lexer.tokenize();

        expect(tokens.map((t) => t.type)).toEqual([TokenType.EOF]);
        expect(lexer.hadError).toBe(true);
        expect(lexer.errors[0].rawMessage).toBe("Unterminated string.");
        expect(lexer.errors[0].loc).toEqual({ line: 1, col: 1 });
    });

    test("unterminated block comment is an error", () => {
        const lexer = new Lexer("1 /* never closed");
        lexer.tokenize();
        expect(lexer.errors.map((e) => e.rawMessage)).toEqual([
            "Unterminated block comment.",
        ]);
    });

    test("continue after an unexpected character", () => {
        const reporter = new CollectingReporter();
        const lexer = new Lexer("1 @ 2", reporter);
        const tokens = lexer.tokenize();

        expect(tokens.map((t) => t.type)).toEqual([
            TokenType.Number,
            TokenType.Number,
            TokenType.EOF,
        ]);
        expect(lexer.errors).toHaveLength(1);
        expect(lexer.errors[0].rawMessage).toBe("Unexpected character '@'.");
        expect(lexer.errors[0].loc).toEqual({ line: 1, col: 3 });
        expect(reporter.errors).toEqual(lexer.errors);
    });

    test("clean input has no error", () => {
        const lexer = new Lexer("print 1;");
        lexer.tokenize();
        expect(lexer.hadError).toBe(false);
    });

    test("tokenize again from the start", () => {
        const lexer = new Lexer("a b");
        const first = lexer.tokenize();
        const second = lexer.tokenize();
        expect(second).toEqual(first);
    });

    test("format a token for dumps", () => {
        const tokens = new Lexer("x;").tokenize();
        expect(formatToken(tokens[0])).toBe("Identifier x x 1:1");
        expect(formatToken(tokens[1])).toBe("Semicolon ; null 1:2");
    });
});
