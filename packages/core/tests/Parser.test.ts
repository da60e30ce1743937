import { Lexer } from "../src/lexer/Lexer";
import { TokenType } from "../src/lexer/TokenType";
import { Parser } from "../src/parser/Parser";
import {
    ExpectedExpressionError,
    UnexpectedTokenError,
} from "../src/parser/ParseError";
import { CollectingReporter } from "../src/utils/Reporter";
import { printAst } from "../src/utils/ast";

describe("Parser", () => {
    function parse(input: string) {
        const parser = new Parser(new Lexer(input).tokenize(), input);
        const ast = parser.parse();
        return { ast, parser };
    }

    function print(input: string) {
        const { ast, parser } = parse(input);
        expect(parser.errors).toEqual([]);
        return printAst(ast);
    }

    test("parse variable declaration", () => {
        const { ast } = parse("var a = 1 + 2;");

        expect(ast.statements).toHaveLength(1);
        const stmt = ast.statements[0];
        expect(stmt.kind).toBe("VarStatement");
        if (stmt.kind !== "VarStatement") return;

        expect(stmt.name.lexeme).toBe("a");
        expect(stmt.initializer?.type).toBe("BinaryExpression");
        expect(stmt.loc).toEqual({
            line: 1,
            col: 1,
            len: 14,
            endLine: 1,
            endCol: 15,
        });
    });

    test("declaration without initializer", () => {
        expect(print("var a;")).toBe("(var a)");
    });

    test("multiplicative binds tighter than additive", () => {
        expect(print("1 + 2 * 3 - 4;")).toBe("(expr (- (+ 1 (* 2 3)) 4))");
    });

    test("grouping overrides precedence", () => {
        expect(print("(1 + 2) * 3;")).toBe("(expr (* (group (+ 1 2)) 3))");
    });

    test("unary operators nest", () => {
        expect(print("-!x;")).toBe("(expr (- (! x)))");
    });

    test("comparison binds tighter than equality", () => {
        expect(print("1 < 2 == true;")).toBe("(expr (== (< 1 2) true))");
    });

    test("equality chains to the left", () => {
        expect(print("a == b == c;")).toBe("(expr (== (== a b) c))");
    });

    test("and binds tighter than or", () => {
        expect(print("a or b and c;")).toBe("(expr (or a (and b c)))");
    });

    test("assignment is right-associative", () => {
        expect(print("a = b = 3;")).toBe("(expr (= a (= b 3)))");
    });

    test("chained calls", () => {
        expect(print("f(1, 2)(3);")).toBe("(expr (call (call f 1 2) 3))");
    });

    test("call without arguments", () => {
        expect(print("clock();")).toBe("(expr (call clock))");
    });

    test("string and nil literals", () => {
        expect(print('print "hi"; print nil;')).toBe(
            '(print "hi")\n(print nil)',
        );
    });

    test("if with else", () => {
        expect(print("if (x) print 1; else print 2;")).toBe(
            "(if x (print 1) (print 2))",
        );
    });

    test("dangling else binds to the nearest if", () => {
        expect(print("if (a) if (b) print 1; else print 2;")).toBe(
            "(if a (if b (print 1) (print 2)))",
        );
    });

    test("while with block body", () => {
        expect(print("while (i < 3) { print i; }")).toBe(
            "(while (< i 3) (block (print i)))",
        );
    });

    test("for desugars into while", () => {
        expect(print("for (var i = 0; i < 3; i = i + 1) print i;")).toBe(
            "(block (var i 0) (while (< i 3) (block (print i) (expr (= i (+ i 1))))))",
        );
    });

    test("for with every clause omitted loops on true", () => {
        expect(print("for (;;) print 1;")).toBe("(while true (print 1))");
    });

    test("for with expression initializer", () => {
        expect(print("for (i = 0; i < 1;) print i;")).toBe(
            "(block (expr (= i 0)) (while (< i 1) (print i)))",
        );
    });

    test("function declaration", () => {
        expect(print("fun add(a, b) { return a + b; }")).toBe(
            "(fun add (a b) (return (+ a b)))",
        );
    });

    test("bare return", () => {
        expect(print("fun f() { return; }")).toBe("(fun f () (return))");
    });

    test("invalid assignment target", () => {
        const { ast, parser } = parse("1 = 2;");

        expect(ast.statements).toHaveLength(0);
        expect(parser.errors).toHaveLength(1);
        const error = parser.errors[0];
        expect(error).toBeInstanceOf(UnexpectedTokenError);
        expect(error.rawMessage).toBe("Invalid assignment target.");
        expect(error.found).toBe(TokenType.Number);
    });

    test("missing semicolon", () => {
        const { parser } = parse("print 1");

        expect(parser.errors).toHaveLength(1);
        const error = parser.errors[0];
        expect(error).toBeInstanceOf(UnexpectedTokenError);
        if (!(error instanceof UnexpectedTokenError)) return;
        expect(error.rawMessage).toBe("Expect ';' after value.");
        expect(error.expected).toBe(TokenType.Semicolon);
        expect(error.found).toBe(TokenType.EOF);
    });

    test("if requires the closing paren", () => {
        const { parser } = parse("if (x print 1;");
        expect(parser.errors[0].rawMessage).toBe(
            "Expect ')' after if condition.",
        );
    });

    test("expected expression lists the tokens that can start one", () => {
        const { parser } = parse("print ;");

        const error = parser.errors[0];
        expect(error).toBeInstanceOf(ExpectedExpressionError);
        expect(error.rawMessage).toBe("Expected expression, found Semicolon.");
        expect(error.hint).toBe(
            "Expected one of: False, True, Nil, Number, String, Identifier, LeftParen",
        );
    });

    test("recover and report several errors in one pass", () => {
        const reporter = new CollectingReporter();
        const input = "var = 1;\nprint 2;\nprint ;\nprint 3;";
        const parser = new Parser(new Lexer(input).tokenize(), input, reporter);
        const ast = parser.parse();

        expect(parser.hadError).toBe(true);
        expect(parser.errors).toHaveLength(2);
        expect(parser.errors[0]).toBeInstanceOf(UnexpectedTokenError);
        expect(parser.errors[0].rawMessage).toBe("Expect variable name.");
        expect(parser.errors[1]).toBeInstanceOf(ExpectedExpressionError);
        expect(reporter.errors).toEqual(parser.errors);
        expect(printAst(ast)).toBe("(print 2)\n(print 3)");
    });

    test("recover at the next statement keyword", () => {
        const { ast, parser } = parse("var = 1 print 2; print 3;");

        expect(parser.errors).toHaveLength(1);
        expect(printAst(ast)).toBe("(print 2)\n(print 3)");
    });

    test("accept 255 arguments", () => {
        const args = Array.from({ length: 255 }, (_, i) => String(i));
        const { ast, parser } = parse(`f(${args.join(", ")});`);

        expect(parser.errors).toEqual([]);
        const stmt = ast.statements[0];
        if (stmt.kind !== "ExpressionStatement") {
            throw new Error(`Unexpected ${stmt.kind}`);
        }
        if (stmt.expression.type !== "CallExpression") {
            throw new Error(`Unexpected ${stmt.expression.type}`);
        }
        expect(stmt.expression.arguments).toHaveLength(255);
    });

    test("reject more than 255 arguments", () => {
        const args = Array.from({ length: 256 }, (_, i) => String(i));
        const { parser } = parse(`f(${args.join(", ")});`);

        expect(parser.errors.map((e) => e.rawMessage)).toContain(
            "Can't have more than 255 arguments.",
        );
    });

    test("reject more than 255 parameters", () => {
        const params = Array.from({ length: 256 }, (_, i) => `p${i}`);
        const { parser } = parse(`fun f(${params.join(", ")}) {}`);

        expect(parser.errors[0].rawMessage).toBe(
            "Can't have more than 255 parameters.",
        );
    });
});
