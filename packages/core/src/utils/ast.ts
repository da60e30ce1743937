import { formatLiteral } from "../lexer/Token";
import { AST } from "../types/ast";
import { Statement } from "../parser/statements";
import { Expression } from "../types/expression";

/**
 * Renders an expression as a parenthesised prefix form, e.g. `(+ 1 (* 2 3))`.
 */
export function printExpression(expr: Expression): string {
    switch (expr.type) {
        case "LiteralExpression":
            if (expr.value.kind === "String") {
                return JSON.stringify(expr.value.value);
            }
            if (expr.value.kind === "Null") return "nil";
            return formatLiteral(expr.value);
        case "UnaryExpression":
            return `(${expr.operator.lexeme} ${printExpression(expr.right)})`;
        case "BinaryExpression":
        case "LogicalExpression":
            return `(${expr.operator.lexeme} ${printExpression(expr.left)} ${printExpression(expr.right)})`;
        case "GroupingExpression":
            return `(group ${printExpression(expr.expression)})`;
        case "VarReference":
            return expr.name.lexeme;
        case "AssignExpression":
            return `(= ${expr.name.lexeme} ${printExpression(expr.value)})`;
        case "CallExpression": {
            const parts = [printExpression(expr.callee)];
            for (const arg of expr.arguments) {
                parts.push(printExpression(arg));
            }
            return `(call ${parts.join(" ")})`;
        }
    }
}

export function printStatement(stmt: Statement): string {
    switch (stmt.kind) {
        case "ExpressionStatement":
            return `(expr ${printExpression(stmt.expression)})`;
        case "PrintStatement":
            return `(print ${printExpression(stmt.expression)})`;
        case "VarStatement":
            return stmt.initializer
                ? `(var ${stmt.name.lexeme} ${printExpression(stmt.initializer)})`
                : `(var ${stmt.name.lexeme})`;
        case "BlockStatement":
            return `(block${stmt.statements.map((s) => " " + printStatement(s)).join("")})`;
        case "IfStatement": {
            const head = `(if ${printExpression(stmt.condition)} ${printStatement(stmt.thenBranch)}`;
            return stmt.elseBranch
                ? `${head} ${printStatement(stmt.elseBranch)})`
                : `${head})`;
        }
        case "WhileStatement":
            return `(while ${printExpression(stmt.condition)} ${printStatement(stmt.body)})`;
        case "FunctionStatement": {
            const params = stmt.params.map((p) => p.lexeme).join(" ");
            const body = stmt.body.map((s) => " " + printStatement(s)).join("");
            return `(fun ${stmt.name.lexeme} (${params})${body})`;
        }
        case "ReturnStatement":
            return stmt.value
                ? `(return ${printExpression(stmt.value)})`
                : "(return)";
    }
}

/**
 * One line per top-level statement.
 */
export function printAst(ast: AST): string {
    return ast.statements.map(printStatement).join("\n");
}
