import { ExpressionStatement } from "./ExpressionStatement";
import { PrintStatement } from "./PrintStatement";
import { VarStatement } from "./VarStatement";
import { BlockStatement } from "./BlockStatement";
import { IfStatement } from "./IfStatement";
import { WhileStatement } from "./WhileStatement";
import { FunctionStatement } from "./FunctionStatement";
import { ReturnStatement } from "./ReturnStatement";

export * from "./BaseStatement";
export * from "./ExpressionStatement";
export * from "./PrintStatement";
export * from "./VarStatement";
export * from "./BlockStatement";
export * from "./IfStatement";
export * from "./WhileStatement";
export * from "./FunctionStatement";
export * from "./ReturnStatement";

export type Statement =
    | ExpressionStatement
    | PrintStatement
    | VarStatement
    | BlockStatement
    | IfStatement
    | WhileStatement
    | FunctionStatement
    | ReturnStatement;
