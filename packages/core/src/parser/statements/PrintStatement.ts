import { BaseStatement } from "./BaseStatement";
import { Expression } from "../../types/expression";

export interface PrintStatement extends BaseStatement {
    kind: "PrintStatement";
    expression: Expression;
}
