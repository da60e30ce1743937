export * from "../types/ast";
export * from "../types/expression";
