export * from "../../types/expression";
