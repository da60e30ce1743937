export { OpCode } from "./OpCode";
export { Chunk, MAX_CONSTANTS } from "./Chunk";
export type { SrcLocation } from "./Chunk";
export { Vm, InterpretResult, STACK_MAX } from "./Vm";
export type { VmOptions, VmResult } from "./Vm";
