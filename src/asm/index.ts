export * from "./disassembler";
export * from "./errors";
export * from "./instruction";
export * from "./module";
export * from "./opcodes";
