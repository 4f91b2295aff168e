export * from "./asm";
export * from "./utils";
