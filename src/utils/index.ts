export * from "./misc";
export * from "./pp";
