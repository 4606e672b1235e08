export * from "./domain";
export * from "./runner";
