export * from "./types";
export * from "./runner";
export * from "./analysis/walk";
export * from "./passes/unreachableCode";
export * from "./passes/unusedVariable";
export * from "./passes/variableShadowing";
export * from "./passes/emptyBody";
