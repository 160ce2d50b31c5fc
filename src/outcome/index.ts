// src/outcome/index.ts

export * from "./outcome";
export * from "./failure";
export * from "./diagnostic";
export * from "./codes";
export * from "./fromError";
