// src/core/toolchain/index.ts

export { ToolchainError, type ToolchainErrorCategory } from "./errors";
export { nodeSpawner, type SpawnRequest, type SpawnResult, type Spawner } from "./spawner";
export {
  runTarget,
  targetPlan,
  type RunTargetOptions,
  type Step,
  type TargetPlan,
  type TargetRunResult,
} from "./runTarget";
export { checkParity, type ParityOptions, type ParityOutcome, type ParityReport } from "./parity";
