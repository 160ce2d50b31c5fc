// src/core/compiler/index.ts
// Compiler passes and pipeline - Module exports

export { lower } from "./lower";
export { optimize, optimizeWithStats, type OptimizeStats } from "./optimize";
export { composeSourceMaps, type ComposedSourceMap, type LineMap } from "./sourcemap";
export {
  build,
  compile,
  interpret,
  prepare,
  ValidationFailedError,
  type BuildResult,
  type CompilationResult,
  type CompileOptions,
  type PassRecord,
  type PreparedDocument,
  type PrepareOptions,
} from "./pipeline";
