// src/core/modules/index.ts

export { CircularImportError, ModuleLoadError, ModuleNotFoundError } from "./errors";
export {
  loadModuleDocument,
  MODULE_EXTENSION,
  ModuleCache,
  moduleExports,
  renameCalls,
  resolveImports,
  resolveModulePath,
  type ResolveOptions,
} from "./resolve";
