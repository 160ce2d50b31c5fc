// src/core/config/index.ts
// Configuration system exports

export {
  type LintLevel,
  type CompileConfig,
  type ToolchainConfig,
  type RuntimeConfig,
  type DebugConfig,
  type LintConfig,
  type CoreILConfig,
  type ConfigOverrides,
  type ConfigValidation,
  ConfigError,
  DEFAULT_COMMANDS,
  DEFAULT_COMPILE_CONFIG,
  DEFAULT_TOOLCHAIN_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_DEBUG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
