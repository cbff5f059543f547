export * from "./types.js";
export { ConfigError, loadConfig, type LoadedConfig, type RepolizerConfig } from "./config.js";
export { createConsoleLogger, type ConsoleLoggerOptions, type Logger } from "./logger.js";
export {
  ICON_SPECS,
  MASKABLE_BACKGROUND,
  MASKABLE_SAFE_ZONE,
  maskableLayout,
  renderIcon,
  runIconGenerator,
  type IconRunOptions,
  type MaskableLayout,
} from "./icons.js";
export {
  RepositoryStore,
  createRepositoryStore,
  type RepositoryStoreOptions,
} from "./store.js";
export { buildProgram, main, runCli, type CliOptions } from "./program.js";
