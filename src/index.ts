export * from "./slice/index.js";

export { loadConfig, resolveConfigPath } from "./config/loadConfig.js";
export { applyConfig } from "./config/applyConfig.js";
export { AppConfigSchema, StorageConfigSchema } from "./config/types.js";
export type { AppConfig, StorageConfig } from "./config/types.js";

export { Logger, logger, LOG_LEVELS } from "./util/logger.js";
export type { LogLevel, LogSink } from "./util/logger.js";
