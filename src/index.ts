export * from "./core/index.js";
export { config, loadConfig, DEFAULT_CAPACITY, type Config, type LogLevel } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
