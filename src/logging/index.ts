/**
 * Logging モジュール
 */

export { createLogger, resolveLogLevel, formatValue } from "./logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./logger.js";
