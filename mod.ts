/**
 * Named-instance logging with per-run, per-day log directories
 *
 * This library provides:
 * - A registry of loggers keyed by name, sharing one run identifier
 * - Console and file handlers with their own level and format
 * - Handlers shared between loggers
 * - Log files under <base>/<YYYY-MM-DD>/<runId>/<runId>_<handler>.log
 *
 * @module
 */

export { captureCaller, type SourceLocation } from "./src/caller.ts";
export {
  applyLoggingConfig,
  createRegistry,
  DEFAULT_CONFIG_PATH,
  loadLoggingConfigSync,
  type LoggerConfig,
  type LoggingConfig,
  type LoggingConfigInput,
  LoggingConfigSchema,
  parseLoggingConfig,
} from "./src/config.ts";
export { getLogger, getLoggerNames, getRegistry, resetRegistry } from "./src/default-registry.ts";
export {
  ConfigError,
  type ConfigErrorType,
  HandlerNotFoundError,
  LoggerNotFoundError,
  NotFoundError,
  RunlogError,
} from "./src/errors.ts";
export { FileTransport } from "./src/file-transport.ts";
export { formatPresets, LogFields, LogFormats, renderTemplate, resolveFormat } from "./src/formats.ts";
export { Handler, type HandlerKind } from "./src/handler.ts";
export { type LastResortFn, setLastResortFn } from "./src/last-resort.ts";
export { isKnownLevel, type LevelInput, type LevelName, type LogLevel, LogLevels, toLevelValue } from "./src/levels.ts";
export { Logger } from "./src/logger.ts";
export { DEFAULT_BASE_DIRECTORY, LoggerRegistry } from "./src/registry.ts";
export { composeRunId, createDatestamp, createLogDatetimeStamp, createTimestamp, formatRecordTime } from "./src/stamps.ts";

export type { ConsoleHandlerOptions, FileHandlerOptions, HandlerOptions, LoggerOptions, RegistryOptions } from "./src/types.ts";
