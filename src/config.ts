/**
 * Logging configuration loaded from ./configs/logging.jsonc
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse, type ParseError, printParseErrorCode } from "jsonc-parser";
import { z } from "zod";
import { ConfigError, formatZodError } from "./errors.ts";
import { resolveFormat } from "./formats.ts";
import { isKnownLevel, toLevelValue } from "./levels.ts";
import { LoggerRegistry } from "./registry.ts";
import type { RegistryOptions } from "./types.ts";

export const DEFAULT_CONFIG_PATH = "./configs/logging.jsonc";

const LevelSchema = z
  .union([z.string(), z.number()])
  .refine(isKnownLevel, { message: "Unknown log level" })
  .transform((level) => toLevelValue(level));

const HandlerConfigSchema = z
  .object({
    enabled: z.boolean().optional(), // Defaults to true
    level: LevelSchema.optional(), // Defaults to INFO
    format: z.string().min(1).optional(), // Preset name or template, defaults to basic
  })
  .strict();

const ConsoleConfigSchema = HandlerConfigSchema.extend({
  name: z.string().min(1).optional(), // Defaults to "console"
});

const LoggerConfigSchema = z
  .object({
    baseDirectory: z.string().min(1).optional(),
    console: ConsoleConfigSchema.optional(),
    files: z.record(HandlerConfigSchema).optional(),
    join: z.array(z.object({ logger: z.string().min(1), handler: z.string().min(1) }).strict()).optional(),
  })
  .strict();

export const LoggingConfigSchema = z
  .object({
    baseDirectory: z.string().min(1).optional(),
    runName: z.string().min(1).optional(),
    loggers: z.record(LoggerConfigSchema).optional(),
  })
  .strict();

/** Configuration as written in the file */
export type LoggingConfigInput = z.input<typeof LoggingConfigSchema>;
/** Configuration after validation, levels normalized to numbers */
export type LoggingConfig = z.output<typeof LoggingConfigSchema>;
export type LoggerConfig = z.output<typeof LoggerConfigSchema>;

/**
 * Validate a configuration object.
 * @throws {ConfigError} of type "invalid-config"
 */
export function parseLoggingConfig(value: unknown, source: string = "logging config"): LoggingConfig {
  const result = LoggingConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError("invalid-config", formatZodError(result.error, `Invalid ${source}:`));
  }
  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load logging config from a JSONC file synchronously.
 * @returns undefined when the file does not exist
 * @throws {ConfigError} when the file cannot be read, parsed or validated
 */
export function loadLoggingConfigSync(path: string = DEFAULT_CONFIG_PATH): LoggingConfig | undefined {
  const fullPath = resolve(path);

  let text: string;
  try {
    text = readFileSync(fullPath, "utf8");
  }
  catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new ConfigError("read-failed", `Cannot read ${fullPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const errors: ParseError[] = [];
  const value: unknown = parse(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const details = errors.map((error) => `${printParseErrorCode(error.error)} at offset ${error.offset}`).join(", ");
    throw new ConfigError("parse-error", `Invalid JSONC in ${fullPath}: ${details}`);
  }

  return parseLoggingConfig(value, fullPath);
}

/**
 * Create the configured loggers and handlers on `registry`.
 * Joins are resolved after every configured logger exists.
 */
export function applyLoggingConfig(registry: LoggerRegistry, config: LoggingConfig): void {
  if (config.runName) {
    registry.setRunName(config.runName);
  }

  const loggers = Object.entries(config.loggers ?? {});

  for (const [name, loggerConfig] of loggers) {
    const logger = registry.getOrCreate(name, { baseDirectory: loggerConfig.baseDirectory });

    const consoleConfig = loggerConfig.console;
    if (consoleConfig && consoleConfig.enabled !== false) {
      logger.addConsoleHandler(consoleConfig.name ?? "console", {
        level: consoleConfig.level,
        format: consoleConfig.format ? resolveFormat(consoleConfig.format) : undefined,
      });
    }

    for (const [handlerName, fileConfig] of Object.entries(loggerConfig.files ?? {})) {
      if (fileConfig.enabled === false) continue;
      logger.addFileHandler(handlerName, {
        level: fileConfig.level,
        format: fileConfig.format ? resolveFormat(fileConfig.format) : undefined,
      });
    }
  }

  for (const [name, loggerConfig] of loggers) {
    for (const { logger, handler } of loggerConfig.join ?? []) {
      registry.get(name).joinHandler(logger, handler);
    }
  }
}

/**
 * Build a registry from a validated config.
 * The run name is taken from the config unless `options` names one.
 */
export function createRegistry(config?: LoggingConfig, options: RegistryOptions = {}): LoggerRegistry {
  const registry = new LoggerRegistry({
    ...options,
    baseDirectory: options.baseDirectory ?? config?.baseDirectory,
  });
  if (config) {
    applyLoggingConfig(registry, options.runName ? { ...config, runName: undefined } : config);
  }
  return registry;
}
