/**
 * Process-wide registry for callers that do not pass one around.
 * Built on first use from ./configs/logging.jsonc when that file exists.
 */

import { createRegistry, loadLoggingConfigSync } from "./config.ts";
import type { Logger } from "./logger.ts";
import type { LoggerRegistry } from "./registry.ts";

let defaultRegistry: LoggerRegistry | undefined;

export function getRegistry(): LoggerRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createRegistry(loadLoggingConfigSync());
  }
  return defaultRegistry;
}

/** Get or create a logger on the default registry */
export function getLogger(name: string): Logger {
  return getRegistry().getOrCreate(name);
}

/**
 * Get list of all logger names on the default registry
 */
export function getLoggerNames(): string[] {
  return getRegistry().names();
}

/** Tear down the default registry; the next call builds a fresh one */
export function resetRegistry(): void {
  defaultRegistry?.reset();
  defaultRegistry = undefined;
}
