/**
 * Registry of named loggers sharing one run identifier
 */

import { join, resolve } from "node:path";
import { LoggerNotFoundError } from "./errors.ts";
import { Logger } from "./logger.ts";
import { composeRunId } from "./stamps.ts";
import type { LoggerOptions, RegistryOptions } from "./types.ts";

export const DEFAULT_BASE_DIRECTORY = join("data", "logs");

export class LoggerRegistry {
  readonly baseDirectory: string;
  readonly now: () => Date;

  private readonly instances = new Map<string, Logger>();
  private currentRunId: string | undefined;

  constructor(options: RegistryOptions = {}) {
    this.baseDirectory = resolve(options.baseDirectory ?? DEFAULT_BASE_DIRECTORY);
    this.now = options.now ?? (() => new Date());
    if (options.runName) {
      this.setRunName(options.runName);
    }
  }

  /** Identifier of the current run, generated on first use */
  get runId(): string {
    if (this.currentRunId === undefined) {
      this.currentRunId = composeRunId(this.now());
    }
    return this.currentRunId;
  }

  /**
   * Replace the run identifier with a fresh stamp followed by `runName`.
   * File handlers added from now on use it; open ones keep their paths.
   */
  setRunName(runName: string): void {
    this.currentRunId = composeRunId(this.now(), runName);
  }

  /**
   * Return the logger registered under `name`, creating it on first request.
   * `options` only apply when the logger is created here.
   */
  getOrCreate(name: string, options: LoggerOptions = {}): Logger {
    const existing = this.instances.get(name);
    if (existing) return existing;

    // The first logger fixes the run id for everything after it
    void this.runId;

    const baseDirectory = options.baseDirectory ? resolve(options.baseDirectory) : this.baseDirectory;
    const logger = new Logger(name, this, baseDirectory);
    this.instances.set(name, logger);
    return logger;
  }

  /** @throws {LoggerNotFoundError} when no logger has that name */
  get(name: string): Logger {
    const logger = this.instances.get(name);
    if (!logger) {
      throw new LoggerNotFoundError(name);
    }
    return logger;
  }

  has(name: string): boolean {
    return this.instances.has(name);
  }

  names(): string[] {
    return Array.from(this.instances.keys());
  }

  /** Detach all handlers of a logger and forget it. No-op for unknown names. */
  delete(name: string): void {
    const logger = this.instances.get(name);
    if (!logger) return;

    logger.close();
    this.instances.delete(name);
  }

  /** Delete every logger and drop the run id */
  reset(): void {
    for (const name of this.names()) {
      this.delete(name);
    }
    this.currentRunId = undefined;
  }
}
