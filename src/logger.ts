/**
 * Named logger with its own set of named handlers.
 *
 * Records go through a winston logger owned by this instance; every handler
 * is one winston transport and filters by its own level.
 */

import { existsSync, mkdirSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { createLogger, format, type Logger as WinstonLogger } from "winston";
import { captureCaller } from "./caller.ts";
import { HandlerNotFoundError } from "./errors.ts";
import { LogFormats } from "./formats.ts";
import { Handler } from "./handler.ts";
import { lastResort } from "./last-resort.ts";
import { type LevelInput, type LogLevel, LogLevels, toWinstonLevel, winstonLevels } from "./levels.ts";
import type { LoggerRegistry } from "./registry.ts";
import { createDatestamp, formatRecordTime } from "./stamps.ts";
import type { ConsoleHandlerOptions, FileHandlerOptions } from "./types.ts";

const splat = format.splat();

/** Interpolate printf-style arguments the way the winston pipeline does */
function interpolate(message: string, args: unknown[]): string {
  if (args.length === 0) return message;
  const info = splat.transform({ level: "info", message, splat: [...args] });
  return typeof info === "object" && typeof info.message === "string" ? info.message : message;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Format an error for logging */
function formatError(error: unknown): string {
  if (error instanceof Error) return error.stack || `${error.name}: ${error.message}`;
  return `Non-Error exception: ${String(error)}`;
}

export class Logger {
  static readonly DEBUG = LogLevels.DEBUG;
  static readonly INFO = LogLevels.INFO;
  static readonly WARNING = LogLevels.WARNING;
  static readonly WARN = LogLevels.WARN;
  static readonly ERROR = LogLevels.ERROR;
  static readonly CRITICAL = LogLevels.CRITICAL;

  readonly name: string;
  readonly baseDirectory: string;
  /** Minimum level a record needs before any handler sees it */
  readonly level: LogLevel = LogLevels.DEBUG;

  private readonly registry: LoggerRegistry;
  private readonly handlers = new Map<string, Handler>();
  private readonly winston: WinstonLogger;
  private currentDateDirectory: string | undefined;
  private currentRunDirectory: string | undefined;

  /**
   * Use LoggerRegistry.getOrCreate; a logger built directly is not registered
   * and cannot be the source of joinHandler.
   */
  constructor(name: string, registry: LoggerRegistry, baseDirectory: string) {
    this.name = name;
    this.registry = registry;
    this.baseDirectory = baseDirectory;
    mkdirSync(baseDirectory, { recursive: true });

    this.winston = createLogger({
      levels: winstonLevels,
      level: toWinstonLevel(this.level),
      exitOnError: false,
      format: format.combine(
        format.timestamp({ format: () => formatRecordTime(registry.now()) }),
        format.splat(),
      ),
    });
    // Prime the readable side so records reach transports synchronously,
    // starting with the first one
    this.winston.read(0);
    // One pipe per handler
    this.winston.setMaxListeners(0);
    this.winston.on("error", (error: unknown) => {
      lastResort(LogLevels.ERROR, `${this.name}: handler failed: ${describeError(error)}`);
    });
  }

  get runId(): string {
    return this.registry.runId;
  }

  /** Today's log directory, once a file handler has created it */
  get dateDirectory(): string | undefined {
    return this.currentDateDirectory;
  }

  /** This run's log directory, once a file handler has created it */
  get runDirectory(): string | undefined {
    return this.currentRunDirectory;
  }

  handlerNames(): string[] {
    return Array.from(this.handlers.keys());
  }

  hasHandler(handlerName: string): boolean {
    return this.handlers.has(handlerName);
  }

  getHandler(handlerName: string): Handler | undefined {
    return this.handlers.get(handlerName);
  }

  /**
   * Add a handler writing to a stream (stderr by default).
   * A name already in use is left untouched and logged as a warning.
   * @returns the handler registered under `handlerName`
   */
  addConsoleHandler(handlerName: string, options: ConsoleHandlerOptions = {}): Handler {
    const existing = this.handlers.get(handlerName);
    if (existing) {
      this.warning(`Handler with name ${handlerName} already exists in logger ${this.name}`);
      return existing;
    }

    const handler = Handler.console(
      handlerName,
      options.level ?? LogLevels.INFO,
      options.format ?? LogFormats.BASIC,
      options.stream,
    );
    this.register(handler);
    return handler;
  }

  /**
   * Add a handler appending to `<base>/<date>/<runId>/<runId>_<handlerName>.log`.
   * A name already in use is left untouched and logged as a warning.
   * @returns the handler registered under `handlerName`
   */
  addFileHandler(handlerName: string = "main", options: FileHandlerOptions = {}): Handler {
    const existing = this.handlers.get(handlerName);
    if (existing) {
      this.warning(`Handler with name ${handlerName} already exists in logger ${this.name}`);
      return existing;
    }

    const runId = this.runId;
    const filePath = join(this.createRunDirectory(runId), `${runId}_${handlerName}.log`);
    const handler = Handler.file(
      handlerName,
      options.level ?? LogLevels.INFO,
      options.format ?? LogFormats.BASIC,
      filePath,
    );
    this.register(handler);
    this.debug(`File handler ${handlerName} added to logger ${this.name} with path: ${filePath}`);
    return handler;
  }

  /**
   * Attach another logger's handler to this one under the same name.
   * Both loggers then write into the same sink.
   * @throws {LoggerNotFoundError} when `loggerName` is not registered
   * @throws {HandlerNotFoundError} when that logger has no such handler
   */
  joinHandler(loggerName: string, handlerName: string): void {
    const source = this.registry.get(loggerName);
    const handler = source.getHandler(handlerName);
    if (!handler) {
      throw new HandlerNotFoundError(loggerName, handlerName);
    }

    if (this.handlers.has(handlerName)) {
      this.warning(`Handler with name ${handlerName} already exists in logger ${this.name}`);
      return;
    }
    this.register(handler);
  }

  removeHandler(handlerName: string): void {
    const handler = this.handlers.get(handlerName);
    if (!handler) {
      this.warning(`removeHandler: handler ${handlerName} does not exist in logger ${this.name}`);
      return;
    }

    this.handlers.delete(handlerName);
    handler.detach(this.winston);
  }

  setHandlerLevel(handlerName: string, level: LevelInput): void {
    const handler = this.handlers.get(handlerName);
    if (!handler) {
      this.warning(`setHandlerLevel: handler ${handlerName} does not exist in logger ${this.name}`);
      return;
    }
    handler.setLevel(level);
  }

  /** Delete today's log directory with everything in it */
  clearTodaysLogs(): void {
    const dateDirectory = join(this.baseDirectory, createDatestamp(this.registry.now()));
    rmSync(dateDirectory, { recursive: true, force: true });
  }

  /** Delete every file and directory under the base directory */
  clearAllLogs(): void {
    if (!existsSync(this.baseDirectory)) return;
    for (const entry of readdirSync(this.baseDirectory)) {
      rmSync(join(this.baseDirectory, entry), { recursive: true, force: true });
    }
  }

  /**
   * Detach every handler and empty the handler map.
   * Called by LoggerRegistry.delete.
   */
  close(): void {
    for (const handler of this.handlers.values()) {
      handler.detach(this.winston);
    }
    this.handlers.clear();
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevels.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevels.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevels.WARNING, message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.emit(LogLevels.WARNING, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit(LogLevels.ERROR, message, args);
  }

  critical(message: string, ...args: unknown[]): void {
    this.emit(LogLevels.CRITICAL, message, args);
  }

  /** Log an error's stack trace at ERROR */
  exception(error: unknown): void {
    this.emit(LogLevels.ERROR, formatError(error), []);
  }

  private register(handler: Handler): void {
    this.handlers.set(handler.name, handler);
    handler.attach(this.winston);
  }

  private createRunDirectory(runId: string): string {
    this.currentDateDirectory = join(this.baseDirectory, createDatestamp(this.registry.now()));
    this.currentRunDirectory = join(this.currentDateDirectory, runId);
    mkdirSync(this.currentRunDirectory, { recursive: true });
    return this.currentRunDirectory;
  }

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    if (this.level > level) return;

    if (this.handlers.size === 0) {
      lastResort(level, `${this.name}: ${interpolate(message, args)}`);
      return;
    }

    // Skip the record when no handler will accept this level
    const accepting = Array.from(this.handlers.values()).filter((handler) => handler.accepts(level));
    if (accepting.length === 0) return;

    const source = accepting.some((handler) => handler.needsSource) ? captureCaller(this.emit) : undefined;
    this.winston.log({
      level: toWinstonLevel(level),
      message,
      splat: args,
      loggerName: this.name,
      source,
    });
  }
}
