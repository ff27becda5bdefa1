/**
 * Option types for registries, loggers and handlers
 */

import type { Writable } from "node:stream";
import type { LevelInput } from "./levels.ts";

export interface RegistryOptions {
  baseDirectory?: string; // Defaults to ./data/logs
  runName?: string;
  now?: () => Date; // Clock for run ids, date directories and record timestamps
}

export interface LoggerOptions {
  baseDirectory?: string; // Defaults to the registry's base directory
}

export interface HandlerOptions {
  level?: LevelInput; // Defaults to INFO
  format?: string; // Template, defaults to LogFormats.BASIC
}

export interface ConsoleHandlerOptions extends HandlerOptions {
  stream?: Writable; // Defaults to process.stderr
}

export type FileHandlerOptions = HandlerOptions;
