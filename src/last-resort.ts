/**
 * Where output goes when no handler can take it: records of a logger that
 * has no handlers, and failures reported by the handlers themselves.
 */

import { type LogLevel, LogLevels } from "./levels.ts";

export type LastResortFn = (level: LogLevel, message: string) => void;

const consoleLastResort: LastResortFn = (level, message) => {
  if (level >= LogLevels.ERROR) {
    console.error(`[runlog] ${message}`);
  }
  else {
    console.warn(`[runlog] ${message}`);
  }
};

let sink: LastResortFn = consoleLastResort;

/** Redirect last-resort output; without an argument the console is restored */
export function setLastResortFn(fn: LastResortFn = consoleLastResort): void {
  sink = fn;
}

/** Pass a record on to the last-resort sink. Anything below WARNING is dropped. */
export function lastResort(level: LogLevel, message: string): void {
  if (level < LogLevels.WARNING) return;
  sink(level, message);
}
