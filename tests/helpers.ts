/**
 * Shared fixtures: a fixed clock, temporary log roots and an in-memory stream
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import type { Handler } from "../mod.ts";

/** 2026-10-19 08:05:03.042 local time */
export const fixedClock = (): Date => new Date(2026, 9, 19, 8, 5, 3, 42);
export const DATE = "2026-10-19";
export const RUN_ID = "2026-10-19_080503";
export const STAMP = "2026-10-19 08:05:03,042";

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), "runlog-"));
}

export function removeDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

/** Let pending stream callbacks run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function readLines(path: string): string[] {
  const content = readFileSync(path, "utf8");
  return content === "" ? [] : content.replace(/\n$/, "").split("\n");
}

export function handlerFile(handler: Handler): string {
  if (handler.filename === undefined) {
    throw new Error(`Handler ${handler.name} does not write to a file`);
  }
  return handler.filename;
}

/**
 * Writable that keeps every record it receives, without the trailing newline
 */
export class MemoryStream extends Writable {
  lines: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.lines.push(chunk.toString().replace(/\n$/, ""));
    callback();
  }
}
