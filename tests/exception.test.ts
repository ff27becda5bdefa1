/**
 * Tests for the exception() logging method
 */

import { afterEach, beforeEach, expect, test } from "vitest";
import { type Logger, LoggerRegistry } from "../mod.ts";
import { createTempDir, fixedClock, flush, MemoryStream, removeDir, STAMP } from "./helpers.ts";

let baseDirectory: string;
let registry: LoggerRegistry;
let logger: Logger;
let stream: MemoryStream;

beforeEach(() => {
  baseDirectory = createTempDir();
  registry = new LoggerRegistry({ baseDirectory, now: fixedClock });
  logger = registry.getOrCreate("jobs");
  stream = new MemoryStream();
  logger.addConsoleHandler("console", { stream });
});

afterEach(() => {
  registry.reset();
  removeDir(baseDirectory);
});

test("exception() logs an Error's stack at ERROR", async () => {
  logger.exception(new Error("Connection failed"));
  await flush();

  expect(stream.lines).toHaveLength(1);
  expect(stream.lines[0].startsWith(`${STAMP} - ERROR - Error: Connection failed\n    at `)).toBe(true);
});

test("exception() falls back to name and message without a stack", async () => {
  const error = new TypeError("bad input");
  error.stack = undefined;
  logger.exception(error);
  await flush();

  expect(stream.lines).toEqual([`${STAMP} - ERROR - TypeError: bad input`]);
});

test("exception() handles non-Error values", async () => {
  logger.exception("string error");
  logger.exception(42);
  logger.exception(null);
  logger.exception(undefined);
  await flush();

  expect(stream.lines).toEqual([
    `${STAMP} - ERROR - Non-Error exception: string error`,
    `${STAMP} - ERROR - Non-Error exception: 42`,
    `${STAMP} - ERROR - Non-Error exception: null`,
    `${STAMP} - ERROR - Non-Error exception: undefined`,
  ]);
});

test("exception() is dropped when every handler is above ERROR", async () => {
  logger.setHandlerLevel("console", "CRITICAL");
  logger.exception(new Error("quiet"));
  await flush();

  expect(stream.lines).toEqual([]);
});
