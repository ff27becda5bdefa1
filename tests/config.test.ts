/**
 * Tests for configuration loading and the default registry
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import {
  ConfigError,
  createRegistry,
  getLogger,
  getLoggerNames,
  getRegistry,
  loadLoggingConfigSync,
  type LoggerRegistry,
  LogFormats,
  LogLevels,
  parseLoggingConfig,
  resetRegistry,
} from "../mod.ts";
import { createTempDir, DATE, fixedClock, removeDir, RUN_ID } from "./helpers.ts";

let directory: string;
let registries: LoggerRegistry[];

beforeEach(() => {
  directory = createTempDir();
  registries = [];
});

afterEach(() => {
  for (const registry of registries) {
    registry.reset();
  }
  removeDir(directory);
});

function writeConfig(text: string): string {
  const path = join(directory, "logging.jsonc");
  writeFileSync(path, text);
  return path;
}

test("missing config file yields undefined", () => {
  expect(loadLoggingConfigSync(join(directory, "absent.jsonc"))).toBeUndefined();
});

test("JSONC with comments and trailing commas is parsed and normalized", () => {
  const path = writeConfig(`{
    // nightly batch
    "runName": "nightly",
    "loggers": {
      "svc": {
        "console": { "level": "warn", "format": "loggerName" },
        "files": { "main": { "level": 10, }, },
      },
    },
  }`);

  expect(loadLoggingConfigSync(path)).toEqual({
    runName: "nightly",
    loggers: {
      svc: {
        console: { level: LogLevels.WARNING, format: "loggerName" },
        files: { main: { level: LogLevels.DEBUG } },
      },
    },
  });
});

test("syntax errors raise a parse-error ConfigError", () => {
  const path = writeConfig(`{ "runName": }`);

  expect(() => loadLoggingConfigSync(path)).toThrow(ConfigError);
  try {
    loadLoggingConfigSync(path);
  }
  catch (error) {
    expect(error instanceof ConfigError && error.type).toBe("parse-error");
  }
});

test("unknown levels raise an invalid-config ConfigError naming the field", () => {
  const config = { loggers: { svc: { console: { level: "LOUD" } } } };

  expect(() => parseLoggingConfig(config)).toThrow("loggers.svc.console.level: Unknown log level");
  try {
    parseLoggingConfig(config);
  }
  catch (error) {
    expect(error instanceof ConfigError && error.type).toBe("invalid-config");
  }
});

test("unknown keys are rejected", () => {
  expect(() => parseLoggingConfig({ logging: {} })).toThrow(ConfigError);
});

test("createRegistry builds loggers, handlers and joins", () => {
  const config = parseLoggingConfig({
    baseDirectory: join(directory, "logs"),
    runName: "smoke",
    loggers: {
      api: {
        files: { main: { level: "DEBUG", format: "funcName" } },
      },
      db: {
        console: { enabled: false },
        files: { queries: {}, disabled: { enabled: false } },
        join: [{ logger: "api", handler: "main" }],
      },
    },
  });
  const registry = createRegistry(config, { now: fixedClock });
  registries.push(registry);

  const runId = `${RUN_ID}_smoke`;
  const api = registry.get("api");
  const db = registry.get("db");
  const main = api.getHandler("main");

  expect(registry.runId).toBe(runId);
  expect(registry.names()).toEqual(["api", "db"]);
  expect(main?.level).toBe(LogLevels.DEBUG);
  expect(main?.format).toBe(LogFormats.FUNC_NAME);
  expect(main?.filename).toBe(join(directory, "logs", DATE, runId, `${runId}_main.log`));
  expect(db.handlerNames()).toEqual(["queries", "main"]);
  expect(db.getHandler("main")).toBe(main);
  expect(db.getHandler("queries")?.level).toBe(LogLevels.INFO);
});

test("createRegistry names the console handler from config", () => {
  const config = parseLoggingConfig({
    baseDirectory: join(directory, "logs"),
    loggers: { api: { console: { name: "stderr", level: "ERROR" } } },
  });
  const registry = createRegistry(config, { now: fixedClock });
  registries.push(registry);

  const handler = registry.get("api").getHandler("stderr");
  expect(handler?.kind).toBe("console");
  expect(handler?.level).toBe(LogLevels.ERROR);
});

test("a run name passed as option wins over the config", () => {
  const config = parseLoggingConfig({ baseDirectory: join(directory, "logs"), runName: "from-config" });
  const registry = createRegistry(config, { now: fixedClock, runName: "from-option" });
  registries.push(registry);

  expect(registry.runId).toBe(`${RUN_ID}_from-option`);
});

test("joins to unconfigured loggers fail", () => {
  const config = parseLoggingConfig({
    baseDirectory: join(directory, "logs"),
    loggers: { db: { join: [{ logger: "api", handler: "main" }] } },
  });

  expect(() => createRegistry(config, { now: fixedClock })).toThrow("Logger instance with name 'api' does not exist.");
});

test("default registry loads ./configs/logging.jsonc from the working directory", () => {
  const cwd = process.cwd();
  mkdirSync(join(directory, "configs"));
  writeFileSync(
    join(directory, "configs", "logging.jsonc"),
    `{ "baseDirectory": "logs", "loggers": { "app": { "console": {} } } }`,
  );

  process.chdir(directory);
  try {
    const registry = getRegistry();
    expect(getRegistry()).toBe(registry);
    expect(registry.baseDirectory).toBe(join(process.cwd(), "logs"));
    expect(getLoggerNames()).toEqual(["app"]);
    expect(getLogger("app").handlerNames()).toEqual(["console"]);
    expect(getLogger("worker")).toBe(registry.get("worker"));

    resetRegistry();
    expect(getRegistry()).not.toBe(registry);
  }
  finally {
    resetRegistry();
    process.chdir(cwd);
  }
});
