/**
 * Source location of a logging call, read from V8 call sites
 */

import { basename, extname } from "node:path";

export interface SourceLocation {
  module: string;
  functionName: string;
  line: number;
}

const UNKNOWN_LOCATION: SourceLocation = { module: "unknown", functionName: "<module>", line: 0 };

function moduleName(fileName: string | null | undefined): string {
  if (!fileName) return UNKNOWN_LOCATION.module;
  const path = fileName.replace(/^file:\/\//, "").replace(/\?.*$/, "");
  const base = basename(path);
  return base.slice(0, base.length - extname(base).length);
}

/**
 * Locate the code that called into the logger.
 * Frames up to and including `boundary` are dropped; `depth` counts the
 * remaining frames that still belong to the logger itself.
 */
export function captureCaller(boundary: Function, depth: number = 1): SourceLocation {
  const original = Error.prepareStackTrace;
  let frames: NodeJS.CallSite[] = [];
  const holder: { stack?: string } = {};

  Error.prepareStackTrace = (_error, callSites) => {
    frames = callSites;
    return "";
  };
  try {
    Error.captureStackTrace(holder, boundary);
    // The stack is built on first access
    void holder.stack;
  }
  finally {
    Error.prepareStackTrace = original;
  }

  const frame = frames[depth];
  if (!frame) return UNKNOWN_LOCATION;

  return {
    module: moduleName(frame.getFileName()),
    functionName: frame.getFunctionName() ?? "<module>",
    line: frame.getLineNumber() ?? 0,
  };
}

export function isSourceLocation(value: unknown): value is SourceLocation {
  if (typeof value !== "object" || value === null) return false;
  return "module" in value && typeof value.module === "string" &&
    "functionName" in value && typeof value.functionName === "string" &&
    "line" in value && typeof value.line === "number";
}
