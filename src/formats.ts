/**
 * Format templates for handler output.
 *
 * A template is plain text with `{field}` placeholders, rendered once per
 * record by a winston `printf` format attached to the handler's transport.
 */

import { format } from "winston";
import type { Format, TransformableInfo } from "logform";
import { isSourceLocation } from "./caller.ts";

const TIMESTAMP = "{timestamp}";
const LOGGER_NAME = "{name}";
const LOG_LEVEL = "{level}";
const MODULE = "{module}";
const FUNC_NAME = "{function}";
const LINE_NO = "{line}";
const MESSAGE = "{message}";

/** Placeholders, alone or bracketed, for composing custom templates */
export const LogFields = {
  TIMESTAMP,
  LOGGER_NAME,
  LOGGER_NAME_BRACKETS: `[${LOGGER_NAME}]`,
  LOG_LEVEL,
  LOG_LEVEL_BRACKETS: `[${LOG_LEVEL}]`,
  MODULE,
  MODULE_BRACKETS: `[${MODULE}]`,
  FUNC_NAME,
  FUNC_NAME_BRACKETS: `[${FUNC_NAME}]`,
  LINE_NO,
  LINE_NO_BRACKETS: `[${LINE_NO}]`,
  MESSAGE,
} as const;

export const LogFormats = {
  BASIC: `${TIMESTAMP} - ${LOG_LEVEL} - ${MESSAGE}`,
  LOGGER_NAME: `${TIMESTAMP} - ${LOGGER_NAME} - ${LOG_LEVEL} - ${MESSAGE}`,
  LOGGER_NAME_BRACKETS: `${TIMESTAMP} - [${LOGGER_NAME}][${LOG_LEVEL}]: ${MESSAGE}`,
  FUNC_NAME: `${TIMESTAMP} [${LOG_LEVEL}][${FUNC_NAME}]: ${MESSAGE}`,
  MODULE_FUNC_NAME: `${TIMESTAMP} [${LOG_LEVEL}][${MODULE}][${FUNC_NAME}]: ${MESSAGE}`,
} as const;

/** Preset names accepted in configuration files */
export const formatPresets: Record<string, string> = {
  basic: LogFormats.BASIC,
  loggerName: LogFormats.LOGGER_NAME,
  loggerNameBrackets: LogFormats.LOGGER_NAME_BRACKETS,
  funcName: LogFormats.FUNC_NAME,
  moduleFuncName: LogFormats.MODULE_FUNC_NAME,
};

/** A preset name resolves to its template; anything else is taken as a template */
export function resolveFormat(formatOrPreset: string): string {
  return Object.hasOwn(formatPresets, formatOrPreset) ? formatPresets[formatOrPreset] : formatOrPreset;
}

const PLACEHOLDER = /\{(\w+)\}/g;
const SOURCE_FIELDS = new Set(["module", "function", "line"]);

/** Whether rendering the template needs the caller's source location */
export function usesSourceLocation(template: string): boolean {
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (SOURCE_FIELDS.has(match[1])) return true;
  }
  return false;
}

/** Fill placeholders from `fields`; unknown placeholders stay as written */
export function renderTemplate(template: string, fields: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (placeholder, field: string) => fields[field] ?? placeholder);
}

function text(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}

/** Placeholder values for one winston record */
export function recordFields(info: TransformableInfo): Record<string, string> {
  const fields: Record<string, string> = {
    timestamp: text(info.timestamp),
    name: text(info.loggerName),
    level: info.level.toUpperCase(),
    message: text(info.message),
  };

  const source = info.source;
  if (isSourceLocation(source)) {
    fields.module = source.module;
    fields.function = source.functionName;
    fields.line = String(source.line);
  }

  return fields;
}

/** winston format rendering a record through the template */
export function createFormatter(template: string): Format {
  return format.printf((info) => renderTemplate(template, recordFields(info)));
}
