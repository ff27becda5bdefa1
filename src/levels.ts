/**
 * Severity levels shared by loggers and handlers
 */

export const LogLevels = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  WARN: 30,
  ERROR: 40,
  CRITICAL: 50,
} as const;

export type LevelName = keyof typeof LogLevels;
export type LogLevel = (typeof LogLevels)[LevelName];

/** A level given either as its number or its name */
export type LevelInput = LogLevel | LevelName;

/** winston level keys, most severe first */
export type WinstonLevel = "critical" | "error" | "warning" | "info" | "debug";

/** Level table handed to winston (lower number is more severe there) */
export const winstonLevels: Record<WinstonLevel, number> = {
  critical: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4,
};

const levelByValue = new Map<number, WinstonLevel>([
  [LogLevels.DEBUG, "debug"],
  [LogLevels.INFO, "info"],
  [LogLevels.WARNING, "warning"],
  [LogLevels.ERROR, "error"],
  [LogLevels.CRITICAL, "critical"],
]);

function isLevelName(value: string): value is LevelName {
  return Object.hasOwn(LogLevels, value);
}

/**
 * Normalize a level number or name to its numeric value.
 * @throws {RangeError} when the level is not one of LogLevels
 */
export function toLevelValue(level: LevelInput | number | string): LogLevel {
  if (typeof level === "string") {
    const upper = level.toUpperCase();
    if (!isLevelName(upper)) {
      throw new RangeError(`Unknown log level: ${level}`);
    }
    return LogLevels[upper];
  }

  for (const value of Object.values(LogLevels)) {
    if (value === level) return value;
  }
  throw new RangeError(`Unknown log level: ${level}`);
}

/** winston level key for a level number or name */
export function toWinstonLevel(level: LevelInput | number | string): WinstonLevel {
  const winstonLevel = levelByValue.get(toLevelValue(level));
  if (!winstonLevel) {
    throw new RangeError(`Unknown log level: ${level}`);
  }
  return winstonLevel;
}

/** Whether a number or a (case-insensitive) name is one of LogLevels */
export function isKnownLevel(level: number | string): boolean {
  if (typeof level === "string") return isLevelName(level.toUpperCase());
  return Object.values(LogLevels).some((value) => value === level);
}
