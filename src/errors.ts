import { z, type ZodError } from "zod";

export class RunlogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** A logger or handler that must exist does not */
export class NotFoundError extends RunlogError {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.key = key;
  }
}

export class LoggerNotFoundError extends NotFoundError {
  constructor(loggerName: string) {
    super(loggerName, `Logger instance with name '${loggerName}' does not exist.`);
  }
}

export class HandlerNotFoundError extends NotFoundError {
  readonly loggerName: string;

  constructor(loggerName: string, handlerName: string) {
    super(handlerName, `Handler '${handlerName}' does not exist in logger '${loggerName}'.`);
    this.loggerName = loggerName;
  }
}

const ConfigErrorTypeSchema = z.enum(["invalid-config", "parse-error", "read-failed"]);
export type ConfigErrorType = z.infer<typeof ConfigErrorTypeSchema>;

export class ConfigError extends RunlogError {
  type: ConfigErrorType;

  constructor(type: ConfigErrorType, message: string) {
    super(message);
    this.type = ConfigErrorTypeSchema.parse(type);
  }
}

export const formatZodError = <T>(error: ZodError<T>, label: string): string => {
  const issues = error.errors
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("\n");

  return `${label}\n${issues}`;
};
