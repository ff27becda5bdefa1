/**
 * Handler records: one output sink with its own level and format.
 * A handler may be attached to several loggers at once; the sink is released
 * when the last of them lets go.
 */

import type { Writable } from "node:stream";
import { transports, type Logger as WinstonLogger } from "winston";
import type TransportStream from "winston-transport";
import { FileTransport } from "./file-transport.ts";
import { createFormatter, usesSourceLocation } from "./formats.ts";
import { lastResort } from "./last-resort.ts";
import { type LevelInput, type LogLevel, LogLevels, toLevelValue, toWinstonLevel } from "./levels.ts";

export type HandlerKind = "console" | "file";

interface HandlerInit {
  name: string;
  kind: HandlerKind;
  level: LevelInput;
  format: string;
  transport: TransportStream;
  filename?: string;
}

export class Handler {
  readonly name: string;
  readonly kind: HandlerKind;
  readonly format: string;
  readonly filename: string | undefined;
  readonly needsSource: boolean;
  readonly transport: TransportStream;

  private levelValue: LogLevel;
  private readonly owners = new Set<WinstonLogger>();

  private constructor(init: HandlerInit) {
    this.name = init.name;
    this.kind = init.kind;
    this.format = init.format;
    this.filename = init.filename;
    this.transport = init.transport;
    this.needsSource = usesSourceLocation(init.format);
    this.levelValue = toLevelValue(init.level);
    this.transport.level = toWinstonLevel(this.levelValue);
    // Every logger holding the handler pipes into the transport
    this.transport.setMaxListeners(0);
  }

  /** Handler writing to a stream, stderr unless another is given */
  static console(name: string, level: LevelInput, format: string, stream: Writable = process.stderr): Handler {
    const transport = new transports.Stream({ stream, format: createFormatter(format) });
    stream.on("error", (error: Error) => {
      lastResort(LogLevels.ERROR, `Handler ${name} failed: ${error.message}`);
    });
    return new Handler({ name, kind: "console", level, format, transport });
  }

  /** Handler appending to `filename` (UTF-8), which is opened right away */
  static file(name: string, level: LevelInput, format: string, filename: string): Handler {
    const transport = new FileTransport({ filename, format: createFormatter(format) });
    return new Handler({ name, kind: "file", level, format, transport, filename });
  }

  get level(): LogLevel {
    return this.levelValue;
  }

  setLevel(level: LevelInput): void {
    this.levelValue = toLevelValue(level);
    this.transport.level = toWinstonLevel(this.levelValue);
  }

  accepts(level: LogLevel): boolean {
    return this.levelValue <= level;
  }

  /** Number of loggers this handler is attached to */
  get ownerCount(): number {
    return this.owners.size;
  }

  get released(): boolean {
    return this.transport instanceof FileTransport && this.transport.released;
  }

  attach(owner: WinstonLogger): void {
    if (this.owners.has(owner)) return;
    owner.add(this.transport);
    this.owners.add(owner);
  }

  /** Detach from one logger; the sink is released once no logger holds it */
  detach(owner: WinstonLogger): void {
    if (!this.owners.delete(owner)) return;
    owner.remove(this.transport);
    if (this.owners.size === 0) {
      this.release();
    }
  }

  private release(): void {
    if (this.transport instanceof FileTransport) {
      this.transport.release();
    }
  }
}
