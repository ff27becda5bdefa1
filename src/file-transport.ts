/**
 * winston transport appending formatted lines to a file.
 *
 * Every record is written with a synchronous `writeSync`, so a line is on
 * disk as soon as the transport has accepted it.
 */

import { closeSync, openSync, writeSync } from "node:fs";
import type { TransformableInfo } from "logform";
import { MESSAGE } from "triple-beam";
import Transport from "winston-transport";

export interface FileTransportOptions extends Transport.TransportStreamOptions {
  filename: string;
}

export class FileTransport extends Transport {
  readonly filename: string;
  private fd: number | undefined;

  constructor(options: FileTransportOptions) {
    super(options);
    this.filename = options.filename;
    this.fd = openSync(options.filename, "a");
  }

  get released(): boolean {
    return this.fd === undefined;
  }

  log(info: TransformableInfo, next: () => void): void {
    const line = info[MESSAGE];
    if (this.fd !== undefined && typeof line === "string") {
      writeSync(this.fd, `${line}\n`, null, "utf8");
    }
    next();
  }

  /**
   * Close the file descriptor. Records arriving afterwards are dropped.
   * winston-transport calls `close()` on every unpipe, so this must not be it.
   */
  release(): void {
    if (this.fd === undefined) return;
    closeSync(this.fd);
    this.fd = undefined;
  }
}
