import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from "node:fs";
import { dirname } from "node:path";
import type { LogEntry } from "../types.js";

export interface LogSink {
  write(entry: LogEntry): void;
  flush?(): void;
}

export class ConsoleSink implements LogSink {
  write(entry: LogEntry) {
    const line = JSON.stringify(entry);
    // stderr for warn/error so stdout stays parseable
    const write = entry.level === "error" || entry.level === "warn" ? console.error : console.log;
    write(line);
  }
}

export class RingBufferSink implements LogSink {
  private buf: LogEntry[] = [];
  constructor(private capacity: number) {
    if (capacity <= 0) throw new Error("RingBufferSink.capacity must be > 0");
  }
  write(entry: LogEntry) {
    if (this.buf.length === this.capacity) this.buf.shift();
    this.buf.push(entry);
  }
  entries() {
    return this.buf.slice();
  }
  messages() {
    return this.buf.map(e => e.msg);
  }
  flush() { /* no-op */ }
}

export type FileSinkOptions = {
  maxBytes?: number;
  backupCount?: number;
};

/**
 * Appends JSON lines to a file, rotating `app.log` → `app.log.1` … `app.log.N`
 * once the file reaches `maxBytes`.
 */
export class FileSink implements LogSink {
  private readonly maxBytes: number;
  private readonly backupCount: number;
  private size: number;

  constructor(private path: string, opts: FileSinkOptions = {}) {
    this.maxBytes = opts.maxBytes ?? 2_000_000;
    this.backupCount = opts.backupCount ?? 3;
    mkdirSync(dirname(path), { recursive: true });
    this.size = existsSync(path) ? statSync(path).size : 0;
  }

  write(entry: LogEntry) {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxBytes) this.rotate();
    appendFileSync(this.path, line, "utf8");
    this.size += bytes;
  }

  private rotate() {
    if (this.backupCount <= 0) {
      rmSync(this.path, { force: true });
    } else {
      rmSync(`${this.path}.${this.backupCount}`, { force: true });
      for (let i = this.backupCount - 1; i >= 1; i--) {
        const from = `${this.path}.${i}`;
        if (existsSync(from)) renameSync(from, `${this.path}.${i + 1}`);
      }
      renameSync(this.path, `${this.path}.1`);
    }
    this.size = 0;
  }
}
