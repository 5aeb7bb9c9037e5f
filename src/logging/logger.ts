import type { LogLevel, LogEntry } from "../types.js";
import type { LogSink } from "./sinks.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

export type LoggerOptions = {
  level?: LogLevel;
  sinks?: LogSink[];
  redact?: (key: string, value: unknown) => unknown;
  context?: Record<string, unknown>;
};

export class Logger {
  private level: LogLevel;
  private sinks: LogSink[];
  private redact?: (key: string, value: unknown) => unknown;
  private baseContext: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? "info";
    this.sinks = opts.sinks ?? [];
    this.redact = opts.redact;
    this.baseContext = { ...(opts.context ?? {}) };
  }

  /** Logger for one component; entries carry `component` alongside the parent context. */
  child(ctx: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      sinks: this.sinks,
      redact: this.redact,
      context: { ...this.baseContext, ...ctx }
    });
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private emit(level: LogLevel, msg: string, context?: Record<string, unknown>) {
    if (!this.isEnabled(level)) return;
    const merged: Record<string, unknown> = { ...this.baseContext, ...(context ?? {}) };
    for (const k of Object.keys(merged)) {
      const value = serializeValue(merged[k]);
      merged[k] = this.redact ? this.redact(k, value) : value;
    }
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      context: Object.keys(merged).length ? merged : undefined
    };
    for (const s of this.sinks) s.write(entry);
  }

  trace(msg: string, ctx?: Record<string, unknown>) { this.emit("trace", msg, ctx); }
  debug(msg: string, ctx?: Record<string, unknown>) { this.emit("debug", msg, ctx); }
  info(msg: string, ctx?: Record<string, unknown>) { this.emit("info", msg, ctx); }
  warn(msg: string, ctx?: Record<string, unknown>) { this.emit("warn", msg, ctx); }
  error(msg: string, ctx?: Record<string, unknown>) { this.emit("error", msg, ctx); }

  flush() {
    for (const s of this.sinks) s.flush?.();
  }
}

// Error instances stringify to "{}"; keep name and message instead.
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createLogger(opts: LoggerOptions): Logger {
  return new Logger(opts);
}

/** Logger that drops everything; the default for components built without one. */
export function silentLogger(): Logger {
  return new Logger({ level: "error", sinks: [] });
}
