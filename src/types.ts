export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogEntry = {
  ts: string;
  level: LogLevel;
  msg: string;
  context?: Record<string, unknown>;
};

export type HealthCheckResult = { ok: boolean; message?: string; details?: Record<string, unknown> };
