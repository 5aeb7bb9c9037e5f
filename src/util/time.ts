import { TimeoutError } from "../rag/errors.js";

export function ms(value: string): number {
  // supports: 10ms 5s 2m 1h
  const re = /^(\d+)(ms|s|m|h)$/;
  const m = re.exec(value.trim());
  if (!m) throw new Error("Invalid duration: " + value);
  const n = Number(m[1]);
  switch (m[2]) {
    case "ms": return n;
    case "s": return n * 1000;
    case "m": return n * 60_000;
    case "h": return n * 3_600_000;
    default: throw new Error("Unsupported unit");
  }
}

/**
 * Races `work` against a timer. The timer is always cleared; the losing
 * promise is left to settle on its own.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** `yyyyMMddHHmmss` in local time. */
export function compactTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    date.getFullYear().toString() +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/** `yyyy-MM-dd HH:mm:ss` in local time, the format of history records. */
export function displayTimestamp(date: Date): string {
  const c = compactTimestamp(date);
  return `${c.slice(0, 4)}-${c.slice(4, 6)}-${c.slice(6, 8)} ${c.slice(8, 10)}:${c.slice(10, 12)}:${c.slice(12, 14)}`;
}
