import type { Logger } from "../logging/logger.js";
import { TimeoutError, errorMessage } from "../rag/errors.js";
import { withTimeout } from "../util/time.js";

export type ShutdownPhase = {
  name: string;
  fn: () => Promise<void> | void;
  /** The next phase starts once this elapses, whether or not `fn` settled. */
  timeoutMs?: number;
};

export class ShutdownManager {
  private phases: ShutdownPhase[] = [];
  private running?: Promise<void>;

  constructor(private logger: Logger) {}

  register(phase: ShutdownPhase) {
    this.phases.push(phase);
    return this;
  }

  /** Runs phases in registration order; repeated calls share one run. */
  execute(): Promise<void> {
    this.running ??= this.runPhases();
    return this.running;
  }

  private async runPhases() {
    for (const p of this.phases) {
      const start = Date.now();
      this.logger.info("shutdown.phase.start", { name: p.name });
      let timedOut = false;
      try {
        await withTimeout(Promise.resolve().then(p.fn), p.timeoutMs ?? 5000, `shutdown phase ${p.name}`);
      } catch (e) {
        timedOut = e instanceof TimeoutError;
        this.logger.error("shutdown.phase.error", { name: p.name, error: errorMessage(e) });
      } finally {
        this.logger.info("shutdown.phase.done", { name: p.name, ms: Date.now() - start, timedOut });
      }
    }
  }
}
