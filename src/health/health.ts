import type { HealthCheckResult } from "../types.js";
import { errorMessage } from "../rag/errors.js";
import type { VectorStoreManager } from "../rag/store/vectorStoreManager.js";

type CheckFn = () => HealthCheckResult | Promise<HealthCheckResult>;

export type HealthReport = { ok: boolean; details: Record<string, HealthCheckResult> };

export class HealthRegistry {
  private liveness = new Map<string, CheckFn>();
  private readiness = new Map<string, CheckFn>();

  registerLiveness(name: string, fn: CheckFn) {
    this.liveness.set(name, fn);
    return this;
  }
  registerReadiness(name: string, fn: CheckFn) {
    this.readiness.set(name, fn);
    return this;
  }

  checkLiveness(): Promise<HealthReport> {
    return run(this.liveness);
  }

  checkReadiness(): Promise<HealthReport> {
    return run(this.readiness);
  }
}

async function run(checks: Map<string, CheckFn>): Promise<HealthReport> {
  const details: Record<string, HealthCheckResult> = {};
  let ok = true;
  for (const [name, fn] of checks.entries()) {
    try {
      const res = await fn();
      details[name] = res;
      if (!res.ok) ok = false;
    } catch (e) {
      ok = false;
      details[name] = { ok: false, message: errorMessage(e) };
    }
  }
  return { ok, details };
}

/**
 * Ready once the store is loaded or created and matches the active
 * embedding backend. Pending persistence is reported, not failed.
 */
export function vectorStoreReadiness(store: VectorStoreManager): CheckFn {
  return async () => {
    await store.getOrCreate();
    const stats = store.stats();
    const provider = store.embeddingProvider;
    const compatible = stats.backend === provider.id && stats.dimension === provider.dimension;
    return {
      ok: compatible,
      message: compatible ? undefined : `store backend ${stats.backend} does not match ${provider.id}`,
      details: { ...stats }
    };
  };
}
