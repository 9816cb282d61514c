import type { ProviderErrorKind } from "../errors.js";
import type { CircuitState } from "../utils/circuit-breaker.js";
import type { RateLimiterStats } from "../utils/rate-limiter.js";

export type BudgetWindow = {
  remainingRequests: number;
  remainingTokens?: number;
  nextAvailableInMs: number;
  queued: number;
};

export type ProviderHealthRecord = {
  provider: string;
  consecutiveFailures: number;
  totalCalls: number;
  totalFailures: number;
  /** Calls turned away by an open circuit without contacting the provider. */
  rejectedCalls: number;
  failuresByKind: Partial<Record<ProviderErrorKind, number>>;
  circuit: CircuitState;
  lastStateChange: number;
  budget?: BudgetWindow;
};

function emptyRecord(provider: string): ProviderHealthRecord {
  return {
    provider,
    consecutiveFailures: 0,
    totalCalls: 0,
    totalFailures: 0,
    rejectedCalls: 0,
    failuresByKind: {},
    circuit: "closed",
    lastStateChange: Date.now(),
  };
}

/**
 * Per-provider health counters. Owned by an orchestrator instance; pass the
 * same registry to several orchestrators to give them a shared view.
 */
export class ProviderHealthRegistry {
  private records = new Map<string, ProviderHealthRecord>();

  private record(provider: string): ProviderHealthRecord {
    let rec = this.records.get(provider);
    if (!rec) {
      rec = emptyRecord(provider);
      this.records.set(provider, rec);
    }
    return rec;
  }

  recordSuccess(provider: string): void {
    const rec = this.record(provider);
    rec.totalCalls++;
    rec.consecutiveFailures = 0;
  }

  recordFailure(provider: string, kind: ProviderErrorKind): void {
    const rec = this.record(provider);
    rec.totalCalls++;
    rec.totalFailures++;
    rec.consecutiveFailures++;
    rec.failuresByKind[kind] = (rec.failuresByKind[kind] ?? 0) + 1;
  }

  recordRejected(provider: string): void {
    this.record(provider).rejectedCalls++;
  }

  recordCircuitChange(provider: string, to: CircuitState, at: number): void {
    const rec = this.record(provider);
    rec.circuit = to;
    rec.lastStateChange = at;
    if (to === "closed") rec.consecutiveFailures = 0;
  }

  recordBudget(provider: string, stats: RateLimiterStats): void {
    this.record(provider).budget = {
      remainingRequests: stats.remaining,
      remainingTokens: stats.remainingTokens,
      nextAvailableInMs: stats.nextAvailableInMs,
      queued: stats.queueSize,
    };
  }

  /** Lifetime failure rate; 0 before the first call. */
  failureRate(provider: string): number {
    const rec = this.records.get(provider);
    if (!rec || rec.totalCalls === 0) return 0;
    return rec.totalFailures / rec.totalCalls;
  }

  get(provider: string): ProviderHealthRecord | undefined {
    const rec = this.records.get(provider);
    return rec ? structuredClone(rec) : undefined;
  }

  snapshot(): ProviderHealthRecord[] {
    return [...this.records.values()].map((r) => structuredClone(r));
  }

  /** Load counters saved by an earlier process. Circuit state is not restored. */
  restore(records: ProviderHealthRecord[]): void {
    for (const saved of records) {
      const rec = this.record(saved.provider);
      rec.totalCalls = saved.totalCalls;
      rec.totalFailures = saved.totalFailures;
      rec.rejectedCalls = saved.rejectedCalls;
      rec.failuresByKind = { ...saved.failuresByKind };
    }
  }

  delete(provider: string): boolean {
    return this.records.delete(provider);
  }
}
