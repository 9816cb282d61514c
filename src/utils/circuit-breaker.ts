import { getConfig } from "../config.js";

export type CircuitState = "closed" | "open" | "half_open";

export type CircuitBreakerOptions = {
  /** Most recent outcomes kept in the window (default: 10) */
  windowSize?: number;
  /** Outcomes older than this drop out of the window (default: 60s) */
  windowMs?: number;
  /** Outcomes needed in the window before the breaker may open (default: 3) */
  minimumCalls?: number;
  /** Failure rate in [0, 1] that opens the breaker; inclusive, so a rate equal to it trips (default: 0.5) */
  failureRateThreshold?: number;
  /** Time spent open before a probe is allowed (default: 30s) */
  cooldownMs?: number;
  now?: () => number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
};

type Outcome = { at: number; ok: boolean };

/**
 * Failure-rate circuit breaker over a sliding window of call outcomes.
 * Open rejects every call; after the cooldown it turns half-open and admits
 * exactly one probe, whose outcome closes or re-opens it.
 */
export class CircuitBreaker {
  private outcomes: Outcome[] = [];
  private current: CircuitState = "closed";
  private openedAt = 0;
  private changedAt: number;
  private probeInFlight = false;
  private windowSize: number;
  private windowMs: number;
  private minimumCalls: number;
  private failureRateThreshold: number;
  private cooldownMs: number;
  private now: () => number;
  private onStateChange?: (from: CircuitState, to: CircuitState) => void;

  constructor(opts: CircuitBreakerOptions = {}) {
    const defaults = getConfig().circuitBreaker;
    this.windowSize = opts.windowSize ?? defaults.windowSize;
    this.windowMs = opts.windowMs ?? defaults.windowMs;
    this.minimumCalls = opts.minimumCalls ?? defaults.minimumCalls;
    this.failureRateThreshold = opts.failureRateThreshold ?? defaults.failureRateThreshold;
    this.cooldownMs = opts.cooldownMs ?? defaults.cooldownMs;
    this.now = opts.now ?? Date.now;
    this.onStateChange = opts.onStateChange;
    this.changedAt = this.now();
  }

  get state(): CircuitState {
    this.refresh();
    return this.current;
  }

  get lastStateChange(): number {
    return this.changedAt;
  }

  /** Reserve a call. False means the caller must not contact the provider. */
  tryAcquire(): boolean {
    this.refresh();
    if (this.current === "closed") return true;
    if (this.current === "open") return false;
    if (this.probeInFlight) return false;
    this.probeInFlight = true;
    return true;
  }

  /** Give back a reserved call that ended without an outcome (e.g. cancelled). */
  release(): void {
    this.probeInFlight = false;
  }

  recordSuccess(): void {
    this.refresh();
    if (this.current === "half_open") {
      this.probeInFlight = false;
      this.transition("closed");
      return;
    }
    if (this.current === "closed") this.push(true);
  }

  recordFailure(): void {
    this.refresh();
    if (this.current === "half_open") {
      this.probeInFlight = false;
      this.open();
      return;
    }
    if (this.current !== "closed") return;
    this.push(false);
    if (this.outcomes.length >= this.minimumCalls && this.failureRate() >= this.failureRateThreshold) {
      this.open();
    }
  }

  /** Failure rate over the current window; 0 when empty. */
  failureRate(): number {
    this.prune();
    if (this.outcomes.length === 0) return 0;
    const failures = this.outcomes.filter((o) => !o.ok).length;
    return failures / this.outcomes.length;
  }

  /** Time left before an open breaker admits a probe. */
  remainingCooldown(): number {
    this.refresh();
    if (this.current !== "open") return 0;
    return Math.max(0, this.openedAt + this.cooldownMs - this.now());
  }

  reset(): void {
    this.probeInFlight = false;
    if (this.current !== "closed") this.transition("closed");
    this.outcomes = [];
  }

  private push(ok: boolean): void {
    this.outcomes.push({ at: this.now(), ok });
    this.prune();
  }

  private prune(): void {
    const cutoff = this.now() - this.windowMs;
    this.outcomes = this.outcomes.filter((o) => o.at > cutoff).slice(-this.windowSize);
  }

  private open(): void {
    this.openedAt = this.now();
    this.transition("open");
  }

  private refresh(): void {
    if (this.current === "open" && this.now() - this.openedAt >= this.cooldownMs) {
      this.transition("half_open");
    }
  }

  private transition(to: CircuitState): void {
    const from = this.current;
    this.current = to;
    this.changedAt = this.now();
    if (to === "closed") this.outcomes = [];
    if (from !== to) this.onStateChange?.(from, to);
  }
}
