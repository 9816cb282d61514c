import { getConfig } from "../config.js";
import { ProviderError, type ProviderErrorKind, ValidationError, toProviderError } from "../errors.js";
import { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from "../utils/circuit-breaker.js";
import { createLogger } from "../utils/logger.js";
import { RateLimiterRegistry, type RateLimiterOptions } from "../utils/rate-limiter.js";
import type { CompletionConstraints, ProviderAdapter } from "./adapter.js";
import { ProviderHealthRegistry, type ProviderHealthRecord } from "./health.js";

const log = createLogger("gateway");

export type ProviderRegistration = {
  /** Lower runs first among equally healthy providers (default: registration order). */
  priority?: number;
  rateLimit?: RateLimiterOptions;
  circuitBreaker?: CircuitBreakerOptions;
};

export type ProviderGatewayOptions = {
  health?: ProviderHealthRegistry;
  circuitBreaker?: CircuitBreakerOptions;
  /** Default limiter options, or false to disable rate limiting. */
  rateLimit?: RateLimiterOptions | false;
};

export type ProviderStatus = {
  name: string;
  type: string;
  description?: string;
  priority: number;
  circuit: CircuitState;
  recentFailureRate: number;
  health?: ProviderHealthRecord;
  reachable?: boolean;
};

type Entry = {
  adapter: ProviderAdapter;
  priority: number;
  order: number;
  breaker: CircuitBreaker;
};

/** Failures that say something about the provider itself. */
const CIRCUIT_FAILURES: ReadonlySet<ProviderErrorKind> = new Set(["transient", "rate_limited"]);

/** Rough prompt size used against token budgets. */
export function estimateTokens(prompt: string): number {
  return Math.ceil(prompt.length / 4);
}

/**
 * Uniform front door to every registered provider. Each call passes the
 * provider's circuit breaker and rate limiter and updates its health record.
 */
export class ProviderGateway {
  readonly health: ProviderHealthRegistry;
  private entries = new Map<string, Entry>();
  private limiters?: RateLimiterRegistry;
  private breakerDefaults: CircuitBreakerOptions;
  private registered = 0;

  constructor(opts: ProviderGatewayOptions = {}) {
    this.health = opts.health ?? new ProviderHealthRegistry();
    this.breakerDefaults = opts.circuitBreaker ?? {};

    const rateLimit = getConfig().rateLimit;
    if (opts.rateLimit !== false && rateLimit.enabled) {
      this.limiters = new RateLimiterRegistry({
        maxRequests: rateLimit.maxRequests,
        maxTokens: rateLimit.maxTokens,
        windowMs: rateLimit.windowMs,
        queueExcess: rateLimit.queueExcess,
        maxQueueSize: rateLimit.maxQueueSize,
        ...opts.rateLimit,
      });
    }
  }

  add(adapter: ProviderAdapter, registration: ProviderRegistration = {}): void {
    if (this.entries.has(adapter.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Provider "${adapter.name}" already registered`);
    }
    const order = this.registered++;
    const name = adapter.name;
    const breaker = new CircuitBreaker({
      ...this.breakerDefaults,
      ...registration.circuitBreaker,
      onStateChange: (from, to) => {
        this.health.recordCircuitChange(name, to, breaker.lastStateChange);
        const level = to === "open" ? "warn" : "info";
        log[level](`Circuit for "${name}" ${from} → ${to}`);
      },
    });
    this.entries.set(name, {
      adapter,
      priority: registration.priority ?? order,
      order,
      breaker,
    });
    this.limiters?.get(name, registration.rateLimit);
    this.health.recordCircuitChange(name, "closed", breaker.lastStateChange);
    log.info(`Registered provider "${name}"`, { type: adapter.type });
  }

  remove(name: string): boolean {
    this.limiters?.delete(name);
    return this.entries.delete(name);
  }

  get(name: string): ProviderAdapter | undefined {
    return this.entries.get(name)?.adapter;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Provider names in priority order. */
  names(): string[] {
    return this.sortedEntries().map((e) => e.adapter.name);
  }

  list(): ProviderAdapter[] {
    return this.sortedEntries().map((e) => e.adapter);
  }

  circuitState(name: string): CircuitState | undefined {
    return this.entries.get(name)?.breaker.state;
  }

  /** Failure rate over the breaker's recent window. */
  recentFailureRate(name: string): number {
    return this.entries.get(name)?.breaker.failureRate() ?? 0;
  }

  /**
   * Providers that may be called right now, healthiest first: lowest recent
   * failure rate, then priority. Open circuits are left out.
   */
  rank(exclude: Iterable<string> = []): string[] {
    const skip = new Set(exclude);
    return this.sortedEntries()
      .filter((e) => !skip.has(e.adapter.name) && e.breaker.state !== "open")
      .map((e) => ({ e, rate: e.breaker.failureRate() }))
      .sort((a, b) => a.rate - b.rate || a.e.priority - b.e.priority || a.e.order - b.e.order)
      .map(({ e }) => e.adapter.name);
  }

  async complete(name: string, prompt: string, constraints: CompletionConstraints = {}): Promise<string> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ProviderError("permanent", `Unknown provider "${name}"`, { provider: name });
    }

    const { breaker, adapter } = entry;
    if (!breaker.tryAcquire()) {
      this.health.recordRejected(name);
      throw new ProviderError("provider_unavailable", `Circuit open for provider "${name}"`, {
        provider: name,
        retryAfterMs: breaker.remainingCooldown(),
      });
    }

    const limiter = this.limiters?.get(name);
    if (limiter) {
      try {
        await limiter.acquire(estimateTokens(prompt), constraints.signal);
      } catch (err) {
        breaker.release();
        throw toProviderError(err, name);
      } finally {
        this.health.recordBudget(name, limiter.getStats());
      }
    }

    try {
      const text = await adapter.complete(prompt, {
        timeoutMs: getConfig().timeouts.providerCall,
        ...constraints,
      });
      breaker.recordSuccess();
      this.health.recordSuccess(name);
      return text;
    } catch (err) {
      const classified = toProviderError(err, name);
      if (constraints.signal?.aborted) {
        breaker.release();
        throw classified;
      }
      if (CIRCUIT_FAILURES.has(classified.kind)) {
        breaker.recordFailure();
      } else {
        breaker.recordSuccess();
      }
      this.health.recordFailure(name, classified.kind);
      log.debug(`Call to "${name}" failed`, { kind: classified.kind, error: classified.message });
      throw classified;
    }
  }

  /** Current status of every provider, optionally pinging those with a health check. */
  async status(opts: { ping?: boolean } = {}): Promise<ProviderStatus[]> {
    return Promise.all(
      this.sortedEntries().map(async (e) => {
        let reachable: boolean | undefined;
        if (opts.ping && e.adapter.healthCheck) {
          reachable = await e.adapter.healthCheck();
        }
        return {
          name: e.adapter.name,
          type: e.adapter.type,
          description: e.adapter.description,
          priority: e.priority,
          circuit: e.breaker.state,
          recentFailureRate: e.breaker.failureRate(),
          health: this.health.get(e.adapter.name),
          reachable,
        } satisfies ProviderStatus;
      }),
    );
  }

  private sortedEntries(): Entry[] {
    return [...this.entries.values()].sort((a, b) => a.priority - b.priority || a.order - b.order);
  }
}
