import { getConfig } from "../config.js";
import { ProviderError } from "../errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("rate-limit");

/** Unset fields fall back to the `rateLimit` config section. */
export type RateLimiterOptions = {
  maxRequests?: number;
  /** Estimated prompt tokens per window; unlimited when unset. */
  maxTokens?: number;
  windowMs?: number;
  /** Wait in a queue for a free slot instead of failing with `rate_limited`. */
  queueExcess?: boolean;
  maxQueueSize?: number;
};

type Grant = { at: number; tokens: number };

type QueuedRequest = {
  tokens: number;
  resolve: () => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

export type RateLimiterStats = {
  allowed: number;
  throttled: number;
  queued: number;
  rejected: number;
  queueSize: number;
  remaining: number;
  remainingTokens?: number;
  nextAvailableInMs: number;
};

/**
 * Sliding-window limiter on requests and estimated tokens, with optional
 * request queuing. Sits in front of every call to a provider.
 */
export class RateLimiter {
  private grants: Grant[] = [];
  private queue: QueuedRequest[] = [];
  private maxRequests: number;
  private maxTokens?: number;
  private windowMs: number;
  private queueExcess: boolean;
  private maxQueueSize: number;
  private drainTimer: ReturnType<typeof setTimeout> | null = null;
  private stats = { allowed: 0, throttled: 0, queued: 0, rejected: 0 };

  constructor(opts: RateLimiterOptions = {}) {
    const defaults = getConfig().rateLimit;
    this.maxRequests = opts.maxRequests ?? defaults.maxRequests;
    this.maxTokens = opts.maxTokens ?? defaults.maxTokens;
    this.windowMs = opts.windowMs ?? defaults.windowMs;
    this.queueExcess = opts.queueExcess ?? defaults.queueExcess;
    this.maxQueueSize = opts.maxQueueSize ?? defaults.maxQueueSize;
  }

  private cleanup(): void {
    const cutoff = Date.now() - this.windowMs;
    this.grants = this.grants.filter((g) => g.at > cutoff);
  }

  private usedTokens(): number {
    return this.grants.reduce((sum, g) => sum + g.tokens, 0);
  }

  /** True when a request of `tokens` would be granted right now. An empty window admits any size. */
  canProceed(tokens = 0): boolean {
    this.cleanup();
    if (this.grants.length >= this.maxRequests) return false;
    if (this.maxTokens !== undefined && this.grants.length > 0 && this.usedTokens() + tokens > this.maxTokens) {
      return false;
    }
    return true;
  }

  remaining(): number {
    this.cleanup();
    return Math.max(0, this.maxRequests - this.grants.length);
  }

  remainingTokens(): number | undefined {
    if (this.maxTokens === undefined) return undefined;
    this.cleanup();
    return Math.max(0, this.maxTokens - this.usedTokens());
  }

  /** Milliseconds until the oldest grant leaves the window, or 0 when a request would pass now. */
  nextAvailableIn(tokens = 0): number {
    if (this.canProceed(tokens)) return 0;
    const oldest = this.grants[0];
    return oldest ? Math.max(0, oldest.at + this.windowMs - Date.now()) : 0;
  }

  /**
   * Take a slot for a request of `tokens`. Waits in the queue when
   * `queueExcess` is set, otherwise rejects with `rate_limited` and the wait
   * as `retryAfterMs`. An aborted wait leaves the queue.
   */
  async acquire(tokens = 0, signal?: AbortSignal): Promise<void> {
    if (this.queue.length === 0 && this.canProceed(tokens)) {
      this.grant(tokens);
      return;
    }

    this.stats.throttled++;

    if (!this.queueExcess) {
      this.stats.rejected++;
      throw new ProviderError("rate_limited", "Rate limit exceeded", { retryAfterMs: this.nextAvailableIn(tokens) });
    }

    if (this.queue.length >= this.maxQueueSize) {
      this.stats.rejected++;
      throw new ProviderError("rate_limited", "Rate limit queue full", { retryAfterMs: this.nextAvailableIn(tokens) });
    }

    this.stats.queued++;
    log.debug("Queued", { queueSize: this.queue.length + 1, waitMs: this.nextAvailableIn(tokens) });

    return new Promise<void>((resolve, reject) => {
      const request: QueuedRequest = { tokens, resolve, reject, signal };
      if (signal) {
        request.onAbort = () => {
          this.queue = this.queue.filter((q) => q !== request);
          reject(new ProviderError("transient", "Rate limit wait aborted"));
        };
        signal.addEventListener("abort", request.onAbort, { once: true });
      }
      this.queue.push(request);
      this.scheduleDrain();
    });
  }

  tryAcquire(tokens = 0): boolean {
    if (this.canProceed(tokens)) {
      this.grant(tokens);
      return true;
    }
    this.stats.throttled++;
    return false;
  }

  private grant(tokens: number): void {
    this.grants.push({ at: Date.now(), tokens });
    this.stats.allowed++;
  }

  private scheduleDrain(): void {
    if (this.drainTimer || this.queue.length === 0) return;
    const head = this.queue[0];
    const waitTime = head ? this.nextAvailableIn(head.tokens) : 0;
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      this.drain();
    }, Math.min(waitTime + 10, 100));
  }

  // FIFO: a large head request holds back smaller ones behind it.
  private drain(): void {
    let head = this.queue[0];
    while (head && this.canProceed(head.tokens)) {
      this.queue.shift();
      if (head.signal && head.onAbort) head.signal.removeEventListener("abort", head.onAbort);
      this.grant(head.tokens);
      head.resolve();
      head = this.queue[0];
    }
    this.scheduleDrain();
  }

  getStats(): RateLimiterStats {
    return {
      ...this.stats,
      queueSize: this.queue.length,
      remaining: this.remaining(),
      remainingTokens: this.remainingTokens(),
      nextAvailableInMs: this.nextAvailableIn(),
    };
  }

  /** Clear the window and counters; queued waits reject as `transient`. */
  reset(): void {
    if (this.drainTimer) clearTimeout(this.drainTimer);
    this.drainTimer = null;
    this.grants = [];
    for (const q of this.queue) {
      if (q.signal && q.onAbort) q.signal.removeEventListener("abort", q.onAbort);
      q.reject(new ProviderError("transient", "Rate limiter reset"));
    }
    this.queue = [];
    this.stats = { allowed: 0, throttled: 0, queued: 0, rejected: 0 };
  }
}

/** One limiter per provider, created on first use. */
export class RateLimiterRegistry {
  private limiters = new Map<string, RateLimiter>();
  private defaultOptions: RateLimiterOptions;

  constructor(defaultOptions: RateLimiterOptions = {}) {
    this.defaultOptions = defaultOptions;
  }

  /** `opts` only apply when the limiter is created. */
  get(key: string, opts?: RateLimiterOptions): RateLimiter {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new RateLimiter({ ...this.defaultOptions, ...opts });
      this.limiters.set(key, limiter);
    }
    return limiter;
  }

  has(key: string): boolean {
    return this.limiters.has(key);
  }

  delete(key: string): boolean {
    const limiter = this.limiters.get(key);
    limiter?.reset();
    return this.limiters.delete(key);
  }

  getAllStats(): Record<string, RateLimiterStats> {
    return Object.fromEntries(
      [...this.limiters].map(([key, limiter]): [string, RateLimiterStats] => [key, limiter.getStats()]),
    );
  }

  resetAll(): void {
    for (const limiter of this.limiters.values()) limiter.reset();
  }
}
