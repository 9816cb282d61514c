import { getConfig } from "../config.js";
import { type ProviderErrorKind, toProviderError } from "../errors.js";
import { sleep } from "./abort.js";

export type RetryPolicyOptions = {
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Retries allowed after a failure of each kind. */
  maxRetries?: Partial<Record<ProviderErrorKind, number>>;
  /** Give up once this much time has passed since the first attempt. */
  deadlineMs?: number;
  /** Source of jitter in [0, 1). */
  random?: () => number;
};

export type RetryInput = {
  kind: ProviderErrorKind;
  /** Attempts made so far, including the one that just failed. */
  attempt: number;
  elapsedMs?: number;
  retryAfterMs?: number;
};

export type RetryDecision =
  | { retry: true; delayMs: number }
  | { retry: false; reason: "not_retryable" | "attempts_exhausted" | "deadline_exceeded" };

/**
 * Exponential backoff with full jitter, budgeted per error kind.
 *
 * The delay before retry `n` is uniform in `[0, min(base * 2^(n-1), max))`,
 * unless the provider supplied a retry-after hint, which is used as-is.
 */
export class RetryPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly deadlineMs?: number;
  private maxRetries: Record<ProviderErrorKind, number>;
  private random: () => number;

  constructor(opts: RetryPolicyOptions = {}) {
    const { retry } = getConfig();
    this.baseDelayMs = opts.baseDelayMs ?? retry.baseDelayMs;
    this.maxDelayMs = opts.maxDelayMs ?? retry.maxDelayMs;
    this.maxRetries = { ...retry.maxRetries, ...opts.maxRetries };
    this.deadlineMs = opts.deadlineMs;
    this.random = opts.random ?? Math.random;
  }

  /** Total attempts allowed when the latest failure is of this kind. */
  maxAttempts(kind: ProviderErrorKind): number {
    return this.maxRetries[kind] + 1;
  }

  /** Upper bound of the jittered delay after the given attempt. */
  ceiling(attempt: number): number {
    return Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
  }

  delayFor(attempt: number, retryAfterMs?: number): number {
    if (retryAfterMs !== undefined && retryAfterMs >= 0) return retryAfterMs;
    return Math.floor(this.random() * this.ceiling(attempt));
  }

  decide(input: RetryInput): RetryDecision {
    if (this.maxRetries[input.kind] <= 0) return { retry: false, reason: "not_retryable" };
    if (input.attempt >= this.maxAttempts(input.kind)) return { retry: false, reason: "attempts_exhausted" };

    const delayMs = this.delayFor(input.attempt, input.kind === "rate_limited" ? input.retryAfterMs : undefined);
    if (this.deadlineMs !== undefined && (input.elapsedMs ?? 0) + delayMs >= this.deadlineMs) {
      return { retry: false, reason: "deadline_exceeded" };
    }
    return { retry: true, delayMs };
  }
}

export type RetryOptions = RetryPolicyOptions & {
  /** Shortcut for one budget across every retryable kind. */
  maxAttempts?: number;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; kind: ProviderErrorKind; delayMs: number; error: unknown }) => void;
};

function uniformBudget(maxAttempts: number): Partial<Record<ProviderErrorKind, number>> {
  const retries = Math.max(0, maxAttempts - 1);
  return { transient: retries, rate_limited: retries, invalid_output: retries, provider_unavailable: retries };
}

/** Run `fn`, retrying classified failures under a RetryPolicy. Rethrows the last error. */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxAttempts !== undefined
    ? { ...uniformBudget(opts.maxAttempts), ...opts.maxRetries }
    : opts.maxRetries;
  const policy = new RetryPolicy({ ...opts, maxRetries });
  const start = Date.now();

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const classified = toProviderError(err);
      const decision = policy.decide({
        kind: classified.kind,
        attempt,
        elapsedMs: Date.now() - start,
        retryAfterMs: classified.retryAfterMs,
      });
      if (!decision.retry || opts.signal?.aborted) throw err;
      opts.onRetry?.({ attempt, kind: classified.kind, delayMs: decision.delayMs, error: err });
      await sleep(decision.delayMs, opts.signal);
    }
  }
}
