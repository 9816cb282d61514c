import { getConfig } from "../config.js";
import type { ProviderError } from "../errors.js";
import type { Task } from "../planner/types.js";
import type { ProviderGateway } from "../providers/gateway.js";
import { createLogger } from "../utils/logger.js";
import type { RetryPolicy } from "../utils/retry.js";

const log = createLogger("fallback");

export type FailureContext = {
  /** The failed task; `attempts` already counts the failed attempt. */
  task: Task;
  error: ProviderError;
  provider: string;
  /** Consecutive rate-limited failures of this task on `provider`. */
  rateLimitStreak: number;
  elapsedMs: number;
};

export type FallbackDecision =
  | { action: "retry"; provider: string; delayMs: number; switched: boolean }
  | { action: "fail"; reason: string };

export type FallbackOptions = {
  maxAttemptsPerTask?: number;
  rateLimitSwitchAfter?: number;
};

/**
 * Decides what happens after a failed attempt: retry on the same provider,
 * move to the next-healthiest one, or give up. The task's attempt count is
 * shared across providers.
 */
export class FallbackCoordinator {
  private gateway: ProviderGateway;
  private policy: RetryPolicy;
  private maxAttemptsPerTask: number;
  private rateLimitSwitchAfter: number;

  constructor(gateway: ProviderGateway, policy: RetryPolicy, opts: FallbackOptions = {}) {
    const config = getConfig();
    this.gateway = gateway;
    this.policy = policy;
    this.maxAttemptsPerTask = opts.maxAttemptsPerTask ?? config.retry.maxAttemptsPerTask;
    this.rateLimitSwitchAfter = opts.rateLimitSwitchAfter ?? config.fallback.rateLimitSwitchAfter;
  }

  /** Healthiest callable provider, ignoring `exclude`. */
  selectProvider(exclude: string[] = []): string | undefined {
    return this.gateway.rank(exclude)[0];
  }

  decide(ctx: FailureContext): FallbackDecision {
    const { task, error, provider } = ctx;

    if (error.kind === "permanent") {
      return { action: "fail", reason: "permanent error" };
    }
    if (task.attempts >= this.maxAttemptsPerTask) {
      return { action: "fail", reason: `attempt budget of ${this.maxAttemptsPerTask} exhausted` };
    }

    const mustSwitch =
      error.kind === "provider_unavailable" ||
      (error.kind === "rate_limited" && ctx.rateLimitStreak >= this.rateLimitSwitchAfter);

    if (mustSwitch) {
      const next = this.selectProvider([provider]);
      if (next) {
        log.info(`Task "${task.id}" moving from "${provider}" to "${next}"`, { kind: error.kind });
        return { action: "retry", provider: next, delayMs: 0, switched: true };
      }
      if (error.kind === "provider_unavailable") {
        return { action: "fail", reason: "no healthy provider left" };
      }
    }

    const decision = this.policy.decide({
      kind: error.kind,
      attempt: task.attempts,
      elapsedMs: ctx.elapsedMs,
      retryAfterMs: error.retryAfterMs,
    });
    if (!decision.retry) {
      return { action: "fail", reason: decision.reason.replace(/_/g, " ") };
    }

    if (this.gateway.circuitState(provider) === "open") {
      const next = this.selectProvider([provider]);
      if (next) {
        log.info(`Task "${task.id}" moving from "${provider}" to "${next}" (circuit open)`);
        return { action: "retry", provider: next, delayMs: 0, switched: true };
      }
    }
    return { action: "retry", provider, delayMs: decision.delayMs, switched: false };
  }
}
