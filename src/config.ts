import type { ProviderErrorKind } from "./errors.js";

export type OrchestratorConfig = {
  timeouts: {
    providerCall: number;
    /** Wall-clock budget for one task, from dispatch to terminal state. */
    task: number;
    healthCheck: number;
  };
  retry: {
    baseDelayMs: number;
    maxDelayMs: number;
    /** Retries allowed after a failure of each kind. */
    maxRetries: Record<ProviderErrorKind, number>;
    /** Attempts per task, shared across every provider it is sent to. */
    maxAttemptsPerTask: number;
    checkpointAttempts: number;
    checkpointBaseDelayMs: number;
  };
  circuitBreaker: {
    windowSize: number;
    windowMs: number;
    minimumCalls: number;
    failureRateThreshold: number;
    cooldownMs: number;
  };
  fallback: {
    /** Consecutive rate limits on one provider before the task moves to another ranked provider. */
    rateLimitSwitchAfter: number;
  };
  rateLimit: {
    enabled: boolean;
    maxRequests: number;
    windowMs: number;
    maxTokens?: number;
    queueExcess: boolean;
    maxQueueSize: number;
  };
  limits: {
    maxConcurrency: number;
    maxGenerations: number;
    outputTruncation: number;
  };
  planning: {
    minRequirementWords: number;
    contextSnippets: number;
  };
  checkpoint: {
    compactOnFinish: boolean;
  };
  events: {
    bufferSize: number;
  };
  cli: {
    pollIntervalMs: number;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: OrchestratorConfig = {
  timeouts: {
    providerCall: 120_000,
    task: 15 * 60 * 1000, // 15 minutes
    healthCheck: 5_000,
  },
  retry: {
    baseDelayMs: 500,
    maxDelayMs: 30_000,
    maxRetries: {
      transient: 4,
      rate_limited: 4,
      invalid_output: 2,
      permanent: 0,
      provider_unavailable: 2,
    },
    maxAttemptsPerTask: 6,
    checkpointAttempts: 3,
    checkpointBaseDelayMs: 200,
  },
  circuitBreaker: {
    windowSize: 10,
    windowMs: 60_000,
    minimumCalls: 3,
    failureRateThreshold: 0.5,
    cooldownMs: 30_000,
  },
  fallback: {
    rateLimitSwitchAfter: 1,
  },
  rateLimit: {
    enabled: true,
    maxRequests: 60,
    windowMs: 60_000,
    queueExcess: true,
    maxQueueSize: 50,
  },
  limits: {
    maxConcurrency: 4,
    maxGenerations: 50,
    outputTruncation: 3_000,
  },
  planning: {
    minRequirementWords: 2,
    contextSnippets: 3,
  },
  checkpoint: {
    compactOnFinish: true,
  },
  events: {
    bufferSize: 1_000,
  },
  cli: {
    pollIntervalMs: 800,
  },
};

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val;
  }
  return result;
}

/** Merge overrides onto the defaults. Pure; does not touch the active config. */
export function resolveConfig(overrides: DeepPartial<OrchestratorConfig> = {}): OrchestratorConfig {
  // deepMerge keeps every key of DEFAULTS, so the result has the full shape.
  return deepMerge(DEFAULTS, overrides) as OrchestratorConfig;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  current = resolveConfig(overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));
