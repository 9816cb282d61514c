export type ErrorCode =
  | "EMPTY_REQUIREMENT"
  | "VAGUE_REQUIREMENT"
  | "UNSUPPORTED_MODULE"
  | "INVALID_CONSTRAINTS"
  | "PLANNING_FAILED"
  | "PROVIDER_ERROR"
  | "CHECKPOINT_UNAVAILABLE"
  | "CHECKPOINT_CONFLICT"
  | "CHECKPOINT_CORRUPT"
  | "INVALID_TRANSITION"
  | "GRAPH_INVALID"
  | "UNKNOWN_TASK"
  | "DUPLICATE_REGISTRATION"
  | "NOT_FOUND"
  | "PARSE_FAILED"
  | "VALIDATION_FAILED"
  | "CONFIG_INVALID";

/** The five failure classes every provider or generator error is reduced to. */
export const PROVIDER_ERROR_KINDS = [
  "transient",
  "rate_limited",
  "invalid_output",
  "permanent",
  "provider_unavailable",
] as const;

export type ProviderErrorKind = (typeof PROVIDER_ERROR_KINDS)[number];

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

/** The requirement or constraints cannot be turned into a task graph. Never retried. */
export class PlanningError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "PlanningError";
  }
}

export type ProviderErrorOptions = {
  provider?: string;
  retryAfterMs?: number;
  cause?: unknown;
};

export class ProviderError extends OrchestratorError {
  readonly kind: ProviderErrorKind;
  readonly provider?: string;
  /** Delay the provider asked for before the next call, when it sent one. */
  readonly retryAfterMs?: number;

  constructor(kind: ProviderErrorKind, message: string, opts: ProviderErrorOptions = {}) {
    super("PROVIDER_ERROR", message, { cause: opts.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.provider = opts.provider;
    this.retryAfterMs = opts.retryAfterMs;
  }
}

export class CheckpointError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "CheckpointError";
  }
}

/** An invalid graph or state transition. Always a programming defect. */
export class GraphIntegrityError extends OrchestratorError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "GraphIntegrityError";
  }
}

export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class ParseError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class NotFoundError extends OrchestratorError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

function isAbortLike(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "AbortError" || err.name === "TimeoutError")
  );
}

/** Reduce any thrown value to a classified ProviderError. */
export function toProviderError(err: unknown, provider?: string): ProviderError {
  if (err instanceof ProviderError) {
    if (err.provider || !provider) return err;
    return new ProviderError(err.kind, err.message, {
      provider,
      retryAfterMs: err.retryAfterMs,
      cause: err.cause,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  if (isAbortLike(err)) {
    return new ProviderError("transient", message || "Call aborted", { provider, cause: err });
  }
  if (err instanceof ParseError || err instanceof ValidationError) {
    return new ProviderError("invalid_output", message, { provider, cause: err });
  }
  if (err instanceof CheckpointError) {
    const kind = err.code === "CHECKPOINT_UNAVAILABLE" ? "transient" : "permanent";
    return new ProviderError(kind, message, { provider, cause: err });
  }
  if (err instanceof PlanningError || err instanceof GraphIntegrityError || err instanceof ConfigError) {
    return new ProviderError("permanent", message, { provider, cause: err });
  }
  return new ProviderError("transient", message, { provider, cause: err });
}
