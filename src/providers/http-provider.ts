import { getConfig } from "../config.js";
import { ProviderError, type ProviderErrorKind, toProviderError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { CompletionConstraints, ProviderAdapter } from "./adapter.js";

export type HttpProviderOptions = {
  name: string;
  url: string;
  headers?: Record<string, string>;
  description?: string;
  /** Model sent when the caller does not name one. */
  model?: string;
  /** Timeout in ms (default: timeouts.providerCall) */
  timeout?: number;
};

/** Parse a Retry-After header (delta-seconds or HTTP-date) into ms. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function classifyStatus(status: number): ProviderErrorKind {
  if (status === 429) return "rate_limited";
  if (status === 408 || status >= 500) return "transient";
  return "permanent";
}

function extractText(body: string, contentType: string | null): string {
  if (!contentType?.includes("application/json")) return body;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (typeof parsed === "object" && parsed !== null && "text" in parsed && typeof parsed.text === "string") {
    return parsed.text;
  }
  return body;
}

/**
 * Provider reached over HTTP. POSTs the prompt as JSON and reads either a
 * `{ "text": ... }` JSON body or plain text.
 */
export class HttpProvider implements ProviderAdapter {
  readonly name: string;
  readonly type = "http" as const;
  readonly description?: string;

  private url: string;
  private headers: Record<string, string>;
  private model?: string;
  private timeout: number;

  constructor(opts: HttpProviderOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
    this.model = opts.model;
    this.timeout = opts.timeout ?? getConfig().timeouts.providerCall;
  }

  async complete(prompt: string, constraints: CompletionConstraints = {}): Promise<string> {
    const start = Date.now();
    const timeoutSignal = AbortSignal.timeout(constraints.timeoutMs ?? this.timeout);
    const signal = constraints.signal ? AbortSignal.any([constraints.signal, timeoutSignal]) : timeoutSignal;

    try {
      log.debug(`[${this.name}] POST ${this.url}`, { promptChars: prompt.length });

      const res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({
          prompt,
          model: constraints.model ?? this.model,
          maxTokens: constraints.maxTokens,
          temperature: constraints.temperature,
          system: constraints.system,
        }),
        signal,
      });

      const body = await res.text();
      if (!res.ok) {
        throw new ProviderError(classifyStatus(res.status), `HTTP ${res.status}: ${body.slice(0, 200)}`, {
          provider: this.name,
          retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
        });
      }

      const text = extractText(body, res.headers.get("content-type"));
      if (!text.trim()) {
        throw new ProviderError("invalid_output", "Provider returned an empty completion", { provider: this.name });
      }
      log.debug(`[${this.name}] Completion finished`, { durationMs: Date.now() - start, httpStatus: res.status });
      return text;
    } catch (err) {
      const classified = toProviderError(err, this.name);
      log.debug(`[${this.name}] Completion failed`, { kind: classified.kind, error: classified.message });
      throw classified;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(getConfig().timeouts.healthCheck),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }
}
