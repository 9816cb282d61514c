import { getConfig } from "../config.js";
import { ProviderError, toProviderError } from "../errors.js";
import { raceAbort } from "../utils/abort.js";
import { log } from "../utils/logger.js";
import type { CompletionConstraints, ProviderAdapter } from "./adapter.js";

export type CompletionFunction = (prompt: string, constraints: CompletionConstraints) => Promise<string>;

export type FunctionProviderOptions = {
  name: string;
  fn: CompletionFunction;
  description?: string;
  /** Timeout in ms (default: timeouts.providerCall) */
  timeout?: number;
};

/** Provider backed by an in-process async function, e.g. a vendor SDK call. */
export class FunctionProvider implements ProviderAdapter {
  readonly name: string;
  readonly type = "function" as const;
  readonly description?: string;

  private fn: CompletionFunction;
  private timeout: number;

  constructor(opts: FunctionProviderOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().timeouts.providerCall;
  }

  async complete(prompt: string, constraints: CompletionConstraints = {}): Promise<string> {
    const timeout = constraints.timeoutMs ?? this.timeout;
    const start = Date.now();
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const timedOut = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new ProviderError("transient", `Completion timed out after ${timeout}ms`, { provider: this.name })),
          timeout,
        );
      });
      const output = await raceAbort(Promise.race([this.fn(prompt, constraints), timedOut]), constraints.signal);
      log.debug(`[${this.name}] Completion finished`, { durationMs: Date.now() - start });
      return output;
    } catch (err) {
      const classified = toProviderError(err, this.name);
      log.debug(`[${this.name}] Completion failed`, { kind: classified.kind, error: classified.message });
      throw classified;
    } finally {
      clearTimeout(timer);
    }
  }
}
