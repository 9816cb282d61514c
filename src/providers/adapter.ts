export type CompletionConstraints = {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** System message prepended by providers that support one. */
  system?: string;
  /** Per-call timeout in ms. */
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * Uniform LLM completion capability. Implementations throw ProviderError
 * (or anything `toProviderError` can classify) on failure.
 */
export interface ProviderAdapter {
  name: string;
  type: "function" | "http" | string;
  description?: string;

  complete(prompt: string, constraints: CompletionConstraints): Promise<string>;
  healthCheck?(): Promise<boolean>;
}
