import type { CompletionConstraints } from "../providers/adapter.js";
import type { GeneratorOutput, Task, TaskKind } from "../planner/types.js";

/** Retrieval over prior documents or code; snippets are handed to generators as context. */
export interface ContextSource {
  retrieve(query: string, limit: number): Promise<string[]>;
}

/** What a generator gets for one attempt at one task. */
export type GenerationContext = {
  generationId: string;
  /** Provider assigned to this attempt. */
  provider: string;
  /** 1-based, shared across providers. */
  attempt: number;
  /** Why the previous output was rejected, when this attempt is a revision. */
  revisionNote?: string;
  signal: AbortSignal;
  /** Results of the task's dependencies, by task id. */
  dependencies: Record<string, GeneratorOutput>;
  /** Call the assigned provider through the gateway. */
  complete(prompt: string, constraints?: Omit<CompletionConstraints, "signal">): Promise<string>;
  retrieve(query: string, limit?: number): Promise<string[]>;
};

export interface ModuleGenerator {
  generate(task: Task, ctx: GenerationContext): Promise<GeneratorOutput>;
  /** Return a description of what is wrong with the output, or undefined when it is acceptable. */
  validate?(output: GeneratorOutput, task: Task): string | undefined;
}

/** Capability table: one generator per task kind. */
export type GeneratorTable = Record<TaskKind, ModuleGenerator>;
