import type { CheckpointStore } from "../persistence/checkpoint-store.js";
import type { TaskError, TaskGraph, TaskState } from "../planner/types.js";

export type GenerationOutcome = "completed" | "partial" | "failed";

/**
 * Overall state of a generation: still running, stopped by the caller,
 * stopped by a process exit (known only from a checkpoint), or a terminal outcome.
 */
export type GenerationState = "running" | "cancelled" | "interrupted" | GenerationOutcome;

export type ProgressEvent =
  | { type: "generation:started"; taskCount: number; resumed: boolean }
  | { type: "task:started"; taskId: string; attempt: number; provider?: string }
  | { type: "task:retrying"; taskId: string; attempt: number; error: TaskError; delayMs: number; nextProvider: string }
  | { type: "task:succeeded"; taskId: string; attempt: number; provider?: string }
  | { type: "task:failed"; taskId: string; attempt: number; error: TaskError }
  | { type: "task:skipped"; taskId: string; blockedBy: string }
  | { type: "task:requeued"; taskId: string; from: TaskState }
  | { type: "checkpoint:degraded"; sequence: number; error: string }
  | { type: "checkpoint:recovered"; sequence: number }
  | { type: "generation:finished"; outcome: GenerationState; durationMs: number };

/** Outbound progress channel. Implementations must not block the caller. */
export interface EventSink {
  emit(generationId: string, event: ProgressEvent): void;
}

export type ExecutionOptions = {
  maxConcurrency?: number;
  /** Wall-clock budget per task, dispatch to terminal. */
  taskTimeoutMs?: number;
  signal?: AbortSignal;
  events?: EventSink;
  checkpoints?: CheckpointStore;
  /** Sequence of the checkpoint the graph was rebuilt from; the next write uses this + 1. */
  startSequence?: number;
  resumed?: boolean;
};

export type ExecutionResult = {
  graph: TaskGraph;
  outcome: GenerationState;
  durationMs: number;
  /** Set when at least one checkpoint write was given up on. */
  degraded: boolean;
  /** Sequence of the last checkpoint written (or attempted). */
  sequence: number;
};
