import { GraphIntegrityError } from "../errors.js";
import type { TaskState } from "./types.js";

/**
 * Allowed task transitions.
 *
 * `running|retrying → pending` is taken only when a generation is cancelled,
 * so the task resumes cleanly. `pending → running` also covers re-dispatch of
 * a task recovered from a checkpoint.
 */
const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ["running", "skipped"],
  running: ["succeeded", "retrying", "failed", "pending"],
  retrying: ["running", "failed", "pending"],
  succeeded: [],
  failed: [],
  skipped: [],
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(taskId: string, from: TaskState, to: TaskState): void {
  if (!canTransition(from, to)) {
    throw new GraphIntegrityError(
      "INVALID_TRANSITION",
      `Task "${taskId}" cannot move from ${from} to ${to}`,
    );
  }
}
