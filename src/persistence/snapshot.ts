import { CheckpointError, GraphIntegrityError, ParseError } from "../errors.js";
import { validate } from "../planner/task-graph.js";
import type { TaskGraph, TaskState } from "../planner/types.js";
import { CheckpointSnapshotSchema, formatIssues, type CheckpointSnapshot } from "../schemas.js";

export type { CheckpointSnapshot };

export type RestoredGraph = {
  graph: TaskGraph;
  sequence: number;
  /** Tasks that were in flight when the snapshot was taken and are pending again. */
  requeued: { taskId: string; from: TaskState }[];
};

export function toSnapshot(graph: TaskGraph, sequence: number): CheckpointSnapshot {
  return {
    generationId: graph.id,
    sequence,
    requirement: graph.requirement,
    appName: graph.appName,
    createdAt: graph.createdAt,
    savedAt: Date.now(),
    tasks: structuredClone(graph.tasks),
  };
}

/**
 * Rebuild an in-memory graph from a snapshot. Tasks recorded as running or
 * retrying were interrupted and go back to pending; their attempt counts are
 * kept.
 */
export function fromSnapshot(snapshot: CheckpointSnapshot): RestoredGraph {
  assertConsistent(snapshot);
  const requeued: RestoredGraph["requeued"] = [];
  const tasks = structuredClone(snapshot.tasks).map((task) => {
    if (task.state !== "running" && task.state !== "retrying") return task;
    requeued.push({ taskId: task.id, from: task.state });
    return { ...task, state: "pending" as const, startedAt: undefined };
  });

  const graph: TaskGraph = {
    id: snapshot.generationId,
    requirement: snapshot.requirement,
    appName: snapshot.appName,
    createdAt: snapshot.createdAt,
    tasks,
  };
  validate(graph);
  return { graph, sequence: snapshot.sequence, requeued };
}

/** No task may be recorded as succeeded while one of its dependencies is missing or did not succeed. */
export function assertConsistent(snapshot: CheckpointSnapshot): void {
  const states = new Map(snapshot.tasks.map((t) => [t.id, t.state]));
  for (const task of snapshot.tasks) {
    if (task.state !== "succeeded") continue;
    for (const dep of task.dependsOn) {
      const depState = states.get(dep);
      if (depState !== "succeeded") {
        throw new GraphIntegrityError(
          "GRAPH_INVALID",
          `Checkpoint ${snapshot.generationId}#${snapshot.sequence}: task "${task.id}" succeeded but dependency "${dep}" is ${depState ?? "missing"}`,
        );
      }
    }
  }
}

/** Parse and validate a stored snapshot. */
export function decodeSnapshot(raw: string): CheckpointSnapshot {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new CheckpointError("CHECKPOINT_CORRUPT", "Stored checkpoint is not valid JSON", {
      cause: new ParseError(err instanceof Error ? err.message : String(err)),
    });
  }
  const result = CheckpointSnapshotSchema.safeParse(value);
  if (!result.success) {
    throw new CheckpointError("CHECKPOINT_CORRUPT", `Stored checkpoint is malformed: ${formatIssues(result.error)}`);
  }
  return result.data;
}
