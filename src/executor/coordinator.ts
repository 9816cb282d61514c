import { getConfig } from "../config.js";
import { GraphIntegrityError } from "../errors.js";
import type { CheckpointStore } from "../persistence/checkpoint-store.js";
import { toSnapshot, type CheckpointSnapshot } from "../persistence/snapshot.js";
import { assertTransition } from "../planner/state-machine.js";
import { getTask } from "../planner/task-graph.js";
import type { Task, TaskGraph, TaskState } from "../planner/types.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { EventSink } from "./types.js";

const log = createLogger("coordinator");

export type TaskPatch = Partial<Pick<Task, "lastError" | "provider" | "result" | "startedAt" | "completedAt">>;

export type CoordinatorOptions = {
  checkpoints?: CheckpointStore;
  events?: EventSink;
  /** Sequence of the checkpoint the graph came from. */
  startSequence?: number;
};

/**
 * Single writer for a task graph. Every transition is validated and applied
 * synchronously, then a checkpoint of the resulting state is queued; writes
 * leave in sequence order, one at a time.
 */
export class GraphCoordinator {
  readonly graph: TaskGraph;
  private checkpoints?: CheckpointStore;
  private events?: EventSink;
  private seq: number;
  private writes: Promise<void> = Promise.resolve();
  private fatal?: GraphIntegrityError;
  private _degraded = false;
  private lastWriteFailed = false;

  constructor(graph: TaskGraph, opts: CoordinatorOptions = {}) {
    this.graph = graph;
    this.checkpoints = opts.checkpoints;
    this.events = opts.events;
    this.seq = opts.startSequence ?? 0;
  }

  /** Sequence number of the most recent snapshot taken. */
  get sequence(): number {
    return this.seq;
  }

  /** True once any checkpoint write was abandoned. */
  get degraded(): boolean {
    return this._degraded;
  }

  /**
   * Apply a transition and queue its checkpoint. The returned promise settles
   * once that checkpoint is stored or given up on; it rejects only for an
   * integrity failure.
   */
  mark(taskId: string, to: TaskState, patch: TaskPatch = {}): Promise<void> {
    if (this.fatal) throw this.fatal;
    const task = getTask(this.graph, taskId);
    assertTransition(taskId, task.state, to);

    task.state = to;
    if (to === "running") task.attempts++;
    Object.assign(task, patch);
    log.debug(`Task "${taskId}" → ${to}`, { attempts: task.attempts });
    return this.checkpoint();
  }

  /** Queue a checkpoint of the current state without a transition. */
  checkpoint(): Promise<void> {
    if (!this.checkpoints) return Promise.resolve();
    const sequence = ++this.seq;
    const snapshot = toSnapshot(this.graph, sequence);
    this.writes = this.writes.then(() => this.persist(sequence, snapshot));
    return this.writes;
  }

  /** Wait for every queued checkpoint write. */
  flush(): Promise<void> {
    return this.writes;
  }

  private async persist(sequence: number, snapshot: CheckpointSnapshot): Promise<void> {
    const store = this.checkpoints;
    if (!store || this.fatal) return;
    const { retry } = getConfig();
    try {
      await withRetry(() => store.save(this.graph.id, snapshot, sequence), {
        maxAttempts: retry.checkpointAttempts,
        baseDelayMs: retry.checkpointBaseDelayMs,
        onRetry: ({ attempt, delayMs }) =>
          log.debug(`Checkpoint ${this.graph.id}#${sequence} write failed, retrying`, { attempt, delayMs }),
      });
      if (this.lastWriteFailed) {
        this.lastWriteFailed = false;
        log.info(`Checkpoint writes for ${this.graph.id} recovered at #${sequence}`);
        this.events?.emit(this.graph.id, { type: "checkpoint:recovered", sequence });
      }
    } catch (err) {
      if (err instanceof GraphIntegrityError) {
        this.fatal = err;
        throw err;
      }
      this._degraded = true;
      this.lastWriteFailed = true;
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Checkpoint ${this.graph.id}#${sequence} not stored; continuing in memory`, { error: message });
      this.events?.emit(this.graph.id, { type: "checkpoint:degraded", sequence, error: message });
    }
  }
}
