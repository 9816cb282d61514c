import { CheckpointError } from "../errors.js";
import { assertConsistent, type CheckpointSnapshot } from "./snapshot.js";

export type CheckpointSummary = {
  generationId: string;
  /** Highest stored sequence. */
  sequence: number;
  savedAt: number;
  /** Checkpoints currently kept for the generation. */
  count: number;
};

/**
 * Durable, append-only record of task-graph snapshots, keyed by generation id
 * and a strictly increasing sequence number.
 */
export interface CheckpointStore {
  save(generationId: string, snapshot: CheckpointSnapshot, sequence: number): Promise<void>;
  /** Latest snapshot for the generation. Throws NotFoundError when there is none. */
  load(generationId: string): Promise<CheckpointSnapshot>;
  list(): Promise<CheckpointSummary[]>;
  /** Drop every checkpoint but the latest. Returns how many were removed. */
  compact(generationId: string): Promise<number>;
}

/** Checks shared by every store before a snapshot is written. */
export function checkWrite(
  generationId: string,
  snapshot: CheckpointSnapshot,
  sequence: number,
  latest: number | undefined,
): void {
  if (snapshot.generationId !== generationId || snapshot.sequence !== sequence) {
    throw new CheckpointError(
      "CHECKPOINT_CONFLICT",
      `Snapshot ${snapshot.generationId}#${snapshot.sequence} does not match write ${generationId}#${sequence}`,
    );
  }
  if (latest !== undefined && sequence <= latest) {
    throw new CheckpointError(
      "CHECKPOINT_CONFLICT",
      `Checkpoint ${generationId}#${sequence} is not newer than stored #${latest}`,
    );
  }
  assertConsistent(snapshot);
}
