import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import { CheckpointError, NotFoundError } from "../errors.js";
import { checkWrite, type CheckpointStore, type CheckpointSummary } from "./checkpoint-store.js";
import { decodeSnapshot, type CheckpointSnapshot } from "./snapshot.js";

const DEFAULT_DB_DIR = join(homedir(), ".forgeflow");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "checkpoints.db");

type CheckpointRow = {
  generation_id: string;
  sequence: number;
  saved_at: number;
  snapshot: string;
};

type SummaryRow = {
  generation_id: string;
  sequence: number;
  saved_at: number;
  count: number;
};

/** Checkpoint store backed by a local SQLite file. Pass ":memory:" for a throwaway database. */
export class SqliteCheckpointStore implements CheckpointStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        generation_id TEXT NOT NULL,
        sequence      INTEGER NOT NULL,
        saved_at      INTEGER NOT NULL,
        snapshot      TEXT NOT NULL,
        PRIMARY KEY (generation_id, sequence)
      );
      CREATE INDEX IF NOT EXISTS idx_checkpoints_saved ON checkpoints(saved_at DESC);
    `);
  }

  async save(generationId: string, snapshot: CheckpointSnapshot, sequence: number): Promise<void> {
    const insert = this.db.transaction(() => {
      const latest = this.db
        .prepare<[string], { sequence: number | null }>(
          "SELECT MAX(sequence) AS sequence FROM checkpoints WHERE generation_id = ?",
        )
        .get(generationId);
      checkWrite(generationId, snapshot, sequence, latest?.sequence ?? undefined);
      this.db
        .prepare<[string, number, number, string]>(
          "INSERT INTO checkpoints (generation_id, sequence, saved_at, snapshot) VALUES (?, ?, ?, ?)",
        )
        .run(generationId, sequence, snapshot.savedAt, JSON.stringify(snapshot));
    });
    this.guard(() => insert());
  }

  async load(generationId: string): Promise<CheckpointSnapshot> {
    const row = this.guard(() =>
      this.db
        .prepare<[string], CheckpointRow>(
          "SELECT * FROM checkpoints WHERE generation_id = ? ORDER BY sequence DESC LIMIT 1",
        )
        .get(generationId),
    );
    if (!row) throw new NotFoundError(`No checkpoint for generation ${generationId}`);
    return decodeSnapshot(row.snapshot);
  }

  async list(limit = 50): Promise<CheckpointSummary[]> {
    const rows = this.guard(() =>
      this.db
        .prepare<[number], SummaryRow>(`
          SELECT generation_id, MAX(sequence) AS sequence, MAX(saved_at) AS saved_at, COUNT(*) AS count
          FROM checkpoints GROUP BY generation_id ORDER BY saved_at DESC LIMIT ?
        `)
        .all(limit),
    );
    return rows.map((row) => ({
      generationId: row.generation_id,
      sequence: row.sequence,
      savedAt: row.saved_at,
      count: row.count,
    }));
  }

  async compact(generationId: string): Promise<number> {
    const result = this.guard(() =>
      this.db
        .prepare<[string, string]>(`
          DELETE FROM checkpoints WHERE generation_id = ? AND sequence <
            (SELECT MAX(sequence) FROM checkpoints WHERE generation_id = ?)
        `)
        .run(generationId, generationId),
    );
    return result.changes;
  }

  /** Delete every checkpoint of a generation. Returns true if any were removed. */
  delete(generationId: string): boolean {
    const result = this.db.prepare<[string]>("DELETE FROM checkpoints WHERE generation_id = ?").run(generationId);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(op: () => T): T {
    try {
      return op();
    } catch (err) {
      if (err instanceof Database.SqliteError) {
        throw new CheckpointError("CHECKPOINT_UNAVAILABLE", `SQLite checkpoint store failed: ${err.message}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
