import { CheckpointError, GraphIntegrityError, NotFoundError, ParseError } from "../errors.js";
import { checkWrite, type CheckpointStore, type CheckpointSummary } from "./checkpoint-store.js";
import { decodeSnapshot, type CheckpointSnapshot } from "./snapshot.js";

/** Minimal durable key-value capability used for checkpoints and provider health. */
export interface KeyValueStore {
  put(key: string, value: string): Promise<void>;
  get(key: string): Promise<string | undefined>;
  delete(key: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
  private data = new Map<string, string>();

  async put(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }

  keys(): string[] {
    return [...this.data.keys()];
  }

  get size(): number {
    return this.data.size;
  }
}

type Head = {
  sequence: number;
  savedAt: number;
  /** Lowest sequence that may still be stored. */
  first: number;
  count: number;
};

const INDEX_KEY = "checkpoint/index";

function parseStored(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new CheckpointError("CHECKPOINT_CORRUPT", `${what} is not valid JSON`, {
      cause: new ParseError(err instanceof Error ? err.message : String(err)),
    });
  }
}

const headKey = (id: string) => `checkpoint/${id}/head`;
const entryKey = (id: string, seq: number) => `checkpoint/${id}/${seq}`;

/**
 * Checkpoint store over a plain key-value store. Each snapshot lives under
 * `checkpoint/<id>/<seq>`; `checkpoint/<id>/head` points at the latest one.
 * Writes are serialized so the head pointer and index stay in step.
 */
export class KeyValueCheckpointStore implements CheckpointStore {
  private kv: KeyValueStore;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(kv: KeyValueStore) {
    this.kv = kv;
  }

  save(generationId: string, snapshot: CheckpointSnapshot, sequence: number): Promise<void> {
    return this.serialize(async () => {
      const head = await this.readHead(generationId);
      checkWrite(generationId, snapshot, sequence, head?.sequence);
      await this.io(() => this.kv.put(entryKey(generationId, sequence), JSON.stringify(snapshot)));
      const next: Head = {
        sequence,
        savedAt: snapshot.savedAt,
        first: head?.first ?? sequence,
        count: (head?.count ?? 0) + 1,
      };
      await this.io(() => this.kv.put(headKey(generationId), JSON.stringify(next)));
      if (!head) {
        const index = await this.readIndex();
        index.push(generationId);
        await this.io(() => this.kv.put(INDEX_KEY, JSON.stringify(index)));
      }
    });
  }

  async load(generationId: string): Promise<CheckpointSnapshot> {
    const head = await this.readHead(generationId);
    if (!head) throw new NotFoundError(`No checkpoint for generation ${generationId}`);
    const raw = await this.io(() => this.kv.get(entryKey(generationId, head.sequence)));
    if (raw === undefined) {
      throw new CheckpointError("CHECKPOINT_CORRUPT", `Checkpoint ${generationId}#${head.sequence} is missing`);
    }
    return decodeSnapshot(raw);
  }

  async list(): Promise<CheckpointSummary[]> {
    const summaries: CheckpointSummary[] = [];
    for (const generationId of await this.readIndex()) {
      const head = await this.readHead(generationId);
      if (!head) continue;
      summaries.push({
        generationId,
        sequence: head.sequence,
        savedAt: head.savedAt,
        count: head.count,
      });
    }
    return summaries.sort((a, b) => b.savedAt - a.savedAt);
  }

  compact(generationId: string): Promise<number> {
    return this.serialize(async () => {
      const head = await this.readHead(generationId);
      if (!head) return 0;
      let removed = 0;
      // Sequences skipped by failed writes leave gaps.
      for (let seq = head.first; seq < head.sequence; seq++) {
        const key = entryKey(generationId, seq);
        if ((await this.io(() => this.kv.get(key))) === undefined) continue;
        await this.io(() => this.kv.delete(key));
        removed++;
      }
      const next: Head = { ...head, first: head.sequence, count: 1 };
      await this.io(() => this.kv.put(headKey(generationId), JSON.stringify(next)));
      return removed;
    });
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn, fn);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async readHead(generationId: string): Promise<Head | undefined> {
    const raw = await this.io(() => this.kv.get(headKey(generationId)));
    if (raw === undefined) return undefined;
    const head = parseStored(raw, `Head pointer for ${generationId}`);
    if (!isHead(head)) {
      throw new CheckpointError("CHECKPOINT_CORRUPT", `Head pointer for ${generationId} is malformed`);
    }
    return head;
  }

  private async readIndex(): Promise<string[]> {
    const raw = await this.io(() => this.kv.get(INDEX_KEY));
    if (raw === undefined) return [];
    const index = parseStored(raw, "Checkpoint index");
    return Array.isArray(index) ? index.filter((v): v is string => typeof v === "string") : [];
  }

  /** Wrap store failures so the engine can tell an outage from a defect. */
  private async io<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof CheckpointError || err instanceof GraphIntegrityError) throw err;
      throw new CheckpointError("CHECKPOINT_UNAVAILABLE", `Key-value store failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }
}

function isHead(value: unknown): value is Head {
  return (
    typeof value === "object" &&
    value !== null &&
    "sequence" in value &&
    typeof value.sequence === "number" &&
    "savedAt" in value &&
    typeof value.savedAt === "number" &&
    "first" in value &&
    typeof value.first === "number" &&
    "count" in value &&
    typeof value.count === "number"
  );
}
