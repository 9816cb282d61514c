import { getConfig } from "../config.js";
import { createLogger } from "../utils/logger.js";
import type { EventSink, ProgressEvent } from "./types.js";

const log = createLogger("events");

export type EventRecord = {
  seq: number;
  generationId: string;
  at: number;
  event: ProgressEvent;
};

export type EventListener = (record: EventRecord) => void | Promise<void>;

type Subscription = {
  listener: EventListener;
  generationId?: string;
};

/**
 * Progress channel. `emit` only appends to a bounded buffer; subscribers are
 * notified on a later tick, so a slow consumer never holds up the engine.
 * Consumers can also poll the buffer.
 */
export class EventChannel implements EventSink {
  private buffer: EventRecord[] = [];
  private pending: EventRecord[] = [];
  private subscriptions = new Set<Subscription>();
  private flushScheduled = false;
  private nextSeq = 1;
  private capacity: number;

  constructor(opts: { bufferSize?: number } = {}) {
    this.capacity = opts.bufferSize ?? getConfig().events.bufferSize;
  }

  emit(generationId: string, event: ProgressEvent): void {
    const record: EventRecord = { seq: this.nextSeq++, generationId, at: Date.now(), event };
    this.buffer.push(record);
    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity);
    }
    if (this.subscriptions.size === 0) return;
    this.pending.push(record);
    if (!this.flushScheduled) {
      this.flushScheduled = true;
      setImmediate(() => this.flush());
    }
  }

  /** Listen to every event, or to one generation's events. Returns an unsubscribe function. */
  subscribe(listener: EventListener, generationId?: string): () => void {
    const sub: Subscription = { listener, generationId };
    this.subscriptions.add(sub);
    return () => {
      this.subscriptions.delete(sub);
    };
  }

  /** Buffered events for a generation with a sequence number above `afterSeq`. */
  poll(generationId: string, afterSeq = 0): EventRecord[] {
    return this.buffer.filter((r) => r.generationId === generationId && r.seq > afterSeq);
  }

  clear(generationId?: string): void {
    this.buffer = generationId ? this.buffer.filter((r) => r.generationId !== generationId) : [];
  }

  private flush(): void {
    this.flushScheduled = false;
    const batch = this.pending;
    this.pending = [];
    for (const record of batch) {
      for (const sub of this.subscriptions) {
        if (sub.generationId && sub.generationId !== record.generationId) continue;
        this.deliver(sub, record);
      }
    }
  }

  private deliver(sub: Subscription, record: EventRecord): void {
    const onError = (err: unknown) =>
      log.warn("Event listener failed", { type: record.event.type, error: String(err) });
    try {
      const result = sub.listener(record);
      if (result instanceof Promise) result.catch(onError);
    } catch (err) {
      onError(err);
    }
  }
}
