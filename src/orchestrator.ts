import { getConfig } from "./config.js";
import { ConfigError, NotFoundError } from "./errors.js";
import { EventChannel } from "./executor/events.js";
import { Executor } from "./executor/executor.js";
import type { FallbackOptions } from "./executor/fallback.js";
import type { EventSink, GenerationState, ProgressEvent } from "./executor/types.js";
import { createPromptGenerators } from "./generators/prompt-generators.js";
import type { ContextSource, GeneratorTable } from "./generators/types.js";
import type { CheckpointStore } from "./persistence/checkpoint-store.js";
import { KeyValueCheckpointStore, type KeyValueStore } from "./persistence/kv-store.js";
import { fromSnapshot } from "./persistence/snapshot.js";
import { Planner } from "./planner/planner.js";
import { countByState, isTerminal, terminalOutcome } from "./planner/task-graph.js";
import type { GeneratorOutput, TaskError, TaskGraph, TaskKind, TaskState } from "./planner/types.js";
import type { ProviderAdapter } from "./providers/adapter.js";
import { ProviderGateway, type ProviderRegistration, type ProviderStatus } from "./providers/gateway.js";
import type { ProviderHealthRecord, ProviderHealthRegistry } from "./providers/health.js";
import { ProviderHealthRecordSchema } from "./schemas.js";
import type { CircuitBreakerOptions } from "./utils/circuit-breaker.js";
import { createLogger } from "./utils/logger.js";
import type { RateLimiterOptions } from "./utils/rate-limiter.js";
import type { RetryPolicyOptions } from "./utils/retry.js";

const log = createLogger("orchestrator");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TaskStatus = {
  id: string;
  kind: TaskKind;
  title: string;
  state: TaskState;
  attempts: number;
  dependsOn: string[];
  provider?: string;
  lastError?: TaskError;
  result?: GeneratorOutput;
};

export type GenerationStatus = {
  generationId: string;
  requirement: string;
  appName: string;
  outcome: GenerationState;
  tasks: TaskStatus[];
  counts: Record<TaskState, number>;
  /** Latest checkpoint sequence known to this process. */
  sequence: number;
  /** Some state was not checkpointed; a resume may repeat work. */
  degraded: boolean;
  source: "memory" | "checkpoint";
  startedAt?: number;
  finishedAt?: number;
  /** Set when the run stopped on an internal error. */
  error?: string;
};

export type OrchestratorOptions = {
  /** Generators to use instead of the prompt-driven defaults, by task kind. */
  generators?: Partial<GeneratorTable>;
  checkpoints?: CheckpointStore;
  /** Key-value store for provider health, and for checkpoints when `checkpoints` is not given. */
  store?: KeyValueStore;
  health?: ProviderHealthRegistry;
  events?: EventSink;
  context?: ContextSource;
  /** Ask a provider to extract structured fields while planning. */
  planWithProvider?: boolean;
  retry?: Omit<RetryPolicyOptions, "deadlineMs">;
  fallback?: FallbackOptions;
  circuitBreaker?: CircuitBreakerOptions;
  rateLimit?: RateLimiterOptions | false;
  maxConcurrency?: number;
  taskTimeoutMs?: number;
};

type GenerationRecord = {
  graph: TaskGraph;
  state: GenerationState;
  controller: AbortController;
  sequence: number;
  degraded: boolean;
  startedAt: number;
  finishedAt?: number;
  error?: string;
};

type Generation = GenerationRecord & { done: Promise<GenerationStatus> };

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  readonly gateway: ProviderGateway;
  readonly events: EventSink;
  private executor: Executor;
  private planner: Planner;
  private checkpoints?: CheckpointStore;
  private store?: KeyValueStore;
  private generations = new Map<string, Generation>();
  private resuming = new Map<string, Promise<string>>();
  private opts: OrchestratorOptions;

  constructor(opts: OrchestratorOptions = {}) {
    this.opts = opts;
    this.gateway = new ProviderGateway({
      health: opts.health,
      circuitBreaker: opts.circuitBreaker,
      rateLimit: opts.rateLimit,
    });
    this.events = opts.events ?? new EventChannel();
    this.store = opts.store;
    this.checkpoints = opts.checkpoints ?? (opts.store ? new KeyValueCheckpointStore(opts.store) : undefined);
    this.executor = new Executor(
      this.gateway,
      { ...createPromptGenerators(), ...opts.generators },
      { retry: opts.retry, fallback: opts.fallback, context: opts.context },
    );
    this.planner = new Planner({
      gateway: opts.planWithProvider ? this.gateway : undefined,
      context: opts.context,
    });
  }

  addProvider(adapter: ProviderAdapter, registration?: ProviderRegistration): void {
    this.gateway.add(adapter, registration);
  }

  providers(opts: { ping?: boolean } = {}): Promise<ProviderStatus[]> {
    return this.gateway.status(opts);
  }

  /** Plan without running (dry run). */
  plan(requirement: string, constraints?: unknown): Promise<TaskGraph> {
    return this.planner.plan(requirement, constraints);
  }

  /** Plan a requirement and start generating it in the background. Returns the generation id. */
  async submit(requirement: string, constraints?: unknown): Promise<string> {
    this.assertProviders();
    const graph = await this.planner.plan(requirement, constraints);
    this.start(graph, { startSequence: 0, resumed: false });
    return graph.id;
  }

  /** Plan, run and wait for the terminal status. */
  async generate(requirement: string, constraints?: unknown): Promise<GenerationStatus> {
    const id = await this.submit(requirement, constraints);
    return this.wait(id);
  }

  /**
   * Continue a generation. A generation this process still holds resumes from
   * its in-memory graph, which is never older than the latest checkpoint;
   * otherwise it is rebuilt from the checkpoint store. Succeeded tasks are
   * never run again. Concurrent calls for one id share a single restart.
   */
  resume(generationId: string): Promise<string> {
    if (this.generations.get(generationId)?.state === "running") return Promise.resolve(generationId);
    const pending = this.resuming.get(generationId);
    if (pending) return pending;

    const restarted = this.restart(generationId).finally(() => this.resuming.delete(generationId));
    this.resuming.set(generationId, restarted);
    return restarted;
  }

  /** Stop a running generation. In-flight tasks return to pending so it can be resumed. */
  cancel(generationId: string): boolean {
    const gen = this.generations.get(generationId);
    if (!gen || gen.state !== "running") return false;
    log.info(`Cancelling generation ${generationId}`);
    gen.controller.abort(new Error("Generation cancelled"));
    return true;
  }

  async wait(generationId: string): Promise<GenerationStatus> {
    const gen = this.generations.get(generationId);
    if (!gen) throw new NotFoundError(`Unknown generation ${generationId}`);
    return gen.done;
  }

  /** Current status from memory, or rebuilt from the latest checkpoint. */
  async status(generationId: string): Promise<GenerationStatus> {
    const gen = this.generations.get(generationId);
    if (gen) return this.describe(gen);

    if (!this.checkpoints) throw new NotFoundError(`Unknown generation ${generationId}`);
    const snapshot = await this.checkpoints.load(generationId);
    const graph: TaskGraph = {
      id: snapshot.generationId,
      requirement: snapshot.requirement,
      appName: snapshot.appName,
      createdAt: snapshot.createdAt,
      tasks: snapshot.tasks,
    };
    return {
      ...summarize(graph),
      outcome: isTerminal(graph) ? terminalOutcome(graph) : "interrupted",
      sequence: snapshot.sequence,
      degraded: false,
      source: "checkpoint",
      finishedAt: isTerminal(graph) ? snapshot.savedAt : undefined,
    };
  }

  /** Generations held in memory, newest first. */
  list(): GenerationStatus[] {
    return [...this.generations.values()]
      .sort((a, b) => b.startedAt - a.startedAt)
      .map((gen) => this.describe(gen));
  }

  /** Load provider health saved by an earlier process. Returns how many records were restored. */
  async restoreHealth(): Promise<number> {
    if (!this.store) return 0;
    const records: ProviderHealthRecord[] = [];
    for (const name of this.gateway.names()) {
      const raw = await this.store.get(`health/${name}`);
      if (raw === undefined) continue;
      const parsed = ProviderHealthRecordSchema.safeParse(parseJson(raw));
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        log.warn(`Ignoring malformed health record for "${name}"`);
      }
    }
    this.gateway.health.restore(records);
    return records.length;
  }

  /** Cancel every running generation, wait for them to settle and save provider health. */
  async shutdown(): Promise<void> {
    const running = [...this.generations.values()].filter((g) => g.state === "running");
    for (const gen of running) gen.controller.abort(new Error("Orchestrator shutting down"));
    await Promise.all(running.map((g) => g.done));
    await this.persistHealth();
    log.info("Orchestrator stopped", { cancelled: running.length });
  }

  // -------------------------------------------------------------------------

  private async restart(generationId: string): Promise<string> {
    this.assertProviders();
    const current = this.generations.get(generationId);
    if (current) {
      this.start(current.graph, { startSequence: current.sequence, resumed: true });
      return generationId;
    }
    if (!this.checkpoints) throw new NotFoundError(`Unknown generation ${generationId}`);

    const { graph, sequence, requeued } = fromSnapshot(await this.checkpoints.load(generationId));
    if (requeued.length > 0) {
      log.info(`Requeued ${requeued.length} interrupted task(s)`, { generationId, tasks: requeued.map((r) => r.taskId) });
    }
    this.start(graph, { startSequence: sequence, resumed: true });
    return generationId;
  }

  private assertProviders(): void {
    if (this.gateway.names().length === 0) {
      throw new ConfigError("No providers registered; call addProvider() first");
    }
  }

  private start(graph: TaskGraph, run: { startSequence: number; resumed: boolean }): void {
    const record: GenerationRecord = {
      graph,
      state: "running",
      controller: new AbortController(),
      sequence: run.startSequence,
      degraded: this.generations.get(graph.id)?.degraded ?? false,
      startedAt: Date.now(),
    };
    this.generations.set(graph.id, Object.assign(record, { done: this.drive(record, run) }));
  }

  /** Run a generation to the end. Never rejects: failures are recorded on the generation. */
  private async drive(gen: GenerationRecord, run: { startSequence: number; resumed: boolean }): Promise<GenerationStatus> {
    try {
      const result = await this.executor.run(gen.graph, {
        maxConcurrency: this.opts.maxConcurrency,
        taskTimeoutMs: this.opts.taskTimeoutMs,
        signal: gen.controller.signal,
        events: this.trackingSink(gen),
        checkpoints: this.checkpoints,
        startSequence: run.startSequence,
        resumed: run.resumed,
      });
      gen.state = result.outcome;
      gen.sequence = result.sequence;
      gen.degraded = gen.degraded || result.degraded;
      gen.finishedAt = Date.now();
      await this.afterRun(gen);
    } catch (err) {
      gen.state = "failed";
      gen.error = err instanceof Error ? err.message : String(err);
      gen.finishedAt = Date.now();
      log.error(`Generation ${gen.graph.id} stopped`, { error: gen.error });
    }
    return this.describe(gen);
  }

  /** Forward events, noting durability loss on the generation record. */
  private trackingSink(gen: GenerationRecord): EventSink {
    return {
      emit: (generationId: string, event: ProgressEvent) => {
        if (event.type === "checkpoint:degraded") gen.degraded = true;
        this.events.emit(generationId, event);
      },
    };
  }

  private async afterRun(gen: GenerationRecord): Promise<void> {
    const terminal = gen.state === "completed" || gen.state === "partial" || gen.state === "failed";
    if (terminal && this.checkpoints && getConfig().checkpoint.compactOnFinish && !gen.degraded) {
      try {
        const removed = await this.checkpoints.compact(gen.graph.id);
        log.debug(`Compacted ${removed} checkpoint(s)`, { generationId: gen.graph.id });
      } catch (err) {
        log.warn("Checkpoint compaction failed", { generationId: gen.graph.id, error: String(err) });
      }
    }
    await this.persistHealth();
    this.evict();
  }

  private async persistHealth(): Promise<void> {
    const store = this.store;
    if (!store) return;
    try {
      for (const record of this.gateway.health.snapshot()) {
        await store.put(`health/${record.provider}`, JSON.stringify(record));
      }
    } catch (err) {
      log.warn("Could not persist provider health", { error: err instanceof Error ? err.message : String(err) });
    }
  }

  /** Keep at most `limits.maxGenerations` finished generations in memory. */
  private evict(): void {
    const { maxGenerations } = getConfig().limits;
    const finished = [...this.generations.entries()]
      .filter(([, g]) => g.state !== "running")
      .sort(([, a], [, b]) => (a.finishedAt ?? 0) - (b.finishedAt ?? 0));
    while (finished.length > maxGenerations) {
      const oldest = finished.shift();
      if (!oldest) break;
      this.generations.delete(oldest[0]);
      log.debug(`Evicted generation ${oldest[0]} from memory`);
    }
  }

  private describe(gen: GenerationRecord): GenerationStatus {
    return {
      ...summarize(gen.graph),
      outcome: gen.state,
      sequence: gen.sequence,
      degraded: gen.degraded,
      source: "memory",
      startedAt: gen.startedAt,
      finishedAt: gen.finishedAt,
      error: gen.error,
    };
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function summarize(graph: TaskGraph): Pick<GenerationStatus, "generationId" | "requirement" | "appName" | "tasks" | "counts"> {
  return {
    generationId: graph.id,
    requirement: graph.requirement,
    appName: graph.appName,
    counts: countByState(graph),
    tasks: graph.tasks.map((t) => ({
      id: t.id,
      kind: t.kind,
      title: t.title,
      state: t.state,
      attempts: t.attempts,
      dependsOn: [...t.dependsOn],
      provider: t.provider,
      lastError: t.lastError,
      result: t.result,
    })),
  };
}

