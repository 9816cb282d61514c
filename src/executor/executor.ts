import { getConfig } from "../config.js";
import { ConfigError, GraphIntegrityError, ProviderError, ValidationError, toProviderError } from "../errors.js";
import type { GeneratorTable, ContextSource, GenerationContext } from "../generators/types.js";
import {
  getTask,
  isTerminal,
  pendingDownstream,
  readyTasks,
  terminalOutcome,
  topologicalSort,
} from "../planner/task-graph.js";
import type { GeneratorOutput, Task, TaskError, TaskGraph } from "../planner/types.js";
import type { ProviderGateway } from "../providers/gateway.js";
import { raceAbort, sleep } from "../utils/abort.js";
import { createLogger } from "../utils/logger.js";
import { RetryPolicy, type RetryPolicyOptions } from "../utils/retry.js";
import { GraphCoordinator } from "./coordinator.js";
import { FallbackCoordinator, type FallbackOptions } from "./fallback.js";
import type { ExecutionOptions, ExecutionResult, GenerationState, ProgressEvent } from "./types.js";

const log = createLogger("executor");

export type ExecutorOptions = {
  retry?: Omit<RetryPolicyOptions, "deadlineMs">;
  fallback?: FallbackOptions;
  context?: ContextSource;
};

/** Per-run state shared by every task execution of one `run` call. */
type RunContext = {
  coordinator: GraphCoordinator;
  fallback: FallbackCoordinator;
  signal: AbortSignal;
  taskTimeoutMs: number;
  emit: (event: ProgressEvent) => void;
};

/**
 * Drives a task graph to a terminal outcome: dispatches ready tasks to
 * providers up to a concurrency limit, recovers failures through the fallback
 * coordinator and checkpoints every transition.
 */
export class Executor {
  private gateway: ProviderGateway;
  private generators: GeneratorTable;
  private opts: ExecutorOptions;

  constructor(gateway: ProviderGateway, generators: GeneratorTable, opts: ExecutorOptions = {}) {
    this.gateway = gateway;
    this.generators = generators;
    this.opts = opts;
  }

  async run(graph: TaskGraph, opts: ExecutionOptions = {}): Promise<ExecutionResult> {
    const start = Date.now();
    const config = getConfig();
    const maxConcurrency = opts.maxConcurrency ?? config.limits.maxConcurrency;
    const taskTimeoutMs = opts.taskTimeoutMs ?? config.timeouts.task;
    if (maxConcurrency < 1) {
      throw new ConfigError(`maxConcurrency must be at least 1 (got ${maxConcurrency})`);
    }
    if (this.gateway.names().length === 0) {
      throw new ConfigError("No providers registered");
    }

    // Internal controller so a fatal error can stop in-flight tasks too.
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(opts.signal?.reason);
    if (opts.signal?.aborted) controller.abort(opts.signal.reason);
    opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const emit = (event: ProgressEvent) => opts.events?.emit(graph.id, event);
    const run: RunContext = {
      coordinator: new GraphCoordinator(graph, {
        checkpoints: opts.checkpoints,
        events: opts.events,
        startSequence: opts.startSequence,
      }),
      fallback: new FallbackCoordinator(
        this.gateway,
        new RetryPolicy({ ...this.opts.retry, deadlineMs: taskTimeoutMs }),
        this.opts.fallback,
      ),
      signal: controller.signal,
      taskTimeoutMs,
      emit,
    };

    log.info(`Generation ${graph.id} ${opts.resumed ? "resuming" : "starting"}`, {
      tasks: graph.tasks.length,
      maxConcurrency,
    });
    emit({ type: "generation:started", taskCount: graph.tasks.length, resumed: opts.resumed ?? false });

    const inFlight = new Map<string, Promise<void>>();
    try {
      await this.requeueInterrupted(run);
      await this.skipBlocked(run);

      while (!controller.signal.aborted) {
        for (const task of readyTasks(graph)) {
          if (inFlight.size >= maxConcurrency) break;
          const provider = run.fallback.selectProvider() ?? this.gateway.names()[0];
          const execution = this.execute(run, task, provider).finally(() => inFlight.delete(task.id));
          inFlight.set(task.id, execution);
        }
        if (inFlight.size === 0) break;
        await Promise.race(inFlight.values());
      }
      await Promise.all(inFlight.values());
      await run.coordinator.flush();
    } catch (err) {
      controller.abort(err);
      await Promise.allSettled(inFlight.values());
      log.error(`Generation ${graph.id} aborted by an integrity failure`, {
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      opts.signal?.removeEventListener("abort", onCallerAbort);
    }

    const outcome = this.outcomeOf(graph, opts.signal);
    const durationMs = Date.now() - start;
    log.info(`Generation ${graph.id} finished: ${outcome}`, { durationMs, degraded: run.coordinator.degraded });
    emit({ type: "generation:finished", outcome, durationMs });

    return {
      graph,
      outcome,
      durationMs,
      degraded: run.coordinator.degraded,
      sequence: run.coordinator.sequence,
    };
  }

  private outcomeOf(graph: TaskGraph, signal?: AbortSignal): GenerationState {
    if (isTerminal(graph)) return terminalOutcome(graph);
    if (signal?.aborted) return "cancelled";
    log.error(`Generation ${graph.id} stopped with open tasks and nothing ready`);
    return "failed";
  }

  /** Tasks left running or retrying by an earlier process go back to pending. */
  private async requeueInterrupted(run: RunContext): Promise<void> {
    for (const task of run.coordinator.graph.tasks) {
      if (task.state !== "running" && task.state !== "retrying") continue;
      const from = task.state;
      await run.coordinator.mark(task.id, "pending", { startedAt: undefined });
      run.emit({ type: "task:requeued", taskId: task.id, from });
    }
  }

  /** Skip pending tasks that sit behind a failed or skipped dependency. */
  private async skipBlocked(run: RunContext): Promise<void> {
    const graph = run.coordinator.graph;
    for (const task of topologicalSort(graph)) {
      if (task.state !== "pending") continue;
      const blocker = task.dependsOn.find((dep) => {
        const state = getTask(graph, dep).state;
        return state === "failed" || state === "skipped";
      });
      if (blocker) await this.skip(run, task, blocker);
    }
  }

  private async skipDownstream(run: RunContext, failedId: string): Promise<void> {
    for (const task of pendingDownstream(run.coordinator.graph, failedId)) {
      await this.skip(run, task, failedId);
    }
  }

  private async skip(run: RunContext, task: Task, blockedBy: string): Promise<void> {
    await run.coordinator.mark(task.id, "skipped", { completedAt: Date.now() });
    log.info(`Task "${task.id}" skipped: blocked by "${blockedBy}"`);
    run.emit({ type: "task:skipped", taskId: task.id, blockedBy });
  }

  /** One task from dispatch to a terminal state, or back to pending on cancellation. */
  private async execute(run: RunContext, task: Task, firstProvider: string): Promise<void> {
    const { coordinator, emit } = run;
    const started = Date.now();
    const controller = new AbortController();
    const onRunAbort = () => controller.abort(run.signal.reason);
    run.signal.addEventListener("abort", onRunAbort, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new ProviderError("transient", `Task "${task.id}" exceeded ${run.taskTimeoutMs}ms`));
    }, run.taskTimeoutMs);

    let provider = firstProvider;
    let rateLimitStreak = 0;
    let revisionNote: string | undefined;

    try {
      // Marked synchronously so the dispatch loop never sees this task as ready again.
      const dispatched = coordinator.mark(task.id, "running", {
        provider,
        startedAt: started,
        completedAt: undefined,
      });
      log.info(`Dispatching "${task.id}" to provider "${provider}"`, { attempt: task.attempts });
      emit({ type: "task:started", taskId: task.id, attempt: task.attempts, provider });
      await dispatched;

      for (;;) {
        try {
          const output = await this.attempt(run, task, provider, controller.signal, revisionNote);
          await coordinator.mark(task.id, "succeeded", {
            result: output,
            lastError: undefined,
            completedAt: Date.now(),
          });
          log.info(`Task "${task.id}" succeeded`, { attempts: task.attempts, provider });
          emit({ type: "task:succeeded", taskId: task.id, attempt: task.attempts, provider });
          return;
        } catch (err) {
          if (err instanceof GraphIntegrityError || controller.signal.aborted) throw err;

          const error = toProviderError(err, provider);
          rateLimitStreak = error.kind === "rate_limited" ? rateLimitStreak + 1 : 0;
          revisionNote = error.kind === "invalid_output" ? error.message : undefined;
          const lastError: TaskError = { kind: error.kind, message: error.message, provider };

          const decision = run.fallback.decide({
            task,
            error,
            provider,
            rateLimitStreak,
            elapsedMs: Date.now() - started,
          });

          if (decision.action === "fail") {
            log.warn(`Task "${task.id}" failed: ${decision.reason}`, { kind: error.kind, error: error.message });
            await this.fail(run, task, lastError);
            return;
          }

          await coordinator.mark(task.id, "retrying", { lastError });
          log.info(`Task "${task.id}" retrying on "${decision.provider}" in ${decision.delayMs}ms`, {
            kind: error.kind,
            attempt: task.attempts,
          });
          emit({
            type: "task:retrying",
            taskId: task.id,
            attempt: task.attempts,
            error: lastError,
            delayMs: decision.delayMs,
            nextProvider: decision.provider,
          });
          if (decision.switched) rateLimitStreak = 0;
          await sleep(decision.delayMs, controller.signal);

          provider = decision.provider;
          await coordinator.mark(task.id, "running", { provider });
          emit({ type: "task:started", taskId: task.id, attempt: task.attempts, provider });
        }
      }
    } catch (err) {
      if (err instanceof GraphIntegrityError) throw err;
      if (timedOut) {
        const prior = task.lastError;
        await this.fail(run, task, {
          kind: prior?.kind ?? "transient",
          message: `Timed out after ${run.taskTimeoutMs}ms${prior ? ` (last error: ${prior.message})` : ""}`,
          provider,
        });
        return;
      }
      if (run.signal.aborted) {
        const from = task.state;
        await coordinator.mark(task.id, "pending", { startedAt: undefined });
        log.info(`Task "${task.id}" returned to pending`, { from });
        emit({ type: "task:requeued", taskId: task.id, from });
        return;
      }
      throw err;
    } finally {
      clearTimeout(timer);
      run.signal.removeEventListener("abort", onRunAbort);
    }
  }

  private async fail(run: RunContext, task: Task, lastError: TaskError): Promise<void> {
    await run.coordinator.mark(task.id, "failed", { lastError, completedAt: Date.now() });
    run.emit({ type: "task:failed", taskId: task.id, attempt: task.attempts, error: lastError });
    await this.skipDownstream(run, task.id);
  }

  private async attempt(
    run: RunContext,
    task: Task,
    provider: string,
    signal: AbortSignal,
    revisionNote: string | undefined,
  ): Promise<GeneratorOutput> {
    const graph = run.coordinator.graph;
    const generator = this.generators[task.kind];
    const dependencies: Record<string, GeneratorOutput> = {};
    for (const dep of task.dependsOn) {
      const result = getTask(graph, dep).result;
      if (result) dependencies[dep] = result;
    }

    const source = this.opts.context;
    const ctx: GenerationContext = {
      generationId: graph.id,
      provider,
      attempt: task.attempts,
      revisionNote,
      signal,
      dependencies,
      complete: (prompt, constraints) => this.gateway.complete(provider, prompt, { ...constraints, signal }),
      retrieve: async (query, limit = getConfig().planning.contextSnippets) =>
        source ? source.retrieve(query, limit) : [],
    };

    const output = await raceAbort(generator.generate(task, ctx), signal);
    const problem = generator.validate?.(output, task);
    if (problem) {
      throw new ValidationError("VALIDATION_FAILED", `Output for "${task.id}" rejected: ${problem}`);
    }
    return output;
  }
}
