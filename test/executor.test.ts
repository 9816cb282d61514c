import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { CheckpointError, ConfigError, ProviderError } from "../src/errors.js";
import { Executor } from "../src/executor/executor.js";
import type { EventSink, ProgressEvent } from "../src/executor/types.js";
import type { GenerationContext, GeneratorTable, ModuleGenerator } from "../src/generators/types.js";
import type { CheckpointStore, CheckpointSummary } from "../src/persistence/checkpoint-store.js";
import { KeyValueCheckpointStore, MemoryKeyValueStore } from "../src/persistence/kv-store.js";
import { fromSnapshot, type CheckpointSnapshot } from "../src/persistence/snapshot.js";
import { Planner } from "../src/planner/planner.js";
import { createTaskGraph, getTask } from "../src/planner/task-graph.js";
import type { TaskGraph } from "../src/planner/types.js";
import { FunctionProvider, type CompletionFunction } from "../src/providers/function-provider.js";
import { ProviderGateway } from "../src/providers/gateway.js";
import { chainGraph, input, spec } from "./fixtures.js";

function tableOf(generator: ModuleGenerator): GeneratorTable {
  return {
    frontend: generator,
    backend: generator,
    database: generator,
    auth: generator,
    integration: generator,
    deployment: generator,
  };
}

/** Sends the task id as the prompt and keeps the reply as content. */
const echo: ModuleGenerator = {
  generate: async (task, ctx) => ({ content: await ctx.complete(task.id) }),
};

const done: CompletionFunction = async (prompt) => `done: ${prompt}`;

function gatewayWith(...providers: Array<[string, CompletionFunction]>): ProviderGateway {
  const gateway = new ProviderGateway({ rateLimit: false });
  for (const [name, fn] of providers) gateway.add(new FunctionProvider({ name, fn }));
  return gateway;
}

function recordingSink(): EventSink & { events: ProgressEvent[] } {
  const events: ProgressEvent[] = [];
  return { events, emit: (_id, event) => events.push(event) };
}

/** Keeps a copy of every snapshot written, on top of a real store. */
class RecordingStore implements CheckpointStore {
  snapshots: CheckpointSnapshot[] = [];
  private inner = new KeyValueCheckpointStore(new MemoryKeyValueStore());

  async save(generationId: string, snapshot: CheckpointSnapshot, sequence: number): Promise<void> {
    await this.inner.save(generationId, snapshot, sequence);
    this.snapshots.push(structuredClone(snapshot));
  }

  load(generationId: string): Promise<CheckpointSnapshot> {
    return this.inner.load(generationId);
  }

  list(): Promise<CheckpointSummary[]> {
    return this.inner.list();
  }

  compact(generationId: string): Promise<number> {
    return this.inner.compact(generationId);
  }
}

function finalStates(graph: TaskGraph) {
  return graph.tasks.map((t) => [t.id, t.state, t.result?.content, t.lastError?.kind]);
}

function ofType<T extends ProgressEvent["type"]>(events: ProgressEvent[], type: T) {
  return events.filter((e): e is Extract<ProgressEvent, { type: T }> => e.type === type);
}

describe("Executor", () => {
  beforeEach(() => {
    configure({ retry: { baseDelayMs: 1, maxDelayMs: 5, checkpointAttempts: 1, checkpointBaseDelayMs: 1 } });
  });

  afterEach(() => {
    resetConfig();
  });

  it("executes a linear graph to completion", async () => {
    const executor = new Executor(gatewayWith(["a", done]), tableOf(echo));
    const graph = chainGraph();

    const result = await executor.run(graph);

    expect(result.outcome).toBe("completed");
    expect(graph.tasks.map((t) => [t.id, t.state, t.attempts, t.provider, t.result?.content])).toEqual([
      ["database", "succeeded", 1, "a", "done: database"],
      ["backend", "succeeded", 1, "a", "done: backend"],
      ["integration", "succeeded", 1, "a", "done: integration"],
    ]);
  });

  it("hands dependency results to the generator", async () => {
    const seen: Record<string, string[]> = {};
    const generator: ModuleGenerator = {
      generate: async (task, ctx) => {
        seen[task.id] = Object.keys(ctx.dependencies);
        return { content: task.id };
      },
    };
    const executor = new Executor(gatewayWith(["a", done]), tableOf(generator));

    await executor.run(chainGraph());

    expect(seen).toEqual({ database: [], backend: ["database"], integration: ["backend"] });
  });

  it("executes independent tasks concurrently", async () => {
    const order: string[] = [];
    const generator: ModuleGenerator = {
      generate: async (task) => {
        order.push(`start:${task.id}`);
        await new Promise((r) => setTimeout(r, 10));
        order.push(`end:${task.id}`);
        return { content: task.id };
      },
    };
    const executor = new Executor(gatewayWith(["a", done]), tableOf(generator));
    const graph = createTaskGraph("r", "Test", [spec("a"), spec("b"), spec("c", ["a", "b"])]);

    const result = await executor.run(graph);

    expect(result.outcome).toBe("completed");
    expect(order.slice(0, 2).sort()).toEqual(["start:a", "start:b"]);
    expect(order.slice(-2)).toEqual(["start:c", "end:c"]);
  });

  it("respects maxConcurrency", async () => {
    let active = 0;
    let peak = 0;
    const generator: ModuleGenerator = {
      generate: async (task) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((r) => setTimeout(r, 5));
        active--;
        return { content: task.id };
      },
    };
    const executor = new Executor(gatewayWith(["a", done]), tableOf(generator));
    const graph = createTaskGraph("r", "Test", [spec("a"), spec("b"), spec("c"), spec("d")]);

    await executor.run(graph, { maxConcurrency: 2 });

    expect(peak).toBe(2);
  });

  it("retries transient failures and counts every attempt", async () => {
    let backendCalls = 0;
    const flaky: CompletionFunction = async (prompt) => {
      if (prompt === "backend" && ++backendCalls < 3) throw new ProviderError("transient", "socket hang up");
      return `done: ${prompt}`;
    };
    // A wide breaker window keeps the single provider callable between retries.
    const gateway = new ProviderGateway({ rateLimit: false, circuitBreaker: { minimumCalls: 10 } });
    gateway.add(new FunctionProvider({ name: "a", fn: flaky }));
    const sink = recordingSink();
    const executor = new Executor(gateway, tableOf(echo));
    const graph = chainGraph();

    const result = await executor.run(graph, { events: sink });

    expect(result.outcome).toBe("completed");
    expect(graph.tasks[1]).toMatchObject({ state: "succeeded", attempts: 3 });
    expect(graph.tasks[1].lastError).toBeUndefined();
    expect(ofType(sink.events, "task:retrying").map((e) => [e.taskId, e.attempt, e.error.kind, e.nextProvider])).toEqual([
      ["backend", 1, "transient", "a"],
      ["backend", 2, "transient", "a"],
    ]);
  });

  it("fails a task on a permanent error and skips what depends on it", async () => {
    const rejecting: CompletionFunction = async (prompt) => {
      if (prompt === "backend") throw new ProviderError("permanent", "HTTP 400: bad request");
      return `done: ${prompt}`;
    };
    const sink = recordingSink();
    const executor = new Executor(gatewayWith(["a", rejecting]), tableOf(echo));
    const graph = chainGraph();

    const result = await executor.run(graph, { events: sink });

    expect(result.outcome).toBe("partial");
    expect(graph.tasks.map((t) => t.state)).toEqual(["succeeded", "failed", "skipped"]);
    expect(graph.tasks[1]).toMatchObject({
      attempts: 1,
      lastError: { kind: "permanent", message: "HTTP 400: bad request", provider: "a" },
    });
    expect(ofType(sink.events, "task:skipped")).toEqual([
      { type: "task:skipped", taskId: "integration", blockedBy: "backend" },
    ]);
    expect(sink.events.at(-1)).toMatchObject({ type: "generation:finished", outcome: "partial" });
  });

  it("reports failed when nothing succeeds", async () => {
    const rejecting: CompletionFunction = async () => {
      throw new ProviderError("permanent", "HTTP 401: unauthorized");
    };
    const executor = new Executor(gatewayWith(["a", rejecting]), tableOf(echo));
    const graph = chainGraph();

    const result = await executor.run(graph);

    expect(result.outcome).toBe("failed");
    expect(graph.tasks.map((t) => t.state)).toEqual(["failed", "skipped", "skipped"]);
  });

  it("sends the rejection reason back with the next attempt", async () => {
    const notes: Array<string | undefined> = [];
    const generator: ModuleGenerator = {
      generate: async (_task, ctx: GenerationContext) => {
        notes.push(ctx.revisionNote);
        return { content: "", files: { "a.ts": ctx.revisionNote ? "export {}" : "" } };
      },
      validate: (output) => (output.files?.["a.ts"] === "" ? "empty files: a.ts" : undefined),
    };
    const executor = new Executor(gatewayWith(["a", done]), tableOf(generator));
    const graph = createTaskGraph("r", "Test", [spec("database", [], "database")]);

    const result = await executor.run(graph);

    expect(result.outcome).toBe("completed");
    expect(notes).toEqual([undefined, 'Output for "database" rejected: empty files: a.ts']);
    expect(graph.tasks[0].attempts).toBe(2);
  });

  it("moves a task to the next provider once the first one's circuit opens", async () => {
    const broken: CompletionFunction = async () => {
      throw new ProviderError("transient", "HTTP 503: unavailable");
    };
    const gateway = gatewayWith(["a", broken], ["b", done]);
    const executor = new Executor(gateway, tableOf(echo));
    const graph = createTaskGraph("r", "Test", [spec("backend")]);

    const result = await executor.run(graph);

    expect(result.outcome).toBe("completed");
    expect(graph.tasks[0]).toMatchObject({ attempts: 4, provider: "b", result: { content: "done: backend" } });
    expect(gateway.circuitState("a")).toBe("open");
  });

  it("fails a task that overruns its deadline with the last known classification", async () => {
    const hanging: ModuleGenerator = { generate: () => new Promise(() => {}) };
    const executor = new Executor(gatewayWith(["a", done]), tableOf(hanging));
    const graph = createTaskGraph("r", "Test", [spec("backend"), spec("integration", ["backend"])]);

    const result = await executor.run(graph, { taskTimeoutMs: 30 });

    expect(result.outcome).toBe("failed");
    expect(graph.tasks[0].lastError).toEqual({ kind: "transient", message: "Timed out after 30ms", provider: "a" });
    expect(graph.tasks[1].state).toBe("skipped");
  });

  it("returns in-flight tasks to pending on cancellation and finishes them on the next run", async () => {
    const controller = new AbortController();
    const waiting: ModuleGenerator = {
      generate: (task) =>
        new Promise((resolve) => {
          if (controller.signal.aborted) resolve({ content: task.id });
          else setTimeout(() => controller.abort(), 10);
        }),
    };
    const sink = recordingSink();
    const executor = new Executor(gatewayWith(["a", done]), tableOf(waiting));
    const graph = chainGraph();

    const cancelled = await executor.run(graph, { signal: controller.signal, events: sink });

    expect(cancelled.outcome).toBe("cancelled");
    expect(graph.tasks.map((t) => [t.state, t.attempts])).toEqual([
      ["pending", 1],
      ["pending", 0],
      ["pending", 0],
    ]);
    expect(ofType(sink.events, "task:requeued")).toEqual([
      { type: "task:requeued", taskId: "database", from: "running" },
    ]);

    const resumed = await executor.run(graph, { resumed: true });

    expect(resumed.outcome).toBe("completed");
    expect(graph.tasks.map((t) => t.attempts)).toEqual([2, 1, 1]);
  });

  it("requeues tasks a previous process left running", async () => {
    const sink = recordingSink();
    const executor = new Executor(gatewayWith(["a", done]), tableOf(echo));
    const graph = chainGraph();
    graph.tasks[0].state = "running";
    graph.tasks[0].attempts = 1;

    const result = await executor.run(graph, { events: sink });

    expect(result.outcome).toBe("completed");
    expect(sink.events[1]).toEqual({ type: "task:requeued", taskId: "database", from: "running" });
    expect(graph.tasks[0].attempts).toBe(2);
  });

  it("skips tasks behind a failure recorded before the run", async () => {
    const executor = new Executor(gatewayWith(["a", done]), tableOf(echo));
    const graph = chainGraph();
    graph.tasks[0].state = "failed";

    const result = await executor.run(graph);

    expect(result.outcome).toBe("failed");
    expect(graph.tasks.map((t) => t.state)).toEqual(["failed", "skipped", "skipped"]);
  });

  it("checkpoints every transition", async () => {
    const store = new KeyValueCheckpointStore(new MemoryKeyValueStore());
    const executor = new Executor(gatewayWith(["a", done]), tableOf(echo));

    const result = await executor.run(chainGraph(), { checkpoints: store });

    expect(result.sequence).toBe(6);
    expect(result.degraded).toBe(false);
    const stored = await store.load("gen-1");
    expect(stored.sequence).toBe(6);
    expect(stored.tasks.map((t) => t.state)).toEqual(["succeeded", "succeeded", "succeeded"]);
  });

  it("keeps running in memory when checkpoints cannot be written", async () => {
    const offline: CheckpointStore = {
      save: async () => {
        throw new CheckpointError("CHECKPOINT_UNAVAILABLE", "store offline");
      },
      load: async () => {
        throw new CheckpointError("CHECKPOINT_UNAVAILABLE", "store offline");
      },
      list: async () => [],
      compact: async () => 0,
    };
    const sink = recordingSink();
    const executor = new Executor(gatewayWith(["a", done]), tableOf(echo));

    const result = await executor.run(chainGraph(), { checkpoints: offline, events: sink });

    expect(result.outcome).toBe("completed");
    expect(result.degraded).toBe(true);
    expect(ofType(sink.events, "checkpoint:degraded")).toHaveLength(6);
  });

  it("refuses to run without providers or with a zero concurrency limit", async () => {
    const empty = new Executor(new ProviderGateway({ rateLimit: false }), tableOf(echo));
    await expect(empty.run(chainGraph())).rejects.toThrow("No providers registered");

    const executor = new Executor(gatewayWith(["a", done]), tableOf(echo));
    await expect(executor.run(chainGraph(), { maxConcurrency: 0 })).rejects.toBeInstanceOf(ConfigError);
  });

  it("passes the requirement through to generators", async () => {
    const requirements: string[] = [];
    const generator: ModuleGenerator = {
      generate: async (task) => {
        requirements.push(task.input.requirement);
        return { content: "ok" };
      },
    };
    const executor = new Executor(gatewayWith(["a", done]), tableOf(generator));

    await executor.run(chainGraph());

    expect(requirements).toEqual([input.requirement, input.requirement, input.requirement]);
  });

  it("never starts a task before every dependency has succeeded", async () => {
    const graph = await new Planner().plan("Build a todo app with login", {}, "gen-order");
    const seen = new Map<string, number>();
    // First calls for backend and frontend fail once, so retries interleave with other work.
    const flaky: CompletionFunction = async (prompt) => {
      const n = (seen.get(prompt) ?? 0) + 1;
      seen.set(prompt, n);
      if ((prompt === "backend" || prompt === "frontend") && n === 1) throw new ProviderError("transient", "reset");
      await new Promise((r) => setTimeout(r, 2));
      return `done: ${prompt}`;
    };
    const gateway = new ProviderGateway({ rateLimit: false, circuitBreaker: { minimumCalls: 10 } });
    gateway.add(new FunctionProvider({ name: "a", fn: flaky }));

    const started: string[] = [];
    const violations: string[] = [];
    const sink: EventSink = {
      emit: (_id, event) => {
        if (event.type !== "task:started") return;
        started.push(event.taskId);
        for (const dep of getTask(graph, event.taskId).dependsOn) {
          const state = getTask(graph, dep).state;
          if (state !== "succeeded") violations.push(`${event.taskId} started while ${dep} was ${state}`);
        }
      },
    };

    const result = await new Executor(gateway, tableOf(echo)).run(graph, { maxConcurrency: 3, events: sink });

    expect(result.outcome).toBe("completed");
    expect(violations).toEqual([]);
    expect(started).toHaveLength(8);
    expect(graph.tasks.map((t) => [t.id, t.attempts])).toEqual([
      ["database", 1],
      ["backend", 2],
      ["auth", 1],
      ["frontend", 2],
      ["integration", 1],
      ["deployment", 1],
    ]);
  });

  it("reaches the same final states when resumed from any checkpoint", async () => {
    const rejectAuth: CompletionFunction = async (prompt) => {
      if (prompt === "auth") throw new ProviderError("permanent", "HTTP 400: unsupported auth scheme");
      return `done: ${prompt}`;
    };
    const store = new RecordingStore();
    const uninterrupted = await new Planner().plan("Build a todo app with login", {}, "gen-resume");
    const baseline = await new Executor(gatewayWith(["a", rejectAuth]), tableOf(echo)).run(uninterrupted, {
      checkpoints: store,
      maxConcurrency: 2,
    });
    expect(baseline.outcome).toBe("partial");
    expect(store.snapshots.length).toBeGreaterThan(5);

    for (const snapshot of store.snapshots) {
      const { graph } = fromSnapshot(snapshot);
      const finished = new Set(graph.tasks.filter((t) => t.state === "succeeded").map((t) => t.id));
      const generated: string[] = [];
      const recording: ModuleGenerator = {
        generate: async (task, ctx) => {
          generated.push(task.id);
          return { content: await ctx.complete(task.id) };
        },
      };

      const resumed = await new Executor(gatewayWith(["a", rejectAuth]), tableOf(recording)).run(graph, {
        resumed: true,
        maxConcurrency: 2,
      });

      expect(resumed.outcome).toBe(baseline.outcome);
      expect(finalStates(graph)).toEqual(finalStates(uninterrupted));
      expect(generated.filter((id) => finished.has(id))).toEqual([]);
    }
  });
});
