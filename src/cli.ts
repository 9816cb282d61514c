#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { ConfigError } from "./errors.js";
import { EventChannel } from "./executor/events.js";
import type { ProgressEvent } from "./executor/types.js";
import { Orchestrator, type GenerationStatus } from "./orchestrator.js";
import { SqliteCheckpointStore } from "./persistence/sqlite-store.js";
import type { PlanConstraints, TaskGraph } from "./planner/types.js";
import { HttpProvider } from "./providers/http-provider.js";
import { ProviderFileSchema, parseOrThrow, type ProviderConfig } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

type PlanFlags = {
  modules?: string[];
  appName?: string;
  deployment: boolean;
};

type RunFlags = PlanFlags & {
  providers: string;
  db?: string;
  concurrency?: number;
};

const program = new Command();

program
  .name("forgeflow")
  .description("Plan and generate applications across LLM providers with checkpointed, self-healing execution")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function loadProviders(file: string): ProviderConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read provider file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOrThrow(ProviderFileSchema, raw, (msg) => new ConfigError(`Invalid provider file ${file}: ${msg}`));
}

function constraintsFrom(flags: PlanFlags): PlanConstraints {
  return {
    modules: flags.modules,
    appName: flags.appName,
    includeDeployment: flags.deployment,
  };
}

function buildOrchestrator(flags: { providers?: string; db?: string; concurrency?: number }, events?: EventChannel) {
  const checkpoints = new SqliteCheckpointStore(flags.db);
  const orch = new Orchestrator({ checkpoints, events, maxConcurrency: flags.concurrency });
  for (const p of flags.providers ? loadProviders(flags.providers) : []) {
    orch.addProvider(
      new HttpProvider({
        name: p.name,
        url: p.url,
        headers: p.headers,
        description: p.description,
        model: p.model,
        timeout: p.timeout,
      }),
      { priority: p.priority, rateLimit: p.maxRequests ? { maxRequests: p.maxRequests } : undefined },
    );
  }
  return { orch, checkpoints };
}

function formatEvent(event: ProgressEvent): string | undefined {
  switch (event.type) {
    case "task:started":
      return `  > ${event.taskId} (attempt ${event.attempt}, ${event.provider ?? "?"})`;
    case "task:retrying":
      return `  ~ ${event.taskId} ${event.error.kind}: ${event.error.message.slice(0, 120)} (retry on ${event.nextProvider} in ${event.delayMs}ms)`;
    case "task:succeeded":
      return `  + ${event.taskId}`;
    case "task:failed":
      return `  x ${event.taskId} ${event.error.kind}: ${event.error.message.slice(0, 200)}`;
    case "task:skipped":
      return `  - ${event.taskId} (blocked by ${event.blockedBy})`;
    case "checkpoint:degraded":
      return `  ! checkpoint #${event.sequence} not saved: ${event.error}`;
    default:
      return undefined;
  }
}

function printGraph(graph: TaskGraph): void {
  console.log(`${graph.appName} (${graph.id})`);
  for (const task of graph.tasks) {
    const deps = task.dependsOn.length > 0 ? ` <- ${task.dependsOn.join(", ")}` : "";
    console.log(`  ${task.id}: ${task.title}${deps}`);
  }
}

function printStatus(status: GenerationStatus): void {
  console.log(`\n${status.appName} (${status.generationId}): ${status.outcome}`);
  for (const task of status.tasks) {
    const error = task.lastError && task.state !== "succeeded" ? ` ${task.lastError.kind}: ${task.lastError.message.slice(0, 200)}` : "";
    console.log(`  [${task.state}] ${task.id} attempts=${task.attempts}${task.provider ? ` provider=${task.provider}` : ""}${error}`);
  }
  console.log(`Checkpoint #${status.sequence}${status.degraded ? " (durability degraded)" : ""}`);
  if (status.error) console.log(`Error: ${status.error}`);
}

/** Run to the end, cancelling cleanly on Ctrl+C. */
async function follow(orch: Orchestrator, generationId: string): Promise<void> {
  const onSigint = () => {
    console.error("\nCancelling; in-flight tasks will be resumable.");
    orch.cancel(generationId);
  };
  process.once("SIGINT", onSigint);
  try {
    const status = await orch.wait(generationId);
    printStatus(status);
    if (status.outcome !== "completed") process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onSigint);
    await orch.shutdown();
  }
}

function progressChannel(): EventChannel {
  const events = new EventChannel();
  events.subscribe(({ event }) => {
    const line = formatEvent(event);
    if (line) console.error(line);
  });
  return events;
}

// --- plan ---
program
  .command("plan")
  .description("Show the task graph a requirement would produce (dry run)")
  .argument("<requirement>", "What to build")
  .option("-m, --modules <kinds...>", "Module kinds to generate (frontend, backend, database, auth)")
  .option("--app-name <name>", "Application name")
  .option("--no-deployment", "Leave out the deployment task")
  .option("--json", "Print the graph as JSON")
  .action(async (requirement: string, flags: PlanFlags & { json?: boolean }) => {
    const orch = new Orchestrator({ rateLimit: false });
    try {
      const graph = await orch.plan(requirement, constraintsFrom(flags));
      if (flags.json) {
        console.log(JSON.stringify(graph, null, 2));
      } else {
        printGraph(graph);
      }
    } catch (err) {
      console.error("Error:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

// --- generate ---
program
  .command("generate")
  .description("Plan a requirement and generate every module")
  .argument("<requirement>", "What to build")
  .requiredOption("-p, --providers <file>", "JSON file listing HTTP providers")
  .option("--db <path>", "Checkpoint database (default: ~/.forgeflow/checkpoints.db)")
  .option("-c, --concurrency <n>", "Max parallel tasks", parseInteger)
  .option("-m, --modules <kinds...>", "Module kinds to generate")
  .option("--app-name <name>", "Application name")
  .option("--no-deployment", "Leave out the deployment task")
  .action(async (requirement: string, flags: RunFlags) => {
    const { orch, checkpoints } = buildOrchestrator(flags, progressChannel());
    try {
      const id = await orch.submit(requirement, constraintsFrom(flags));
      console.error(`Generation ${id} started`);
      await follow(orch, id);
    } catch (err) {
      console.error("Generation failed:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      checkpoints.close();
    }
  });

// --- status ---
program
  .command("status")
  .description("Show the latest checkpointed state of a generation")
  .argument("<id>", "Generation id")
  .option("--db <path>", "Checkpoint database")
  .action(async (id: string, flags: { db?: string }) => {
    const { orch, checkpoints } = buildOrchestrator(flags);
    try {
      printStatus(await orch.status(id));
    } catch (err) {
      console.error("Error:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      checkpoints.close();
    }
  });

// --- resume ---
program
  .command("resume")
  .description("Continue an interrupted generation from its latest checkpoint")
  .argument("<id>", "Generation id")
  .requiredOption("-p, --providers <file>", "JSON file listing HTTP providers")
  .option("--db <path>", "Checkpoint database")
  .option("-c, --concurrency <n>", "Max parallel tasks", parseInteger)
  .action(async (id: string, flags: Omit<RunFlags, keyof PlanFlags>) => {
    const { orch, checkpoints } = buildOrchestrator(flags, progressChannel());
    try {
      await orch.resume(id);
      console.error(`Generation ${id} resumed`);
      await follow(orch, id);
    } catch (err) {
      console.error("Resume failed:", err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      checkpoints.close();
    }
  });

// --- list ---
program
  .command("list")
  .description("List generations with stored checkpoints")
  .option("--db <path>", "Checkpoint database")
  .action(async (flags: { db?: string }) => {
    const checkpoints = new SqliteCheckpointStore(flags.db);
    try {
      for (const c of await checkpoints.list()) {
        console.log(`${c.generationId}  #${c.sequence}  ${new Date(c.savedAt).toISOString()}  (${c.count} kept)`);
      }
    } finally {
      checkpoints.close();
    }
  });

void (async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
})();
