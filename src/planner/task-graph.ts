import { randomUUID } from "node:crypto";
import { GraphIntegrityError } from "../errors.js";
import { TERMINAL_STATES, type Task, type TaskGraph, type TaskState } from "./types.js";

export type TaskSpec = Omit<Task, "state" | "attempts" | "createdAt" | "lastError" | "provider" | "result" | "startedAt" | "completedAt">;

export type TerminalOutcome = "completed" | "partial" | "failed";

/** Create a new task graph from a requirement and a list of task specs. */
export function createTaskGraph(
  requirement: string,
  appName: string,
  specs: TaskSpec[],
  id: string = randomUUID(),
): TaskGraph {
  const createdAt = Date.now();
  const graph: TaskGraph = {
    id,
    requirement,
    appName,
    tasks: specs.map((s) => ({
      ...s,
      dependsOn: [...s.dependsOn],
      state: "pending",
      attempts: 0,
      createdAt,
    })),
    createdAt,
  };
  validate(graph);
  return graph;
}

/** Validate a task graph: check for duplicate ids, missing deps and cycles. */
export function validate(graph: TaskGraph): void {
  const ids = new Set<string>();
  for (const task of graph.tasks) {
    if (ids.has(task.id)) {
      throw new GraphIntegrityError("GRAPH_INVALID", `Duplicate task id "${task.id}"`);
    }
    ids.add(task.id);
  }

  for (const task of graph.tasks) {
    for (const dep of task.dependsOn) {
      if (!ids.has(dep)) {
        throw new GraphIntegrityError("GRAPH_INVALID", `Task "${task.id}" depends on unknown task "${dep}"`);
      }
    }
    if (task.dependsOn.includes(task.id)) {
      throw new GraphIntegrityError("GRAPH_INVALID", `Task "${task.id}" depends on itself`);
    }
  }

  if (hasCycle(graph)) {
    throw new GraphIntegrityError("GRAPH_INVALID", "Task graph contains a cycle");
  }
}

/** Map of task id → ids of the tasks that depend on it. */
export function dependentsMap(graph: TaskGraph): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const task of graph.tasks) {
    for (const dep of task.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(task.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/** Detect cycles using DFS with coloring. */
function hasCycle(graph: TaskGraph): boolean {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const task of graph.tasks) color.set(task.id, WHITE);
  const dependents = dependentsMap(graph);

  function dfs(id: string): boolean {
    color.set(id, GRAY);
    for (const next of dependents.get(id) ?? []) {
      const c = color.get(next);
      if (c === GRAY) return true; // back edge = cycle
      if (c === WHITE && dfs(next)) return true;
    }
    color.set(id, BLACK);
    return false;
  }

  for (const task of graph.tasks) {
    if (color.get(task.id) === WHITE && dfs(task.id)) return true;
  }
  return false;
}

export function getTask(graph: TaskGraph, taskId: string): Task {
  const task = graph.tasks.find((t) => t.id === taskId);
  if (!task) {
    throw new GraphIntegrityError("UNKNOWN_TASK", `Task "${taskId}" is not part of graph ${graph.id}`);
  }
  return task;
}

/** Return tasks in topological order (dependencies first). */
export function topologicalSort(graph: TaskGraph): Task[] {
  const taskMap = new Map(graph.tasks.map((t) => [t.id, t]));
  const visited = new Set<string>();
  const sorted: Task[] = [];

  function visit(task: Task): void {
    if (visited.has(task.id)) return;
    visited.add(task.id);
    for (const dep of task.dependsOn) {
      const depTask = taskMap.get(dep);
      if (depTask) visit(depTask);
    }
    sorted.push(task);
  }

  for (const task of graph.tasks) {
    visit(task);
  }

  return sorted;
}

/** Pending tasks whose every dependency has succeeded. */
export function readyTasks(graph: TaskGraph): Task[] {
  const succeeded = new Set(
    graph.tasks.filter((t) => t.state === "succeeded").map((t) => t.id),
  );
  return graph.tasks.filter(
    (t) => t.state === "pending" && t.dependsOn.every((d) => succeeded.has(d)),
  );
}

/** Pending tasks that depend, directly or transitively, on the given task. */
export function pendingDownstream(graph: TaskGraph, taskId: string): Task[] {
  const dependents = dependentsMap(graph);
  const taskMap = new Map(graph.tasks.map((t) => [t.id, t]));
  const queue = [...(dependents.get(taskId) ?? [])];
  const visited = new Set<string>();
  const found: Task[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    const task = taskMap.get(id);
    if (task?.state === "pending") found.push(task);
    queue.push(...(dependents.get(id) ?? []));
  }
  return found;
}

/** Pending tasks that can never become ready because an upstream task failed or was skipped. */
export function blockedTasks(graph: TaskGraph): Task[] {
  const blocked = new Map<string, Task>();
  for (const task of graph.tasks) {
    if (task.state !== "failed" && task.state !== "skipped") continue;
    for (const downstream of pendingDownstream(graph, task.id)) {
      blocked.set(downstream.id, downstream);
    }
  }
  return [...blocked.values()];
}

/**
 * True when every task is terminal, or when the only non-terminal tasks left
 * are pending behind a failure and can never run.
 */
export function isTerminal(graph: TaskGraph): boolean {
  const open = graph.tasks.filter((t) => !TERMINAL_STATES.has(t.state));
  if (open.length === 0) return true;
  if (open.some((t) => t.state !== "pending")) return false;
  const blocked = new Set(blockedTasks(graph).map((t) => t.id));
  return open.every((t) => blocked.has(t.id));
}

export function countByState(graph: TaskGraph): Record<TaskState, number> {
  const counts: Record<TaskState, number> = {
    pending: 0,
    running: 0,
    retrying: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
  };
  for (const task of graph.tasks) counts[task.state]++;
  return counts;
}

/**
 * Outcome of a graph whose tasks are all terminal: every task succeeded,
 * some did, or none did.
 */
export function terminalOutcome(graph: TaskGraph): TerminalOutcome {
  const counts = countByState(graph);
  if (counts.succeeded === graph.tasks.length) return "completed";
  if (counts.succeeded === 0) return "failed";
  return "partial";
}
