import { createTaskGraph, type TaskSpec } from "../src/planner/task-graph.js";
import type { TaskGraph, TaskKind } from "../src/planner/types.js";

export const input = { requirement: "build a test app", appName: "Test App", features: [] };

export function spec(id: string, dependsOn: string[] = [], kind: TaskKind = "backend"): TaskSpec {
  return { id, kind, title: `Generate ${id}`, input, dependsOn };
}

/** database → backend → integration */
export function chainGraph(id = "gen-1"): TaskGraph {
  return createTaskGraph(input.requirement, input.appName, [
    spec("database", [], "database"),
    spec("backend", ["database"], "backend"),
    spec("integration", ["backend"], "integration"),
  ], id);
}
