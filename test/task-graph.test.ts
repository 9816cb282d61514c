import { describe, expect, it } from "vitest";
import {
  blockedTasks,
  countByState,
  createTaskGraph,
  getTask,
  isTerminal,
  pendingDownstream,
  readyTasks,
  terminalOutcome,
  topologicalSort,
  validate,
  type TaskSpec,
} from "../src/planner/task-graph.js";
import type { Task, TaskGraph, TaskState } from "../src/planner/types.js";

const input = { requirement: "test requirement", appName: "Test", features: [] };

function spec(id: string, dependsOn: string[] = []): TaskSpec {
  return { id, kind: "backend", title: `do ${id}`, input, dependsOn };
}

function task(id: string, dependsOn: string[] = [], state: TaskState = "pending"): Task {
  return { ...spec(id, dependsOn), state, attempts: 0, createdAt: 0 };
}

function graphOf(...tasks: Task[]): TaskGraph {
  return { id: "test", requirement: "test", appName: "Test", tasks, createdAt: 0 };
}

describe("createTaskGraph", () => {
  it("creates a valid graph with pending tasks", () => {
    const graph = createTaskGraph("test requirement", "Test", [spec("a"), spec("b", ["a"])]);

    expect(graph.requirement).toBe("test requirement");
    expect(graph.appName).toBe("Test");
    expect(graph.tasks).toHaveLength(2);
    expect(graph.tasks.map((t) => t.state)).toEqual(["pending", "pending"]);
    expect(graph.tasks.map((t) => t.attempts)).toEqual([0, 0]);
  });

  it("uses the given id", () => {
    expect(createTaskGraph("r", "Test", [spec("a")], "gen-1").id).toBe("gen-1");
  });

  it("copies dependency lists", () => {
    const specs = [spec("a"), spec("b", ["a"])];
    const graph = createTaskGraph("r", "Test", specs);
    specs[1].dependsOn.push("c");
    expect(graph.tasks[1].dependsOn).toEqual(["a"]);
  });

  it("rejects an invalid graph", () => {
    expect(() => createTaskGraph("r", "Test", [spec("a", ["b"])])).toThrow('depends on unknown task "b"');
  });
});

describe("validate", () => {
  it("throws on missing dependency", () => {
    expect(() => validate(graphOf(task("a", ["nonexistent"])))).toThrow('depends on unknown task "nonexistent"');
  });

  it("throws on self-dependency", () => {
    expect(() => validate(graphOf(task("a", ["a"])))).toThrow("depends on itself");
  });

  it("throws on duplicate ids", () => {
    expect(() => validate(graphOf(task("a"), task("a")))).toThrow('Duplicate task id "a"');
  });

  it("throws on cycle", () => {
    expect(() => validate(graphOf(task("a", ["b"]), task("b", ["a"])))).toThrow("Task graph contains a cycle");
  });

  it("accepts a valid DAG", () => {
    const graph = graphOf(task("a"), task("b", ["a"]), task("c", ["a"]), task("d", ["b", "c"]));
    expect(() => validate(graph)).not.toThrow();
  });
});

describe("getTask", () => {
  it("throws UNKNOWN_TASK for a missing id", () => {
    expect(() => getTask(graphOf(task("a")), "zzz")).toThrow('Task "zzz" is not part of graph test');
  });
});

describe("topologicalSort", () => {
  it("returns tasks in dependency order", () => {
    const graph = graphOf(task("c", ["a", "b"]), task("a"), task("b", ["a"]));
    expect(topologicalSort(graph).map((t) => t.id)).toEqual(["a", "b", "c"]);
  });
});

describe("readyTasks", () => {
  it("returns tasks whose dependencies all succeeded", () => {
    const graph = graphOf(task("a", [], "succeeded"), task("b", ["a"]), task("c", ["b"]));
    expect(readyTasks(graph).map((t) => t.id)).toEqual(["b"]);
  });

  it("returns multiple independent ready tasks in graph order", () => {
    const graph = graphOf(task("a"), task("b"), task("c", ["a", "b"]));
    expect(readyTasks(graph).map((t) => t.id)).toEqual(["a", "b"]);
  });

  it("ignores tasks that are not pending", () => {
    const graph = graphOf(task("a", [], "running"), task("b", [], "retrying"));
    expect(readyTasks(graph)).toEqual([]);
  });
});

describe("pendingDownstream", () => {
  it("collects transitive pending dependents only", () => {
    const graph = graphOf(
      task("a", [], "failed"),
      task("b", ["a"]),
      task("c", ["b"]),
      task("d"),
      task("e", ["a"], "succeeded"),
    );
    expect(pendingDownstream(graph, "a").map((t) => t.id)).toEqual(["b", "c"]);
  });
});

describe("blockedTasks", () => {
  it("lists pending tasks behind a failed or skipped task", () => {
    const graph = graphOf(task("a", [], "failed"), task("b", ["a"]), task("c"), task("d", ["c"], "skipped"));
    expect(blockedTasks(graph).map((t) => t.id)).toEqual(["b"]);
  });
});

describe("isTerminal", () => {
  it("is true when all tasks are terminal", () => {
    const graph = graphOf(task("a", [], "succeeded"), task("b", [], "failed"), task("c", [], "skipped"));
    expect(isTerminal(graph)).toBe(true);
  });

  it("is false while tasks can still run", () => {
    expect(isTerminal(graphOf(task("a", [], "succeeded"), task("b")))).toBe(false);
  });

  it("is false while a task is running", () => {
    expect(isTerminal(graphOf(task("a", [], "running")))).toBe(false);
  });

  it("is true when the only open tasks are blocked by a failure", () => {
    expect(isTerminal(graphOf(task("a", [], "failed"), task("b", ["a"])))).toBe(true);
  });
});

describe("terminalOutcome", () => {
  it("is completed when every task succeeded", () => {
    expect(terminalOutcome(graphOf(task("a", [], "succeeded"), task("b", [], "succeeded")))).toBe("completed");
  });

  it("is partial when some tasks succeeded", () => {
    expect(terminalOutcome(graphOf(task("a", [], "succeeded"), task("b", [], "failed")))).toBe("partial");
  });

  it("is failed when nothing succeeded", () => {
    expect(terminalOutcome(graphOf(task("a", [], "failed"), task("b", ["a"], "skipped")))).toBe("failed");
  });
});

describe("countByState", () => {
  it("counts every state", () => {
    const counts = countByState(graphOf(task("a", [], "succeeded"), task("b"), task("c")));
    expect(counts).toEqual({ pending: 2, running: 0, retrying: 0, succeeded: 1, failed: 0, skipped: 0 });
  });
});
