import type { ProviderErrorKind } from "../errors.js";

export const MODULE_KINDS = ["frontend", "backend", "database", "auth"] as const;
export const TASK_KINDS = [...MODULE_KINDS, "integration", "deployment"] as const;

/** Kinds the planner derives from a requirement. */
export type ModuleKind = (typeof MODULE_KINDS)[number];
export type TaskKind = (typeof TASK_KINDS)[number];

export type TaskState = "pending" | "running" | "retrying" | "succeeded" | "failed" | "skipped";

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set(["succeeded", "failed", "skipped"]);

export type TaskError = {
  kind: ProviderErrorKind;
  message: string;
  provider?: string;
};

/** Structured input a generator renders a module from. */
export type TaskInput = {
  requirement: string;
  appName: string;
  features: string[];
  framework?: string;
  /** Snippets from the context source, when one is configured. */
  context?: string[];
};

export type GeneratorOutput = {
  content: string;
  files?: Record<string, string>;
  summary?: string;
};

export type Task = {
  id: string;
  kind: TaskKind;
  title: string;
  input: TaskInput;
  dependsOn: string[];
  state: TaskState;
  attempts: number;
  lastError?: TaskError;
  provider?: string;
  result?: GeneratorOutput;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
};

export type TaskGraph = {
  /** The generation id. */
  id: string;
  requirement: string;
  appName: string;
  tasks: Task[];
  createdAt: number;
};

export type PlanConstraints = {
  modules?: string[];
  frameworks?: Partial<Record<ModuleKind, string>>;
  appName?: string;
  features?: string[];
  includeDeployment?: boolean;
};
