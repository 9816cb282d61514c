import { getConfig } from "../config.js";
import { ParseError, PlanningError } from "../errors.js";
import type { ContextSource } from "../generators/types.js";
import type { ProviderGateway } from "../providers/gateway.js";
import { PlanConstraintsSchema, PlannerResponseSchema, parseOrThrow, type PlannerResponse } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { createTaskGraph, type TaskSpec } from "./task-graph.js";
import { MODULE_KINDS, type ModuleKind, type PlanConstraints, type TaskGraph, type TaskInput } from "./types.js";

const log = createLogger("planner");

const EXTRACTION_SYSTEM_PROMPT = `You analyse application requirements.

Output ONLY valid JSON matching this schema:
{
  "appName": "short human-readable name",
  "features": ["feature", "..."],
  "modules": ["frontend" | "backend" | "database" | "auth"]
}

Output raw JSON only, no markdown fences`;

const AUTH_WORDS = /\b(auth|authentication|login|log[- ]in|sign[- ]?up|sign[- ]?in|accounts?|passwords?|oauth|sso|roles?)\b/i;
const FRONTEND_WORDS = /\b(app|application|web|website|site|ui|dashboard|pages?|frontend|portal)\b/i;
const API_ONLY_WORDS = /\b(api|backend|service|microservice|cli)\b/i;
const STATELESS_WORDS = /\b(static|stateless)\b/i;

const FRAMEWORK_RULES: Record<ModuleKind, { match: RegExp; framework: string; otherwise: string }> = {
  frontend: { match: /\b(shop|store|commerce|e-?commerce)\b/i, framework: "next.js", otherwise: "react" },
  backend: { match: /\b(python|fastapi)\b/i, framework: "fastapi", otherwise: "express" },
  database: { match: /\b(realtime|real-time|document|firebase|firestore)\b/i, framework: "firestore", otherwise: "postgres" },
  auth: { match: /\b(oauth|google|social)\b/i, framework: "oauth", otherwise: "jwt" },
};

const TITLES: Record<ModuleKind, string> = {
  database: "Database layer",
  backend: "Backend service",
  auth: "Authentication",
  frontend: "Frontend",
};

export function isModuleKind(value: string): value is ModuleKind {
  return MODULE_KINDS.some((kind) => kind === value);
}

/** Module kinds implied by the requirement's wording. */
export function inferModules(requirement: string): ModuleKind[] {
  const modules: ModuleKind[] = ["backend"];
  if (!STATELESS_WORDS.test(requirement)) modules.push("database");
  if (AUTH_WORDS.test(requirement)) modules.push("auth");
  if (FRONTEND_WORDS.test(requirement) || !API_ONLY_WORDS.test(requirement)) modules.push("frontend");
  return modules;
}

export function selectFramework(kind: ModuleKind, requirement: string): string {
  const rule = FRAMEWORK_RULES[kind];
  return rule.match.test(requirement) ? rule.framework : rule.otherwise;
}

/** "Build a todo app with auth" → "Todo App". */
export function deriveAppName(requirement: string): string {
  const head = requirement
    .split(/\s+(?:with|that|for)\s+|,/i)[0]
    .replace(/^(please\s+)?(build|create|make|generate|write|develop)\s+/i, "")
    .replace(/^(a|an|the|my)\s+/i, "")
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .trim();
  const words = head.split(/\s+/).filter(Boolean).slice(0, 5);
  if (words.length === 0) return "App";
  return words.map((w) => w[0].toUpperCase() + w.slice(1).toLowerCase()).join(" ");
}

/** Features listed after "with": "a shop with cart, search and reviews" → ["cart", "search", "reviews"]. */
export function extractFeatures(requirement: string): string[] {
  const match = /\bwith\s+(.+)$/i.exec(requirement);
  if (!match) return [];
  return match[1]
    .split(/,|\band\b/i)
    .map((f) => f.replace(/[.!?]+$/, "").trim().toLowerCase())
    .filter((f) => f.length > 0);
}

export type PlannerOptions = {
  /** Gateway used for structured requirement extraction. Without it planning is keyword-only. */
  gateway?: ProviderGateway;
  /** Provider to ask; defaults to the healthiest one. */
  provider?: string;
  context?: ContextSource;
};

/**
 * Turns a requirement into a task graph: one task per module kind, plus an
 * integration task and optionally a deployment task.
 */
export class Planner {
  private gateway?: ProviderGateway;
  private provider?: string;
  private context?: ContextSource;

  constructor(opts: PlannerOptions = {}) {
    this.gateway = opts.gateway;
    this.provider = opts.provider;
    this.context = opts.context;
  }

  async plan(requirement: string, constraints: unknown = {}, id?: string): Promise<TaskGraph> {
    const text = requirement.trim();
    if (text === "") {
      throw new PlanningError("EMPTY_REQUIREMENT", "Requirement is empty");
    }
    const { minRequirementWords } = getConfig().planning;
    const words = text.split(/\s+/).filter((w) => /[\p{L}\p{N}]/u.test(w));
    if (words.length < minRequirementWords) {
      throw new PlanningError(
        "VAGUE_REQUIREMENT",
        `Requirement "${text}" is too vague: describe the application in at least ${minRequirementWords} words`,
      );
    }

    const opts: PlanConstraints = parseOrThrow(
      PlanConstraintsSchema,
      constraints,
      (msg) => new PlanningError("INVALID_CONSTRAINTS", `Invalid constraints: ${msg}`),
    );
    const unsupported = (opts.modules ?? []).filter((m) => !isModuleKind(m));
    if (unsupported.length > 0) {
      throw new PlanningError(
        "UNSUPPORTED_MODULE",
        `Unsupported module kind(s): ${unsupported.join(", ")} (expected one of ${MODULE_KINDS.join(", ")})`,
      );
    }

    const extracted = await this.extract(text);
    const requested: string[] = opts.modules ?? extracted?.modules ?? inferModules(text);
    const modules = dedupe(requested.filter(isModuleKind));
    const appName = opts.appName ?? extracted?.appName ?? deriveAppName(text);
    const features = opts.features ?? extracted?.features ?? extractFeatures(text);
    const context = await this.retrieveContext(text);

    const specs = buildSpecs(modules, opts.includeDeployment ?? true, (kind) => ({
      requirement: text,
      appName,
      features,
      framework: kind ? opts.frameworks?.[kind] ?? selectFramework(kind, text) : undefined,
      context: context.length > 0 ? context : undefined,
    }));

    const graph = createTaskGraph(text, appName, specs, id);
    log.info(`Planned ${graph.tasks.length} tasks for "${appName}"`, {
      generationId: graph.id,
      tasks: graph.tasks.map((t) => t.id),
    });
    return graph;
  }

  /** Ask a provider for structured fields. Any failure falls back to keyword analysis. */
  private async extract(requirement: string): Promise<PlannerResponse | undefined> {
    const gateway = this.gateway;
    if (!gateway) return undefined;
    const provider = this.provider ?? gateway.rank()[0];
    if (!provider) return undefined;

    try {
      const raw = await gateway.complete(provider, `Requirement: ${requirement}`, {
        system: EXTRACTION_SYSTEM_PROMPT,
        temperature: 0,
      });
      const parsed = parseOrThrow(
        PlannerResponseSchema,
        parseJson(raw),
        (msg) => new ParseError(`Planner reply has the wrong shape: ${msg}`),
      );
      const modules = parsed.modules?.filter(isModuleKind);
      log.debug("Requirement extraction succeeded", { provider, modules });
      return { ...parsed, modules: modules && modules.length > 0 ? modules : undefined };
    } catch (err) {
      log.warn("Requirement extraction failed, using keyword analysis", {
        provider,
        error: err instanceof Error ? err.message : String(err),
      });
      return undefined;
    }
  }

  private async retrieveContext(requirement: string): Promise<string[]> {
    if (!this.context) return [];
    try {
      return await this.context.retrieve(requirement, getConfig().planning.contextSnippets);
    } catch (err) {
      log.warn("Context retrieval failed, planning without it", {
        error: err instanceof Error ? err.message : String(err),
      });
      return [];
    }
  }
}

function parseJson(raw: string): unknown {
  const body = raw.trim().replace(/^```[a-zA-Z]*\s*\n?/, "").replace(/\n?```$/, "");
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new ParseError("Planner reply is not JSON", { cause: err });
  }
}

function dedupe<T>(values: T[]): T[] {
  return [...new Set(values)];
}

/**
 * Dependency layout: database first; backend and auth on database; frontend
 * on backend and auth; integration on every module; deployment last.
 */
function buildSpecs(
  modules: ModuleKind[],
  includeDeployment: boolean,
  inputFor: (kind?: ModuleKind) => TaskInput,
): TaskSpec[] {
  const has = (kind: ModuleKind) => modules.includes(kind);
  const deps: Record<ModuleKind, ModuleKind[]> = {
    database: [],
    backend: ["database"],
    auth: ["database"],
    frontend: ["backend", "auth"],
  };

  // Fixed order keeps task ids and dispatch order stable.
  const ordered = (["database", "backend", "auth", "frontend"] as const).filter(has);
  const specs: TaskSpec[] = ordered.map((kind) => {
    const input = inputFor(kind);
    return {
      id: kind,
      kind,
      title: `${TITLES[kind]} (${input.framework})`,
      input,
      dependsOn: deps[kind].filter(has),
    };
  });

  specs.push({
    id: "integration",
    kind: "integration",
    title: "Integrate modules",
    input: inputFor(),
    dependsOn: [...ordered],
  });
  if (includeDeployment) {
    specs.push({
      id: "deployment",
      kind: "deployment",
      title: "Prepare deployment",
      input: inputFor(),
      dependsOn: ["integration"],
    });
  }
  return specs;
}
