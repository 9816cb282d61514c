import { getConfig } from "../config.js";
import { ParseError, ValidationError } from "../errors.js";
import type { GeneratorOutput, Task, TaskKind } from "../planner/types.js";
import { GeneratorResponseSchema, parseOrThrow } from "../schemas.js";
import type { GenerationContext, GeneratorTable, ModuleGenerator } from "./types.js";

const BRIEFS: Record<TaskKind, string> = {
  database: "Design the database layer: schema, migrations and a typed data-access module.",
  backend: "Implement the backend service: HTTP routes, request validation and business logic.",
  auth: "Implement authentication: sign-up, login, session or token handling and route guards.",
  frontend: "Implement the frontend: pages, components and the client calls to the backend.",
  integration: "Wire the modules together: shared configuration, environment variables and an end-to-end smoke test.",
  deployment: "Write deployment artifacts: container build files and a start script for every module.",
};

const SYSTEM_PROMPT =
  "You are a senior engineer generating one module of an application. " +
  'Reply with a single JSON object: {"files": {"<path>": "<content>"}, "summary": "<one paragraph>"}. ' +
  "No prose outside the JSON.";

export type PromptGeneratorOptions = {
  model?: string;
  maxTokens?: number;
  temperature?: number;
};

/** Build the prompt for one attempt at a task. */
export function buildPrompt(task: Task, ctx: Pick<GenerationContext, "dependencies" | "revisionNote">): string {
  const { input } = task;
  const limit = getConfig().limits.outputTruncation;
  const lines = [
    `# ${task.title}`,
    BRIEFS[task.kind],
    "",
    `Application: ${input.appName}`,
    `Requirement: ${input.requirement}`,
  ];
  if (input.framework) lines.push(`Framework: ${input.framework}`);
  if (input.features.length > 0) lines.push(`Features: ${input.features.join(", ")}`);

  const deps = Object.entries(ctx.dependencies);
  if (deps.length > 0) {
    lines.push("", "## Upstream modules");
    for (const [id, output] of deps) {
      const files = output.files ? Object.keys(output.files).join(", ") : "";
      lines.push(`- ${id}: ${(output.summary ?? output.content).slice(0, limit)}${files ? ` (files: ${files})` : ""}`);
    }
  }
  if (input.context && input.context.length > 0) {
    lines.push("", "## Reference material");
    for (const snippet of input.context) lines.push(snippet.slice(0, limit), "");
  }
  if (ctx.revisionNote) {
    lines.push("", "## Revision", `The previous answer was rejected: ${ctx.revisionNote}`, "Fix this in the new answer.");
  }
  return lines.join("\n");
}

/** Parse a model reply into generator output. Markdown fences around the JSON are tolerated. */
export function parseGeneratorResponse(text: string): GeneratorOutput {
  const body = stripFences(text);
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch (err) {
    throw new ParseError(`Generator reply is not JSON: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  const parsed = parseOrThrow(
    GeneratorResponseSchema,
    value,
    (msg) => new ValidationError("VALIDATION_FAILED", `Generator reply has the wrong shape: ${msg}`),
  );
  return { content: body, files: parsed.files, summary: parsed.summary };
}

function stripFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

/** Generator that asks the assigned provider for a JSON file map. */
export class PromptGenerator implements ModuleGenerator {
  private opts: PromptGeneratorOptions;

  constructor(opts: PromptGeneratorOptions = {}) {
    this.opts = opts;
  }

  async generate(task: Task, ctx: GenerationContext): Promise<GeneratorOutput> {
    const text = await ctx.complete(buildPrompt(task, ctx), {
      system: SYSTEM_PROMPT,
      model: this.opts.model,
      maxTokens: this.opts.maxTokens,
      temperature: this.opts.temperature,
    });
    return parseGeneratorResponse(text);
  }

  validate(output: GeneratorOutput): string | undefined {
    const empty = Object.entries(output.files ?? {})
      .filter(([, content]) => content.trim() === "")
      .map(([path]) => path);
    if (empty.length > 0) return `empty files: ${empty.join(", ")}`;
    return undefined;
  }
}

/** Default capability table: the same prompt-driven generator for every task kind. */
export function createPromptGenerators(opts: PromptGeneratorOptions = {}): GeneratorTable {
  const generator = new PromptGenerator(opts);
  return {
    frontend: generator,
    backend: generator,
    database: generator,
    auth: generator,
    integration: generator,
    deployment: generator,
  };
}
