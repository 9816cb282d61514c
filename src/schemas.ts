import { z } from "zod";
import { PROVIDER_ERROR_KINDS } from "./errors.js";
import { TASK_KINDS } from "./planner/types.js";

const ErrorKind = z.enum(PROVIDER_ERROR_KINDS);

/** Run a schema, turning its issues into one readable message for the caller's error type. */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  fail: (message: string) => Error,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fail(formatIssues(result.error));
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

// ── Planning ──────────────────────────────────────────────

export const PlanConstraintsSchema = z
  .object({
    /** Module kinds to generate instead of the inferred ones. */
    modules: z.array(z.string().min(1)).min(1).optional(),
    frameworks: z
      .object({
        frontend: z.string().min(1).optional(),
        backend: z.string().min(1).optional(),
        database: z.string().min(1).optional(),
        auth: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    appName: z.string().trim().min(1).optional(),
    features: z.array(z.string().min(1)).optional(),
    includeDeployment: z.boolean().optional(),
  })
  .strict();

/** Structured extraction an LLM may return for a requirement. */
export const PlannerResponseSchema = z.object({
  appName: z.string().trim().min(1).optional(),
  features: z.array(z.string()).optional(),
  modules: z.array(z.string()).optional(),
});
export type PlannerResponse = z.infer<typeof PlannerResponseSchema>;

// ── Generators ────────────────────────────────────────────

export const GeneratorResponseSchema = z.object({
  files: z
    .record(z.string().min(1), z.string())
    .refine((files) => Object.keys(files).length > 0, { message: "must contain at least one file" }),
  summary: z.string().optional(),
});
export type GeneratorResponse = z.infer<typeof GeneratorResponseSchema>;

// ── Providers ─────────────────────────────────────────────

export const ProviderConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  description: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  model: z.string().optional(),
  priority: z.number().int().optional(),
  timeout: z.number().int().positive().optional(),
  /** Requests per rate-limit window. */
  maxRequests: z.number().int().positive().optional(),
});
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const ProviderFileSchema = z.array(ProviderConfigSchema).min(1);

export const ProviderHealthRecordSchema = z.object({
  provider: z.string(),
  consecutiveFailures: z.number().int().nonnegative(),
  totalCalls: z.number().int().nonnegative(),
  totalFailures: z.number().int().nonnegative(),
  rejectedCalls: z.number().int().nonnegative(),
  failuresByKind: z.object({
    transient: z.number().int().optional(),
    rate_limited: z.number().int().optional(),
    invalid_output: z.number().int().optional(),
    permanent: z.number().int().optional(),
    provider_unavailable: z.number().int().optional(),
  }),
  circuit: z.enum(["closed", "open", "half_open"]),
  lastStateChange: z.number(),
  budget: z
    .object({
      remainingRequests: z.number(),
      remainingTokens: z.number().optional(),
      nextAvailableInMs: z.number(),
      queued: z.number(),
    })
    .optional(),
});

// ── Checkpoints ───────────────────────────────────────────

const TaskErrorSchema = z.object({
  kind: ErrorKind,
  message: z.string(),
  provider: z.string().optional(),
});

const TaskSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(TASK_KINDS),
  title: z.string(),
  input: z.object({
    requirement: z.string(),
    appName: z.string(),
    features: z.array(z.string()),
    framework: z.string().optional(),
    context: z.array(z.string()).optional(),
  }),
  dependsOn: z.array(z.string()),
  state: z.enum(["pending", "running", "retrying", "succeeded", "failed", "skipped"]),
  attempts: z.number().int().nonnegative(),
  lastError: TaskErrorSchema.optional(),
  provider: z.string().optional(),
  result: z
    .object({
      content: z.string(),
      files: z.record(z.string(), z.string()).optional(),
      summary: z.string().optional(),
    })
    .optional(),
  createdAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
});

export const CheckpointSnapshotSchema = z.object({
  generationId: z.string().min(1),
  sequence: z.number().int().positive(),
  requirement: z.string(),
  appName: z.string(),
  createdAt: z.number(),
  savedAt: z.number(),
  tasks: z.array(TaskSchema),
});
export type CheckpointSnapshot = z.infer<typeof CheckpointSnapshotSchema>;
