// Config
export { getConfig, configure, resetConfig, resolveConfig, defaults } from "./config.js";
export type { OrchestratorConfig, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  PlanningError,
  ProviderError,
  CheckpointError,
  GraphIntegrityError,
  ValidationError,
  ParseError,
  ConfigError,
  NotFoundError,
  PROVIDER_ERROR_KINDS,
  toProviderError,
} from "./errors.js";
export type { ErrorCode, ProviderErrorKind } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  PlanConstraintsSchema,
  PlannerResponseSchema,
  GeneratorResponseSchema,
  ProviderConfigSchema,
  ProviderFileSchema,
  CheckpointSnapshotSchema,
} from "./schemas.js";
export type { ProviderConfig, CheckpointSnapshot } from "./schemas.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, GenerationStatus, TaskStatus } from "./orchestrator.js";

// Planning
export { Planner, inferModules, selectFramework, deriveAppName, extractFeatures } from "./planner/planner.js";
export type { PlannerOptions } from "./planner/planner.js";
export {
  createTaskGraph,
  validate,
  readyTasks,
  topologicalSort,
  pendingDownstream,
  isTerminal,
  terminalOutcome,
} from "./planner/task-graph.js";
export type { TaskSpec } from "./planner/task-graph.js";
export { canTransition, assertTransition } from "./planner/state-machine.js";
export { MODULE_KINDS, TASK_KINDS } from "./planner/types.js";
export type {
  ModuleKind,
  TaskKind,
  TaskState,
  Task,
  TaskGraph,
  TaskInput,
  TaskError,
  GeneratorOutput,
  PlanConstraints,
} from "./planner/types.js";

// Execution
export { Executor } from "./executor/executor.js";
export type { ExecutorOptions } from "./executor/executor.js";
export { GraphCoordinator } from "./executor/coordinator.js";
export { FallbackCoordinator } from "./executor/fallback.js";
export type { FallbackDecision, FallbackOptions, FailureContext } from "./executor/fallback.js";
export { EventChannel } from "./executor/events.js";
export type { EventRecord, EventListener } from "./executor/events.js";
export type {
  EventSink,
  ExecutionOptions,
  ExecutionResult,
  GenerationOutcome,
  GenerationState,
  ProgressEvent,
} from "./executor/types.js";

// Generators
export { PromptGenerator, createPromptGenerators, buildPrompt, parseGeneratorResponse } from "./generators/prompt-generators.js";
export type { ContextSource, GenerationContext, GeneratorTable, ModuleGenerator } from "./generators/types.js";

// Providers
export type { ProviderAdapter, CompletionConstraints } from "./providers/adapter.js";
export { FunctionProvider } from "./providers/function-provider.js";
export type { CompletionFunction, FunctionProviderOptions } from "./providers/function-provider.js";
export { HttpProvider, classifyStatus, parseRetryAfter } from "./providers/http-provider.js";
export type { HttpProviderOptions } from "./providers/http-provider.js";
export { ProviderGateway, estimateTokens } from "./providers/gateway.js";
export type { ProviderGatewayOptions, ProviderRegistration, ProviderStatus } from "./providers/gateway.js";
export { ProviderHealthRegistry } from "./providers/health.js";
export type { ProviderHealthRecord } from "./providers/health.js";

// Persistence
export type { CheckpointStore, CheckpointSummary } from "./persistence/checkpoint-store.js";
export { KeyValueCheckpointStore, MemoryKeyValueStore } from "./persistence/kv-store.js";
export type { KeyValueStore } from "./persistence/kv-store.js";
export { SqliteCheckpointStore } from "./persistence/sqlite-store.js";
export { toSnapshot, fromSnapshot, assertConsistent } from "./persistence/snapshot.js";

// Utils
export { log, createLogger, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { RetryPolicy, withRetry } from "./utils/retry.js";
export type { RetryPolicyOptions, RetryDecision } from "./utils/retry.js";
export { CircuitBreaker } from "./utils/circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./utils/circuit-breaker.js";
export { RateLimiter, RateLimiterRegistry } from "./utils/rate-limiter.js";
export type { RateLimiterOptions, RateLimiterStats } from "./utils/rate-limiter.js";
