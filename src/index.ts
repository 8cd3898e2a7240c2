// Config
export { getConfig, configure, resetConfig, configFromEnv, defaults } from "./config.js";
export type { DispatchConfig, DeepPartial } from "./config.js";

// Errors
export {
  DispatchError,
  TransportError,
  BackendUnavailableError,
  BackendRejectedError,
  WorkerBusyError,
  CancelledError,
  NoEligibleWorkerError,
  ValidationError,
  ConfigError,
  toFailure,
} from "./errors.js";
export type { ErrorCode, FailureReason, TransportErrorKind } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  GenerationResponseSchema,
  BackendErrorSchema,
  TaskSpecSchema,
  BatchFileSchema,
  WorkerSpecSchema,
  TeamFileSchema,
} from "./schemas.js";
export type { TaskSpec, WorkerSpec } from "./schemas.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, RunOptions, TaskSummary, WorkerStatusReport } from "./orchestrator.js";

// Notifications
export { ConsoleSink, nullSink, invokeSink } from "./notifications.js";
export type { NotificationSink } from "./notifications.js";

// Backend
export { GenerationClient, getTotalAttempts, resetTotalAttempts } from "./backend/generation-client.js";
export type { GenerationClientOptions } from "./backend/generation-client.js";
export type {
  Generator,
  GenerationRequest,
  GenerationResult,
  GenerateOptions,
  InteractionEvent,
} from "./backend/types.js";

// Team
export { Worker } from "./team/worker.js";
export type { ProcessOptions } from "./team/worker.js";
export { Roster, loadTeamFile, defaultTeamPath } from "./team/roster.js";
export { TaskQueue } from "./team/task-queue.js";
export { isTerminal, taskLabel } from "./team/types.js";
export type {
  Task,
  TaskStatus,
  TaskOutcome,
  TaskResult,
  TaskSnapshot,
  WorkerSnapshot,
  WorkerStatus,
} from "./team/types.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay, sleep } from "./utils/retry.js";
export type { RetryOptions, BackoffPolicy } from "./utils/retry.js";
