export * from "./contracts.js";
export * from "./errors.js";
export { loadConfig, loadProcessConfig, ConfigError, type AppConfig } from "./config.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export { CREATE_GENERATION, InMemoryQueueStore, queueBlobPath, type QueueStore } from "./persistence.js";
export { RedisQueueStore } from "./persistence/redis-adapter.js";
export * from "./queue/document.js";
export type { ExecutionState, ExecutionStatus, ExecutionStatusSource, JobLauncher, LaunchContext } from "./launcher/types.js";
export {
  HttpJobLauncher,
  buildRunRequest,
  classifyHttpStatus,
  extractExecutionRef,
  type FetchLike,
  type HttpJobLauncherOptions,
} from "./launcher/http-launcher.js";
export { CommandJobLauncher, classifySpawnError, splitCommandLine, type CommandJobLauncherOptions } from "./launcher/command-launcher.js";
export { mutateQueue, type MutateOptions, type MutateResult, type MutationStep } from "./control/mutate.js";
export {
  DEFAULT_FAILURE_POLICY,
  LAUNCH_FAILURE_KINDS,
  computeLaunchDecision,
  policyFromRetryableKinds,
  type FailurePolicy,
  type LaunchDecision,
} from "./control/retry-policy.js";
export { TickEngine, type Ticker, type TickEngineOptions, type TickOptions } from "./control/tick-engine.js";
export { QueueAdmin, type ReconcileResult, type RunningFlag } from "./control/admin.js";
export { QueueIntake, type CompletionResult, type SyncResult } from "./control/intake.js";
export { startTickScheduler } from "./control/tick-scheduler.js";
export { createRuntime, type Runtime } from "./runtime.js";
export { buildControlPlane, startControlPlane, type ControlPlaneOptions } from "./control-plane.js";
export type { QueueEvent, QueuePlugin, QueuePluginContext } from "./plugins/types.js";
