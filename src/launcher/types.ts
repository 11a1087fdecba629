import type { JobParams } from "../contracts.js";

export interface LaunchContext {
  queueName: string;
  entryId: string;
  attempt: number;
  /** Aborted when the caller's launch timeout elapses. */
  signal: AbortSignal;
}

/**
 * Starts exactly one backend execution per call and returns its reference,
 * or throws a LaunchError. Implementations never retry on their own.
 */
export interface JobLauncher {
  readonly name: string;
  launch(params: JobParams, ctx: LaunchContext): Promise<string>;
}

export type ExecutionState = "RUNNING" | "SUCCEEDED" | "FAILED" | "UNKNOWN";

export interface ExecutionStatus {
  state: ExecutionState;
  message?: string;
}

export interface ExecutionStatusSource {
  getExecutionStatus(executionRef: string, signal?: AbortSignal): Promise<ExecutionStatus>;
}
