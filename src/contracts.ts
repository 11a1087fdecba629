export const SCHEMA_VERSION = 2;

export type JobStatus =
  | "PENDING"
  | "LAUNCHING"
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED"
  | "CANCELLED";

export const JOB_STATUSES: readonly JobStatus[] = [
  "PENDING",
  "LAUNCHING",
  "RUNNING",
  "SUCCEEDED",
  "FAILED",
  "CANCELLED",
];

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set([
  "SUCCEEDED",
  "FAILED",
  "CANCELLED",
]);

export type JobParams = Record<string, unknown>;

export interface JobEntry {
  id: string;
  status: JobStatus;
  /** Producer-defined launch parameters, passed through to the launcher untouched. */
  params: JobParams;
  /** Backend execution identifier; empty until the launch succeeds. */
  executionRef: string;
  attempts: number;
  lastError: string;
  createdAt: string;
  updatedAt: string;
}

export interface QueueDocument {
  name: string;
  schemaVersion: number;
  running: boolean;
  savedAt: string | null;
  entries: JobEntry[];
}

/** A document together with the store's precondition token for it. */
export interface LoadedQueue {
  document: QueueDocument;
  generation: string;
}

export type TickReason =
  | "launched"
  | "retry-scheduled"
  | "launch-failed"
  | "paused"
  | "empty"
  | "busy"
  | "conflict-exhausted";

export interface TickResult {
  queueName: string;
  reason: TickReason;
  /** The entry that reached RUNNING in this tick, if any. */
  launched: JobEntry | null;
  /** Final state of the entry this tick claimed, whatever the outcome. */
  entry: JobEntry | null;
  conflicts: number;
}

export type DrainStop = TickReason | "max-ticks";

export interface DrainResult {
  queueName: string;
  ticks: number;
  launched: number;
  stoppedBy: DrainStop;
  results: TickResult[];
}

export interface QueueStatus {
  queueName: string;
  running: boolean;
  total: number;
  counts: Record<JobStatus, number>;
  savedAt: string | null;
  generation: string;
  stale: Array<Pick<JobEntry, "id" | "status" | "updatedAt" | "executionRef">>;
}

export interface EntrySubmission {
  id?: string;
  params: JobParams;
}

export interface CompletionReport {
  status: "SUCCEEDED" | "FAILED";
  executionRef?: string;
  message?: string;
}

export type ReconcileAction = "fail" | "requeue";
