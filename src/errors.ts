import type { JobStatus } from "./contracts.js";

export type LaunchFailureKind =
  | "permission"
  | "not_found"
  | "invalid"
  | "quota"
  | "transient"
  | "timeout"
  | "unknown";

export type QueueErrorCode =
  | "queue_not_found"
  | "entry_not_found"
  | "generation_conflict"
  | "storage_unavailable"
  | "launch_failed"
  | "attempts_exhausted"
  | "invalid_transition"
  | "duplicate_entry"
  | "invalid_document"
  | "outcome_not_persisted";

export class QueueError extends Error {
  constructor(
    public readonly code: QueueErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "QueueError";
  }
}

export class NotFoundError extends QueueError {
  constructor(what: "queue" | "entry", id: string) {
    super(what === "queue" ? "queue_not_found" : "entry_not_found", `${what} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends QueueError {
  constructor(
    public readonly queueName: string,
    public readonly expectedGeneration: string
  ) {
    super(
      "generation_conflict",
      `queue ${queueName} changed since generation ${expectedGeneration}`
    );
    this.name = "ConflictError";
  }
}

export class StorageUnavailableError extends QueueError {
  constructor(message: string, cause?: unknown) {
    super("storage_unavailable", message, { cause });
    this.name = "StorageUnavailableError";
  }
}

export class LaunchError extends QueueError {
  constructor(
    public readonly kind: LaunchFailureKind,
    message: string,
    /** Overrides the failure policy table when set. */
    public readonly retryable?: boolean,
    cause?: unknown
  ) {
    super("launch_failed", message, { cause });
    this.name = "LaunchError";
  }
}

export class AttemptsExhaustedError extends QueueError {
  constructor(
    public readonly attempts: number,
    public readonly lastFailure: LaunchError
  ) {
    super("attempts_exhausted", `attempts exhausted (${attempts}): ${lastFailure.message}`, {
      cause: lastFailure,
    });
    this.name = "AttemptsExhaustedError";
  }
}

export class InvalidTransitionError extends QueueError {
  constructor(entryId: string, from: JobStatus, to: JobStatus, detail?: string) {
    super(
      "invalid_transition",
      `entry ${entryId}: ${from} -> ${to} not allowed${detail ? ` (${detail})` : ""}`
    );
    this.name = "InvalidTransitionError";
  }
}

export class DuplicateEntryError extends QueueError {
  constructor(entryId: string) {
    super("duplicate_entry", `entry id already used: ${entryId}`);
    this.name = "DuplicateEntryError";
  }
}

export class QueueDocumentInvalidError extends QueueError {
  constructor(message: string, public readonly issues: string[] = []) {
    super("invalid_document", message);
    this.name = "QueueDocumentInvalidError";
  }
}

export class OutcomePersistError extends QueueError {
  constructor(
    public readonly queueName: string,
    public readonly entryId: string,
    public readonly executionRef: string,
    cause?: unknown
  ) {
    super(
      "outcome_not_persisted",
      `launch outcome for ${queueName}/${entryId} not persisted` +
        (executionRef ? ` (execution ${executionRef})` : ""),
      { cause }
    );
    this.name = "OutcomePersistError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
