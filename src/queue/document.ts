import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  SCHEMA_VERSION,
  TERMINAL_STATUSES,
  type CompletionReport,
  type EntrySubmission,
  type JobEntry,
  type JobParams,
  type JobStatus,
  type QueueDocument,
} from "../contracts.js";
import {
  DuplicateEntryError,
  InvalidTransitionError,
  NotFoundError,
  QueueDocumentInvalidError,
} from "../errors.js";

const EPOCH = new Date(0).toISOString();

const ALLOWED: Record<JobStatus, readonly JobStatus[]> = {
  PENDING: ["LAUNCHING", "CANCELLED"],
  LAUNCHING: ["RUNNING", "PENDING", "FAILED", "CANCELLED"],
  RUNNING: ["SUCCEEDED", "FAILED", "CANCELLED"],
  SUCCEEDED: [],
  FAILED: [],
  CANCELLED: [],
};

// Legacy entry keys that map onto entry fields; everything else moves into params.
const LEGACY_MAPPED_KEYS = new Set([
  "id",
  "job_id",
  "status",
  "params",
  "execution_name",
  "attempts",
  "created_at",
  "updated_at",
]);

const LEGACY_STATUS: Record<string, JobStatus> = {
  COMPLETED: "SUCCEEDED",
  ERROR: "FAILED",
};

const JobEntrySchema = z.object({
  id: z.string().min(1),
  status: z.enum(["PENDING", "LAUNCHING", "RUNNING", "SUCCEEDED", "FAILED", "CANCELLED"]),
  params: z.record(z.unknown()),
  executionRef: z.string(),
  attempts: z.number().int().min(0),
  lastError: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const QueueDocumentSchema = z.object({
  name: z.string().min(1),
  schemaVersion: z.number().int().min(1),
  running: z.boolean(),
  savedAt: z.string().nullable(),
  entries: z.array(JobEntrySchema),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function sanitizeQueueName(name: string): string {
  const cleaned = name.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, "-");
  return cleaned || "default";
}

export function createQueueDocument(
  name: string,
  options: { running?: boolean } = {}
): QueueDocument {
  return {
    name: sanitizeQueueName(name),
    schemaVersion: SCHEMA_VERSION,
    running: options.running ?? true,
    savedAt: null,
    entries: [],
  };
}

// ── Wire format ─────────────────────────────────────────────────────────────

export function serializeQueueDocument(doc: QueueDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function parseQueueDocument(body: string, queueName: string): QueueDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new QueueDocumentInvalidError(`queue ${queueName}: body is not valid JSON`);
  }

  const candidate = upgradeLegacy(raw, queueName);
  const parsed = QueueDocumentSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new QueueDocumentInvalidError(`queue ${queueName}: document shape invalid`, issues);
  }

  const doc = parsed.data;
  if (doc.schemaVersion > SCHEMA_VERSION) {
    throw new QueueDocumentInvalidError(
      `queue ${queueName}: schemaVersion ${doc.schemaVersion} is newer than ${SCHEMA_VERSION}`
    );
  }

  const seen = new Set<string>();
  for (const entry of doc.entries) {
    if (seen.has(entry.id)) {
      throw new QueueDocumentInvalidError(`queue ${queueName}: duplicate entry id ${entry.id}`);
    }
    seen.add(entry.id);
  }

  return { ...doc, schemaVersion: SCHEMA_VERSION };
}

// Documents written before schemaVersion existed: a bare entry list, or
// { version, queue_running, saved_at, entries } with snake_case entry fields.
function upgradeLegacy(raw: unknown, queueName: string): unknown {
  if (Array.isArray(raw)) {
    return upgradeLegacy({ version: 1, queue_running: true, entries: raw }, queueName);
  }
  if (!isRecord(raw) || typeof raw.schemaVersion === "number") return raw;

  const savedAt = str(raw.saved_at) ?? null;
  const entries = Array.isArray(raw.entries) ? raw.entries : [];
  return {
    name: str(raw.name) ?? sanitizeQueueName(queueName),
    schemaVersion: SCHEMA_VERSION,
    running: typeof raw.queue_running === "boolean" ? raw.queue_running : true,
    savedAt,
    entries: entries.map((entry, index) => upgradeLegacyEntry(entry, index, savedAt)),
  };
}

function upgradeLegacyEntry(entry: unknown, index: number, savedAt: string | null): unknown {
  if (!isRecord(entry)) return entry;

  const rawStatus = typeof entry.status === "string" ? entry.status.toUpperCase() : "PENDING";
  const status = LEGACY_STATUS[rawStatus] ?? rawStatus;
  const rawId = entry.id ?? entry.job_id;
  const id =
    typeof rawId === "number" ? String(rawId) : (str(rawId) ?? String(index + 1));
  const createdAt = str(entry.created_at) ?? str(entry.launched_at) ?? savedAt ?? EPOCH;
  const message = str(entry.message) ?? str(entry.error) ?? "";

  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!LEGACY_MAPPED_KEYS.has(key)) params[key] = value;
  }
  if (isRecord(entry.params)) Object.assign(params, entry.params);

  return {
    id,
    status,
    params,
    executionRef: str(entry.execution_name) ?? "",
    attempts:
      typeof entry.attempts === "number" ? entry.attempts : status === "PENDING" ? 0 : 1,
    lastError: status === "FAILED" ? message : "",
    createdAt,
    updatedAt: str(entry.updated_at) ?? str(entry.completed_at) ?? createdAt,
  };
}

// ── Queries ─────────────────────────────────────────────────────────────────

export function findEntry(doc: QueueDocument, entryId: string): JobEntry {
  const entry = doc.entries.find((e) => e.id === entryId);
  if (!entry) throw new NotFoundError("entry", `${doc.name}/${entryId}`);
  return entry;
}

/** Oldest PENDING entry by insertion order. */
export function nextPending(doc: QueueDocument): JobEntry | undefined {
  return doc.entries.find((e) => e.status === "PENDING");
}

export function countByStatus(doc: QueueDocument): Record<JobStatus, number> {
  const counts: Record<JobStatus, number> = {
    PENDING: 0,
    LAUNCHING: 0,
    RUNNING: 0,
    SUCCEEDED: 0,
    FAILED: 0,
    CANCELLED: 0,
  };
  for (const entry of doc.entries) counts[entry.status] += 1;
  return counts;
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function staleEntries(doc: QueueDocument, olderThanMs: number, now: Date): JobEntry[] {
  const cutoff = now.getTime() - olderThanMs;
  return doc.entries.filter((e) => {
    if (e.status !== "LAUNCHING" && e.status !== "RUNNING") return false;
    const updated = Date.parse(e.updatedAt);
    return Number.isFinite(updated) && updated < cutoff;
  });
}

// ── Transitions ─────────────────────────────────────────────────────────────
// Each helper mutates the entry in place; callers work on a freshly loaded
// document and persist it with a conditional write.

function transition(entry: JobEntry, to: JobStatus, now: Date): void {
  if (!ALLOWED[entry.status].includes(to)) {
    throw new InvalidTransitionError(entry.id, entry.status, to);
  }
  entry.status = to;
  entry.updatedAt = now.toISOString();
}

export function claimEntry(entry: JobEntry, now: Date): void {
  if (entry.status !== "PENDING") {
    throw new InvalidTransitionError(entry.id, entry.status, "LAUNCHING");
  }
  transition(entry, "LAUNCHING", now);
  entry.attempts += 1;
  entry.lastError = "";
}

export function markRunning(entry: JobEntry, executionRef: string, now: Date): void {
  if (!executionRef) {
    throw new InvalidTransitionError(entry.id, entry.status, "RUNNING", "empty executionRef");
  }
  if (entry.status !== "LAUNCHING") {
    throw new InvalidTransitionError(entry.id, entry.status, "RUNNING");
  }
  transition(entry, "RUNNING", now);
  entry.executionRef = executionRef;
  entry.lastError = "";
}

export function requeueEntry(entry: JobEntry, error: string, now: Date): void {
  if (entry.status !== "LAUNCHING") {
    throw new InvalidTransitionError(entry.id, entry.status, "PENDING");
  }
  transition(entry, "PENDING", now);
  entry.lastError = error;
}

export function failEntry(entry: JobEntry, error: string, now: Date): void {
  transition(entry, "FAILED", now);
  entry.lastError = error;
}

export function completeEntry(entry: JobEntry, report: CompletionReport, now: Date): void {
  if (entry.status !== "RUNNING") {
    throw new InvalidTransitionError(entry.id, entry.status, report.status);
  }
  if (report.executionRef && entry.executionRef && report.executionRef !== entry.executionRef) {
    throw new InvalidTransitionError(
      entry.id,
      entry.status,
      report.status,
      `execution ${report.executionRef} does not match ${entry.executionRef}`
    );
  }
  transition(entry, report.status, now);
  entry.lastError = report.status === "FAILED" ? (report.message ?? "execution failed") : "";
}

export function cancelEntry(entry: JobEntry, reason: string, now: Date): void {
  transition(entry, "CANCELLED", now);
  entry.lastError = reason;
}

// ── Submission ──────────────────────────────────────────────────────────────

/** Round-trips params through JSON so that only serializable objects are stored. */
export function normalizeParams(params: unknown): JobParams {
  let copy: unknown;
  try {
    copy = JSON.parse(JSON.stringify(params));
  } catch (err) {
    throw new QueueDocumentInvalidError(
      `params are not serializable: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (!isRecord(copy)) throw new QueueDocumentInvalidError("params must be a JSON object");
  return copy;
}

export function appendEntries(
  doc: QueueDocument,
  submissions: EntrySubmission[],
  now: Date,
  newId: () => string = randomUUID
): JobEntry[] {
  const used = new Set(doc.entries.map((e) => e.id));
  const ts = now.toISOString();
  const added: JobEntry[] = [];

  for (const submission of submissions) {
    const id = submission.id ?? newId();
    if (!id) throw new QueueDocumentInvalidError("entry id must not be empty");
    if (used.has(id)) throw new DuplicateEntryError(id);
    used.add(id);
    added.push({
      id,
      status: "PENDING",
      params: normalizeParams(submission.params),
      executionRef: "",
      attempts: 0,
      lastError: "",
      createdAt: ts,
      updatedAt: ts,
    });
  }

  doc.entries.push(...added);
  return added;
}
