import type { Logger } from "pino";
import type { CompletionReport, EntrySubmission, JobEntry } from "../contracts.js";
import { ConflictError, NotFoundError, errorMessage } from "../errors.js";
import type { ExecutionStatusSource } from "../launcher/types.js";
import { silentLogger } from "../logger.js";
import { CREATE_GENERATION, type QueueStore } from "../persistence.js";
import { noopContext, type QueuePluginContext } from "../plugins/types.js";
import {
  appendEntries,
  completeEntry,
  createQueueDocument,
  findEntry,
  sanitizeQueueName,
} from "../queue/document.js";
import { mutateQueue } from "./mutate.js";

export interface IntakeDeps {
  store: QueueStore;
  logger?: Logger;
  ctx?: QueuePluginContext;
}

export interface IntakeOptions {
  conflictMaxRetries?: number;
  now?: () => Date;
  newId?: () => string;
}

export interface CompletionResult {
  entry: JobEntry;
  /** False when the same report had already been applied. */
  changed: boolean;
}

export interface SyncResult {
  queueName: string;
  checked: number;
  completed: Array<{ id: string; status: CompletionReport["status"] }>;
  errors: Array<{ id: string; message: string }>;
}

export class QueueIntake {
  private readonly store: QueueStore;
  private readonly log: Logger;
  private readonly ctx: QueuePluginContext;
  private readonly conflictMaxRetries: number;
  private readonly now: () => Date;
  private readonly newId?: () => string;

  constructor(deps: IntakeDeps, options: IntakeOptions = {}) {
    this.store = deps.store;
    this.log = (deps.logger ?? silentLogger).child({ component: "intake" });
    this.ctx = deps.ctx ?? noopContext;
    this.conflictMaxRetries = options.conflictMaxRetries ?? 3;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId;
  }

  async submit(
    name: string,
    submissions: EntrySubmission[],
    options: { createIfMissing?: boolean } = {}
  ): Promise<JobEntry[]> {
    const queue = sanitizeQueueName(name);

    for (;;) {
      try {
        const { value } = await mutateQueue(
          this.store,
          queue,
          (doc) => ({
            write: true,
            value: structuredClone(appendEntries(doc, submissions, this.now(), this.newId)),
          }),
          { maxRetries: this.conflictMaxRetries, now: this.now }
        );
        this.submitted(queue, value);
        return value;
      } catch (err) {
        if (!(err instanceof NotFoundError) || err.code !== "queue_not_found") throw err;
        if (!options.createIfMissing) throw err;
      }

      const doc = createQueueDocument(queue);
      const added = appendEntries(doc, submissions, this.now(), this.newId);
      doc.savedAt = this.now().toISOString();
      try {
        await this.store.save(queue, doc, CREATE_GENERATION);
        this.log.info({ queue }, "queue created on first submission");
        this.submitted(queue, added);
        return added;
      } catch (err) {
        // Created concurrently by someone else: append to theirs instead.
        if (!(err instanceof ConflictError)) throw err;
      }
    }
  }

  async reportCompletion(
    name: string,
    entryId: string,
    report: CompletionReport
  ): Promise<CompletionResult> {
    const queue = sanitizeQueueName(name);
    const { value } = await mutateQueue<CompletionResult>(
      this.store,
      queue,
      (doc) => {
        const entry = findEntry(doc, entryId);
        // Only an entry that ran carries a reference; one that failed at launch never completes.
        const repeated =
          entry.status === report.status &&
          entry.executionRef !== "" &&
          (!report.executionRef || report.executionRef === entry.executionRef);
        if (repeated) return { write: false, value: { entry: structuredClone(entry), changed: false } };

        completeEntry(entry, report, this.now());
        return { write: true, value: { entry: structuredClone(entry), changed: true } };
      },
      { maxRetries: this.conflictMaxRetries, now: this.now }
    );

    if (value.changed) {
      this.log.info(
        { queue, entryId, executionRef: value.entry.executionRef, status: report.status },
        "completion recorded"
      );
      this.emit("entry.completed", queue, entryId, { status: report.status });
    }
    return value;
  }

  /** Polls the backend for every RUNNING entry and records the terminal ones. */
  async syncRunning(name: string, source: ExecutionStatusSource): Promise<SyncResult> {
    const queue = sanitizeQueueName(name);
    const { document } = await this.store.load(queue);
    const running = document.entries.filter((e) => e.status === "RUNNING" && e.executionRef);
    const result: SyncResult = { queueName: queue, checked: running.length, completed: [], errors: [] };

    for (const entry of running) {
      try {
        const status = await source.getExecutionStatus(entry.executionRef);
        if (status.state !== "SUCCEEDED" && status.state !== "FAILED") continue;
        await this.reportCompletion(queue, entry.id, {
          status: status.state,
          executionRef: entry.executionRef,
          message: status.message,
        });
        result.completed.push({ id: entry.id, status: status.state });
      } catch (err) {
        this.log.warn({ queue, entryId: entry.id, err: errorMessage(err) }, "status sync failed");
        result.errors.push({ id: entry.id, message: errorMessage(err) });
      }
    }

    return result;
  }

  private submitted(queue: string, added: JobEntry[]) {
    this.log.info({ queue, count: added.length }, "entries submitted");
    for (const entry of added) this.emit("entry.submitted", queue, entry.id);
  }

  private emit(type: string, queue: string, entryId?: string, detail?: Record<string, unknown>) {
    this.ctx.emit({ type, at: this.now().getTime(), queue, entryId, detail });
  }
}
