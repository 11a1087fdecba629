import type { Logger } from "pino";
import type {
  DrainResult,
  JobEntry,
  LoadedQueue,
  QueueStatus,
  ReconcileAction,
  TickResult,
} from "../contracts.js";
import { silentLogger } from "../logger.js";
import { CREATE_GENERATION, type QueueStore } from "../persistence.js";
import { noopContext, type QueuePluginContext } from "../plugins/types.js";
import {
  cancelEntry,
  countByStatus,
  createQueueDocument,
  failEntry,
  findEntry,
  requeueEntry,
  sanitizeQueueName,
  staleEntries,
} from "../queue/document.js";
import { mutateQueue } from "./mutate.js";
import type { Ticker, TickOptions } from "./tick-engine.js";

export interface AdminDeps {
  store: QueueStore;
  engine: Ticker;
  logger?: Logger;
  ctx?: QueuePluginContext;
}

export interface AdminOptions {
  conflictMaxRetries?: number;
  staleAfterMs?: number;
  now?: () => Date;
}

export interface RunningFlag {
  queueName: string;
  running: boolean;
  changed: boolean;
  generation: string;
}

export interface ReconcileResult {
  queueName: string;
  action: ReconcileAction;
  affected: string[];
}

const STOP_REASONS = new Set(["paused", "busy", "conflict-exhausted", "empty"]);

export class QueueAdmin {
  private readonly store: QueueStore;
  private readonly engine: Ticker;
  private readonly log: Logger;
  private readonly ctx: QueuePluginContext;
  private readonly conflictMaxRetries: number;
  private readonly staleAfterMs: number;
  private readonly now: () => Date;

  constructor(deps: AdminDeps, options: AdminOptions = {}) {
    this.store = deps.store;
    this.engine = deps.engine;
    this.log = (deps.logger ?? silentLogger).child({ component: "admin" });
    this.ctx = deps.ctx ?? noopContext;
    this.conflictMaxRetries = options.conflictMaxRetries ?? 3;
    this.staleAfterMs = options.staleAfterMs ?? 60 * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  async createQueue(name: string, options: { running?: boolean } = {}): Promise<LoadedQueue> {
    const document = createQueueDocument(name, options);
    document.savedAt = this.now().toISOString();
    const generation = await this.store.save(document.name, document, CREATE_GENERATION);
    this.log.info({ queue: document.name, running: document.running }, "queue created");
    this.emit("queue.created", document.name);
    return { document, generation };
  }

  pause(name: string): Promise<RunningFlag> {
    return this.setRunning(name, false);
  }

  resume(name: string): Promise<RunningFlag> {
    return this.setRunning(name, true);
  }

  async status(name: string, options: { staleAfterMs?: number } = {}): Promise<QueueStatus> {
    const queue = sanitizeQueueName(name);
    const { document, generation } = await this.store.load(queue);
    const stale = staleEntries(document, options.staleAfterMs ?? this.staleAfterMs, this.now());
    return {
      queueName: queue,
      running: document.running,
      total: document.entries.length,
      counts: countByStatus(document),
      savedAt: document.savedAt,
      generation,
      stale: stale.map(({ id, status, updatedAt, executionRef }) => ({
        id,
        status,
        updatedAt,
        executionRef,
      })),
    };
  }

  /** Ticks until the queue is empty or `maxTicks` is reached; paused, busy and conflict results stop early. */
  async drainToEmpty(name: string, maxTicks: number, options: TickOptions = {}): Promise<DrainResult> {
    const queue = sanitizeQueueName(name);
    const results: TickResult[] = [];
    let launched = 0;

    for (let i = 0; i < maxTicks; i++) {
      const result = await this.engine.tick(queue, options);
      results.push(result);
      if (result.reason === "launched") launched += 1;
      if (STOP_REASONS.has(result.reason)) {
        this.log.info({ queue, ticks: results.length, launched, reason: result.reason }, "drain stopped");
        return { queueName: queue, ticks: results.length, launched, stoppedBy: result.reason, results };
      }
    }

    this.log.info({ queue, ticks: results.length, launched }, "drain hit max ticks");
    return { queueName: queue, ticks: results.length, launched, stoppedBy: "max-ticks", results };
  }

  async cancel(name: string, entryId: string, reason = "cancelled by administrator"): Promise<JobEntry> {
    const queue = sanitizeQueueName(name);
    const { value } = await mutateQueue(
      this.store,
      queue,
      (doc) => {
        const entry = findEntry(doc, entryId);
        cancelEntry(entry, reason, this.now());
        return { write: true, value: structuredClone(entry) };
      },
      { maxRetries: this.conflictMaxRetries, now: this.now }
    );
    this.log.info({ queue, entryId, executionRef: value.executionRef }, "entry cancelled");
    this.emit("entry.cancelled", queue, entryId, { reason });
    return value;
  }

  /**
   * Settles LAUNCHING entries whose launch outcome was never written, e.g.
   * after a crash between claim and outcome. Never runs on its own.
   */
  async reconcileStale(
    name: string,
    options: { staleAfterMs?: number; action?: ReconcileAction } = {}
  ): Promise<ReconcileResult> {
    const queue = sanitizeQueueName(name);
    const action = options.action ?? "fail";
    const olderThan = options.staleAfterMs ?? this.staleAfterMs;

    const { value: affected } = await mutateQueue(
      this.store,
      queue,
      (doc) => {
        const at = this.now();
        const stale = staleEntries(doc, olderThan, at).filter((e) => e.status === "LAUNCHING");
        for (const entry of stale) {
          const message = `launch outcome unknown: stale LAUNCHING since ${entry.updatedAt}`;
          if (action === "requeue") requeueEntry(entry, message, at);
          else failEntry(entry, message, at);
        }
        return { write: stale.length > 0, value: stale.map((e) => e.id) };
      },
      { maxRetries: this.conflictMaxRetries, now: this.now }
    );

    if (affected.length > 0) {
      this.log.warn({ queue, action, affected }, "stale launches reconciled");
      this.emit("queue.reconciled", queue, undefined, { action, affected });
    }
    return { queueName: queue, action, affected };
  }

  private async setRunning(name: string, running: boolean): Promise<RunningFlag> {
    const queue = sanitizeQueueName(name);
    const result = await mutateQueue<boolean>(
      this.store,
      queue,
      (doc) => {
        if (doc.running === running) return { write: false, value: false };
        doc.running = running;
        return { write: true, value: true };
      },
      { maxRetries: this.conflictMaxRetries, now: this.now }
    );

    if (result.value) {
      this.log.info({ queue, running }, running ? "queue resumed" : "queue paused");
      this.emit(running ? "queue.resumed" : "queue.paused", queue);
    }
    return { queueName: queue, running, changed: result.value, generation: result.generation };
  }

  private emit(type: string, queue: string, entryId?: string, detail?: Record<string, unknown>) {
    this.ctx.emit({ type, at: this.now().getTime(), queue, entryId, detail });
  }
}
