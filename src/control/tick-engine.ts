import type { Logger } from "pino";
import type { JobEntry, TickReason, TickResult } from "../contracts.js";
import { ConflictError, LaunchError, OutcomePersistError, errorMessage } from "../errors.js";
import type { JobLauncher } from "../launcher/types.js";
import type { QueueStore } from "../persistence.js";
import { noopContext, type QueuePluginContext } from "../plugins/types.js";
import {
  claimEntry,
  countByStatus,
  failEntry,
  findEntry,
  markRunning,
  nextPending,
  requeueEntry,
  sanitizeQueueName,
} from "../queue/document.js";
import { silentLogger } from "../logger.js";
import { mutateQueue } from "./mutate.js";
import {
  DEFAULT_FAILURE_POLICY,
  computeLaunchDecision,
  type FailurePolicy,
} from "./retry-policy.js";

export interface TickEngineOptions {
  maxAttempts?: number;
  maxInFlightLaunches?: number;
  claimMaxRetries?: number;
  outcomeMaxRetries?: number;
  outcomeBackoffMs?: number;
  launchTimeoutMs?: number;
  policy?: Readonly<FailurePolicy>;
  now?: () => Date;
}

export interface TickEngineDeps {
  store: QueueStore;
  launcher: JobLauncher;
  logger?: Logger;
  ctx?: QueuePluginContext;
}

export interface TickOptions {
  /** Launch even when the queue is paused. */
  force?: boolean;
}

type Claim =
  | { kind: "skip"; reason: Extract<TickReason, "paused" | "empty" | "busy"> }
  | { kind: "claimed"; entry: JobEntry };

type Settled = { reason: TickReason; entry: JobEntry };

type LaunchOutcome = { ok: true; executionRef: string } | { ok: false; failure: unknown };

export interface Ticker {
  tick(queueName: string, options?: TickOptions): Promise<TickResult>;
}

export class TickEngine implements Ticker {
  private readonly store: QueueStore;
  private readonly launcher: JobLauncher;
  private readonly log: Logger;
  private readonly ctx: QueuePluginContext;
  private readonly maxAttempts: number;
  private readonly maxInFlight: number;
  private readonly claimMaxRetries: number;
  private readonly outcomeMaxRetries: number;
  private readonly outcomeBackoffMs: number;
  private readonly launchTimeoutMs: number;
  private readonly policy: Readonly<FailurePolicy>;
  private readonly now: () => Date;

  constructor(deps: TickEngineDeps, options: TickEngineOptions = {}) {
    this.store = deps.store;
    this.launcher = deps.launcher;
    this.log = (deps.logger ?? silentLogger).child({ component: "tick-engine" });
    this.ctx = deps.ctx ?? noopContext;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.maxInFlight = options.maxInFlightLaunches ?? 1;
    this.claimMaxRetries = options.claimMaxRetries ?? 3;
    this.outcomeMaxRetries = options.outcomeMaxRetries ?? 10;
    this.outcomeBackoffMs = options.outcomeBackoffMs ?? 50;
    this.launchTimeoutMs = options.launchTimeoutMs ?? 60_000;
    this.policy = options.policy ?? DEFAULT_FAILURE_POLICY;
    this.now = options.now ?? (() => new Date());
  }

  async tick(queueName: string, options: TickOptions = {}): Promise<TickResult> {
    const queue = sanitizeQueueName(queueName);
    let conflicts = 0;

    // ── Claim ────────────────────────────────────────────────────────────────
    let claim: Claim;
    try {
      const result = await mutateQueue<Claim>(
        this.store,
        queue,
        (doc) => {
          if (!doc.running && !options.force) {
            return { write: false, value: { kind: "skip", reason: "paused" } };
          }
          if (countByStatus(doc).LAUNCHING >= this.maxInFlight) {
            return { write: false, value: { kind: "skip", reason: "busy" } };
          }
          const entry = nextPending(doc);
          if (!entry) return { write: false, value: { kind: "skip", reason: "empty" } };
          claimEntry(entry, this.now());
          return { write: true, value: { kind: "claimed", entry: structuredClone(entry) } };
        },
        {
          maxRetries: this.claimMaxRetries,
          now: this.now,
          onConflict: (n) => {
            conflicts = n;
            this.emit("tick.conflict", queue, undefined, { phase: "claim", conflicts: n });
          },
        }
      );
      claim = result.value;
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      this.log.warn({ queue, conflicts }, "claim conflicts exhausted");
      return { queueName: queue, reason: "conflict-exhausted", launched: null, entry: null, conflicts };
    }

    if (claim.kind === "skip") {
      this.emit(`tick.${claim.reason}`, queue);
      this.log.debug({ queue, reason: claim.reason }, "nothing claimed");
      return { queueName: queue, reason: claim.reason, launched: null, entry: null, conflicts };
    }

    const claimed = claim.entry;
    this.emit("tick.claimed", queue, claimed.id, { attempt: claimed.attempts });
    const log = this.log.child({ queue, entryId: claimed.id, attempt: claimed.attempts });
    log.info("entry claimed");

    // ── Launch (outside any write) ───────────────────────────────────────────
    const outcome = await this.launch(queue, claimed);

    // ── Persist outcome against a fresh load ────────────────────────────────
    let reason: TickReason;
    let persisted: JobEntry;
    try {
      const result = await mutateQueue<Settled>(
        this.store,
        queue,
        (doc) => {
          const entry = findEntry(doc, claimed.id);
          const at = this.now();

          if (entry.status !== "LAUNCHING") {
            // Moved by an administrator while the launch was in flight; their
            // decision stands, but a started execution stays traceable.
            const settled: TickReason = outcome.ok ? "launched" : "launch-failed";
            if (outcome.ok && !entry.executionRef) {
              entry.executionRef = outcome.executionRef;
              entry.updatedAt = at.toISOString();
              return { write: true, value: { reason: settled, entry: structuredClone(entry) } };
            }
            return { write: false, value: { reason: settled, entry: structuredClone(entry) } };
          }

          if (outcome.ok) {
            markRunning(entry, outcome.executionRef, at);
            return { write: true, value: { reason: "launched", entry: structuredClone(entry) } };
          }

          const decision = computeLaunchDecision({
            failure: outcome.failure,
            attempts: entry.attempts,
            maxAttempts: this.maxAttempts,
            policy: this.policy,
          });
          if (decision.action === "requeue") {
            requeueEntry(entry, decision.message, at);
            return { write: true, value: { reason: "retry-scheduled", entry: structuredClone(entry) } };
          }
          failEntry(entry, decision.message, at);
          return { write: true, value: { reason: "launch-failed", entry: structuredClone(entry) } };
        },
        {
          maxRetries: this.outcomeMaxRetries,
          backoffMs: this.outcomeBackoffMs,
          now: this.now,
          onConflict: (n) => {
            conflicts += 1;
            this.emit("tick.conflict", queue, claimed.id, { phase: "outcome", conflicts: n });
          },
        }
      );
      reason = result.value.reason;
      persisted = result.value.entry;
    } catch (err) {
      const ref = outcome.ok ? outcome.executionRef : "";
      log.error({ err, executionRef: ref }, "launch outcome not persisted");
      throw new OutcomePersistError(queue, claimed.id, ref, err);
    }

    if (reason === "launched") {
      this.emit("tick.launched", queue, persisted.id, { executionRef: persisted.executionRef });
      log.info({ executionRef: persisted.executionRef, status: persisted.status }, "entry launched");
    } else if (reason === "retry-scheduled") {
      this.emit("tick.retry", queue, persisted.id, { error: persisted.lastError });
      log.warn({ reason, lastError: persisted.lastError }, "launch failed, entry requeued");
    } else {
      this.emit("tick.failed", queue, persisted.id, { error: persisted.lastError });
      log.error({ reason, lastError: persisted.lastError }, "launch failed, entry failed");
    }

    return {
      queueName: queue,
      reason,
      launched: persisted.status === "RUNNING" ? persisted : null,
      entry: persisted,
      conflicts,
    };
  }

  private async launch(queue: string, entry: JobEntry): Promise<LaunchOutcome> {
    try {
      const executionRef = await this.launcher.launch(entry.params, {
        queueName: queue,
        entryId: entry.id,
        attempt: entry.attempts,
        signal: AbortSignal.timeout(this.launchTimeoutMs),
      });
      if (!executionRef) {
        return {
          ok: false,
          failure: new LaunchError("unknown", `${this.launcher.name} launcher returned an empty execution reference`),
        };
      }
      return { ok: true, executionRef };
    } catch (err) {
      this.log.debug({ queue, entryId: entry.id, err: errorMessage(err) }, "launcher threw");
      return { ok: false, failure: err };
    }
  }

  private emit(type: string, queue: string, entryId?: string, detail?: Record<string, unknown>) {
    this.ctx.emit({ type, at: this.now().getTime(), queue, entryId, detail });
  }
}
