import { readFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { Command, InvalidArgumentError, Option } from "commander";
import { loadProcessConfig, type AppConfig } from "./config.js";
import type {
  EntrySubmission,
  JobParams,
  QueueStatus,
  ReconcileAction,
  TickReason,
} from "./contracts.js";
import { JOB_STATUSES } from "./contracts.js";
import { startControlPlane } from "./control-plane.js";
import { QueueError, errorMessage } from "./errors.js";
import type { FetchLike } from "./launcher/http-launcher.js";
import { createLogger } from "./logger.js";
import { noopContext } from "./plugins/types.js";
import { createRuntime, type Runtime } from "./runtime.js";

// ── Argument helpers ─────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return parsed;
}

/** Inline JSON, or `@path` to read it from a file. */
export async function parseJsonInput(value: string): Promise<unknown> {
  const source = value.trim();
  if (!source) throw new Error("json input is empty");
  if (source.startsWith("@")) {
    return JSON.parse(await readFile(source.slice(1), "utf8"));
  }
  return JSON.parse(source);
}

/**
 * `--params` takes one params object; `--entries` takes an array whose items
 * are either `{ id?, params }` or bare params objects.
 */
export function toSubmissions(input: {
  params?: unknown;
  entries?: unknown;
  id?: string;
}): EntrySubmission[] {
  if (input.params !== undefined && input.entries !== undefined) {
    throw new Error("--params and --entries are mutually exclusive");
  }
  if (input.params !== undefined) {
    if (!isRecord(input.params)) throw new Error("--params must be a JSON object");
    return [{ id: input.id, params: input.params }];
  }
  if (input.id !== undefined) throw new Error("--id only applies to --params");
  if (!Array.isArray(input.entries) || input.entries.length === 0) {
    throw new Error("--entries must be a non-empty JSON array");
  }

  return input.entries.map((item: unknown, index): EntrySubmission => {
    if (!isRecord(item)) throw new Error(`entries[${index}] must be a JSON object`);
    if (isRecord(item.params)) {
      const params: JobParams = item.params;
      if (item.id === undefined) return { params };
      if (typeof item.id !== "string" || !item.id) {
        throw new Error(`entries[${index}].id must be a non-empty string`);
      }
      return { id: item.id, params };
    }
    return { params: item };
  });
}

export function formatStatus(status: QueueStatus): string {
  const counts = JOB_STATUSES.map((s) => `${s}=${status.counts[s]}`).join(" ");
  const lines = [
    `queue: ${status.queueName} (${status.running ? "running" : "paused"})`,
    `generation: ${status.generation}  saved: ${status.savedAt ?? "never"}`,
    `total: ${status.total}  ${counts}`,
  ];
  if (status.stale.length === 0) {
    lines.push("stale: none");
  } else {
    for (const entry of status.stale) {
      const ref = entry.executionRef ? ` ${entry.executionRef}` : "";
      lines.push(`stale: ${entry.id} ${entry.status} since ${entry.updatedAt}${ref}`);
    }
  }
  return lines.join("\n");
}

// ── Remote trigger ───────────────────────────────────────────────────────────

const TICK_REASONS: readonly TickReason[] = [
  "launched",
  "retry-scheduled",
  "launch-failed",
  "paused",
  "empty",
  "busy",
  "conflict-exhausted",
];

const TRIGGER_STOP: ReadonlySet<TickReason> = new Set(["empty", "paused", "busy", "conflict-exhausted"]);

export interface TriggeredTick {
  queueName: string;
  reason: TickReason;
  entryId: string | null;
  conflicts: number;
}

export interface TriggerOptions {
  baseUrl: string;
  queue: string;
  count: number;
  force?: boolean;
  /** Sent as `x-admin-token`; the control plane only forces ticks for an admin. */
  adminToken?: string;
  delayMs?: number;
  fetch?: FetchLike;
}

function parseTickResult(raw: Record<string, unknown>): TriggeredTick {
  const reason = TICK_REASONS.find((r) => r === raw.reason);
  if (!reason || typeof raw.queueName !== "string") {
    throw new Error(`unexpected tick result: ${JSON.stringify(raw)}`);
  }
  const entry = raw.entry;
  return {
    queueName: raw.queueName,
    reason,
    entryId: isRecord(entry) && typeof entry.id === "string" ? entry.id : null,
    conflicts: typeof raw.conflicts === "number" ? raw.conflicts : 0,
  };
}

/**
 * Fires up to `count` ticks at a running control plane through its
 * query-string trigger; stops early once a tick makes no progress.
 */
export async function triggerTicks(options: TriggerOptions): Promise<TriggeredTick[]> {
  const fetchImpl = options.fetch ?? fetch;
  const url = new URL(options.baseUrl);
  url.searchParams.set("queue_tick", "1");
  url.searchParams.set("name", options.queue);
  if (options.force) url.searchParams.set("force", "1");
  const headers: Record<string, string> = {};
  if (options.adminToken) headers["x-admin-token"] = options.adminToken;

  const results: TriggeredTick[] = [];
  for (let i = 0; i < options.count; i++) {
    const res = await fetchImpl(url.toString(), { method: "GET", headers });
    const text = await res.text();
    if (!res.ok) throw new Error(`HTTP ${res.status}: ${text}`);

    const payload: unknown = JSON.parse(text);
    if (!isRecord(payload) || !isRecord(payload.result)) {
      throw new Error(`unexpected trigger response: ${text}`);
    }
    const result = parseTickResult(payload.result);
    results.push(result);

    if (TRIGGER_STOP.has(result.reason)) break;
    if (i < options.count - 1 && options.delayMs) await sleep(options.delayMs);
  }
  return results;
}

export interface TriggerFlags {
  url: string;
  count: number;
  untilEmpty?: boolean;
  maxTicks?: number;
  delayMs?: number;
  force?: boolean;
}

export function triggerOptionsFrom(
  queue: string | undefined,
  flags: TriggerFlags,
  config: Pick<AppConfig, "defaultQueue" | "drainMaxTicks" | "adminSecret">
): TriggerOptions {
  return {
    baseUrl: flags.url,
    queue: queue ?? config.defaultQueue,
    count: flags.untilEmpty ? (flags.maxTicks ?? config.drainMaxTicks) : flags.count,
    delayMs: flags.delayMs,
    force: flags.force,
    adminToken: flags.force ? config.adminSecret : undefined,
  };
}

// ── Program ──────────────────────────────────────────────────────────────────

function print(value: unknown) {
  process.stdout.write(typeof value === "string" ? `${value}\n` : `${JSON.stringify(value, null, 2)}\n`);
}

export function printError(command: string, err: unknown) {
  const error = err instanceof QueueError ? err.code : "error";
  process.stderr.write(`${JSON.stringify({ ok: false, command, error, message: errorMessage(err) })}\n`);
}

function withRuntime<A extends unknown[]>(
  command: string,
  handler: (runtime: Runtime, ...args: A) => Promise<unknown>
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    let runtime: Runtime | null = null;
    try {
      const config = loadProcessConfig();
      runtime = createRuntime(config, {
        logger: createLogger({ level: config.logLevel, stderr: true }),
        ctx: noopContext,
      });
      print(await handler(runtime, ...args));
    } catch (err) {
      printError(command, err);
      process.exitCode = 1;
    } finally {
      await runtime?.close();
    }
  };
}

const queueOf = (runtime: Runtime, queue: string | undefined) => queue ?? runtime.config.defaultQueue;

export function buildProgram(): Command {
  const program = new Command();
  program.name("launchq").description("Drive launch queues kept in the shared queue store");

  program
    .command("tick")
    .description("claim and launch at most one PENDING entry")
    .argument("[queue]")
    .option("--force", "launch even if the queue is paused")
    .action(
      withRuntime("tick", async (rt: Runtime, queue: string | undefined, opts: { force?: boolean }) =>
        rt.engine.tick(queueOf(rt, queue), { force: opts.force })
      )
    );

  program
    .command("drain")
    .description("tick until the queue is empty, paused or busy")
    .argument("[queue]")
    .option("--max-ticks <n>", "upper bound on ticks", parsePositiveInt)
    .option("--force", "launch even if the queue is paused")
    .action(
      withRuntime(
        "drain",
        async (rt: Runtime, queue: string | undefined, opts: { maxTicks?: number; force?: boolean }) =>
          rt.admin.drainToEmpty(queueOf(rt, queue), opts.maxTicks ?? rt.config.drainMaxTicks, {
            force: opts.force,
          })
      )
    );

  program
    .command("loop")
    .description("drain repeatedly until interrupted")
    .argument("[queue]")
    .option("--interval-ms <n>", "pause between passes", parsePositiveInt, 30_000)
    .option("--max-ticks <n>", "upper bound on ticks per pass", parsePositiveInt)
    .option("--sync", "poll RUNNING executions for completion after each pass")
    .option("--until-idle", "stop once nothing is PENDING, LAUNCHING or RUNNING")
    .action(
      withRuntime(
        "loop",
        async (
          rt: Runtime,
          queue: string | undefined,
          opts: { intervalMs: number; maxTicks?: number; sync?: boolean; untilIdle?: boolean }
        ) => runLoop(rt, queueOf(rt, queue), opts)
      )
    );

  program
    .command("status")
    .argument("[queue]")
    .option("--stale-after-ms <n>", "age that marks LAUNCHING/RUNNING entries stale", parsePositiveInt)
    .option("--json", "print the raw status object")
    .action(
      withRuntime(
        "status",
        async (rt: Runtime, queue: string | undefined, opts: { staleAfterMs?: number; json?: boolean }) => {
          const status = await rt.admin.status(queueOf(rt, queue), { staleAfterMs: opts.staleAfterMs });
          return opts.json ? status : formatStatus(status);
        }
      )
    );

  program
    .command("create")
    .argument("[queue]")
    .option("--paused", "create the queue paused")
    .action(
      withRuntime("create", async (rt: Runtime, queue: string | undefined, opts: { paused?: boolean }) => {
        const created = await rt.admin.createQueue(queueOf(rt, queue), { running: !opts.paused });
        return { ok: true, queue: created.document.name, generation: created.generation };
      })
    );

  program
    .command("pause")
    .argument("[queue]")
    .action(
      withRuntime("pause", async (rt: Runtime, queue: string | undefined) =>
        rt.admin.pause(queueOf(rt, queue))
      )
    );

  program
    .command("resume")
    .argument("[queue]")
    .action(
      withRuntime("resume", async (rt: Runtime, queue: string | undefined) =>
        rt.admin.resume(queueOf(rt, queue))
      )
    );

  program
    .command("submit")
    .description("append PENDING entries")
    .argument("[queue]")
    .option("--params <json>", "params of a single entry (inline JSON or @file)")
    .option("--id <id>", "id for the single --params entry")
    .option("--entries <json>", "array of entries (inline JSON or @file)")
    .option("--create", "create the queue if it does not exist")
    .action(
      withRuntime(
        "submit",
        async (
          rt: Runtime,
          queue: string | undefined,
          opts: { params?: string; id?: string; entries?: string; create?: boolean }
        ) => {
          const submissions = toSubmissions({
            id: opts.id,
            params: opts.params === undefined ? undefined : await parseJsonInput(opts.params),
            entries: opts.entries === undefined ? undefined : await parseJsonInput(opts.entries),
          });
          const entries = await rt.intake.submit(queueOf(rt, queue), submissions, {
            createIfMissing: opts.create,
          });
          return { ok: true, entries };
        }
      )
    );

  program
    .command("cancel")
    .argument("<queue>")
    .argument("<entryId>")
    .option("--reason <text>", "recorded as lastError")
    .action(
      withRuntime("cancel", async (rt: Runtime, queue: string, entryId: string, opts: { reason?: string }) =>
        rt.admin.cancel(queue, entryId, opts.reason)
      )
    );

  program
    .command("report")
    .description("record the completion of a RUNNING entry")
    .argument("<queue>")
    .argument("<entryId>")
    .addOption(new Option("--status <status>").choices(["SUCCEEDED", "FAILED"]).makeOptionMandatory())
    .option("--ref <executionRef>", "execution the report is about")
    .option("--message <text>", "failure detail")
    .action(
      withRuntime(
        "report",
        async (
          rt: Runtime,
          queue: string,
          entryId: string,
          opts: { status: string; ref?: string; message?: string }
        ) =>
          rt.intake.reportCompletion(queue, entryId, {
            status: opts.status === "FAILED" ? "FAILED" : "SUCCEEDED",
            executionRef: opts.ref,
            message: opts.message,
          })
      )
    );

  program
    .command("reconcile")
    .description("settle LAUNCHING entries whose outcome was never written")
    .argument("[queue]")
    .option("--stale-after-ms <n>", "minimum age of the LAUNCHING state", parsePositiveInt)
    .addOption(new Option("--action <action>").choices(["fail", "requeue"]).default("fail"))
    .action(
      withRuntime(
        "reconcile",
        async (rt: Runtime, queue: string | undefined, opts: { staleAfterMs?: number; action: string }) => {
          const action: ReconcileAction = opts.action === "requeue" ? "requeue" : "fail";
          return rt.admin.reconcileStale(queueOf(rt, queue), { staleAfterMs: opts.staleAfterMs, action });
        }
      )
    );

  program
    .command("sync-running")
    .description("ask the batch backend about RUNNING executions")
    .argument("[queue]")
    .action(
      withRuntime("sync-running", async (rt: Runtime, queue: string | undefined) => {
        if (!rt.statusSource) throw new Error("the configured launcher cannot report execution status");
        return rt.intake.syncRunning(queueOf(rt, queue), rt.statusSource);
      })
    );

  program
    .command("trigger")
    .description("fire ticks at a running control plane")
    .argument("[queue]")
    .requiredOption("--url <url>", "control plane base URL")
    .addOption(
      new Option("--count <n>", "number of ticks").argParser(parsePositiveInt).default(1).conflicts("untilEmpty")
    )
    .option("--until-empty", "keep ticking until the queue stops making progress")
    .option("--max-ticks <n>", "bound for --until-empty (default LAUNCHQ_DRAIN_MAX_TICKS)", parsePositiveInt)
    .option("--delay-ms <n>", "pause between ticks", parsePositiveInt)
    .option("--force", "launch even if the queue is paused (sends LAUNCHQ_ADMIN_SECRET)")
    .action(
      async (queue: string | undefined, opts: TriggerFlags) => {
        try {
          const results = await triggerTicks(triggerOptionsFrom(queue, opts, loadProcessConfig()));
          print({ ok: true, ticks: results.length, results });
        } catch (err) {
          printError("trigger", err);
          process.exitCode = 1;
        }
      }
    );

  program
    .command("serve")
    .description("run the HTTP control plane")
    .action(async () => {
      await startControlPlane();
    });

  return program;
}

async function runLoop(
  rt: Runtime,
  queue: string,
  opts: { intervalMs: number; maxTicks?: number; sync?: boolean; untilIdle?: boolean }
) {
  const stop = new AbortController();
  const onSignal = () => stop.abort();
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  let passes = 0;
  let launched = 0;
  try {
    while (!stop.signal.aborted) {
      const drain = await rt.admin.drainToEmpty(queue, opts.maxTicks ?? rt.config.drainMaxTicks);
      launched += drain.launched;
      passes += 1;

      if (opts.sync && rt.statusSource) await rt.intake.syncRunning(queue, rt.statusSource);

      if (opts.untilIdle) {
        const { counts } = await rt.admin.status(queue);
        if (counts.PENDING + counts.LAUNCHING + counts.RUNNING === 0) break;
      }

      try {
        await sleep(opts.intervalMs, undefined, { signal: stop.signal });
      } catch (err) {
        if (!stop.signal.aborted) throw err;
      }
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }

  return { ok: true, queueName: queue, passes, launched };
}
