import Fastify from "fastify";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { LevelWithSilent } from "pino";
import {
  JOB_STATUSES,
  type CompletionReport,
  type EntrySubmission,
  type JobStatus,
  type ReconcileAction,
} from "./contracts.js";
import { loadConfig, loadProcessConfig, type AppConfig } from "./config.js";
import { startTickScheduler } from "./control/tick-scheduler.js";
import {
  ConflictError,
  DuplicateEntryError,
  InvalidTransitionError,
  NotFoundError,
  QueueDocumentInvalidError,
  QueueError,
  StorageUnavailableError,
} from "./errors.js";
import type { FetchLike } from "./launcher/http-launcher.js";
import type { JobLauncher } from "./launcher/types.js";
import { createLogger } from "./logger.js";
import type { QueueStore } from "./persistence.js";
import { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";
import type { QueuePlugin, QueuePluginContext } from "./plugins/types.js";
import { createRuntime } from "./runtime.js";
import { AdminTokenVerifier } from "./security.js";

export interface ControlPlaneOptions {
  store?: QueueStore;
  /** Overrides the launcher built from configuration; null disables launching. */
  launcher?: JobLauncher | null;
  fetch?: FetchLike;
  plugins?: QueuePlugin[];
  logLevel?: LevelWithSilent;
}

export function statusCodeFor(err: QueueError): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ConflictError) return 409;
  if (err instanceof InvalidTransitionError || err instanceof DuplicateEntryError) return 409;
  if (err instanceof QueueDocumentInvalidError) return 422;
  if (err instanceof StorageUnavailableError) return 503;
  return 500;
}

const COUNTERS: ReadonlyArray<[metric: string, key: string, help: string]> = [
  ["launchq_http_requests_total", "http.requests.total", "Total HTTP requests processed"],
  ["launchq_entries_submitted_total", "event.entry.submitted", "Entries appended since startup"],
  ["launchq_entries_claimed_total", "event.tick.claimed", "Entries moved to LAUNCHING since startup"],
  ["launchq_entries_launched_total", "event.tick.launched", "Launches that returned an execution reference"],
  ["launchq_launch_retries_total", "event.tick.retry", "Launch failures that returned the entry to PENDING"],
  ["launchq_launch_failures_total", "event.tick.failed", "Launch failures that moved the entry to FAILED"],
  ["launchq_write_conflicts_total", "event.tick.conflict", "Conditional writes lost to another writer"],
  ["launchq_entries_completed_total", "event.entry.completed", "Completion reports recorded"],
  ["launchq_entries_cancelled_total", "event.entry.cancelled", "Entries cancelled by an administrator"],
];

const truthy = (value: string | undefined) => value === "1" || value === "true";

const queueParams = {
  type: "object",
  required: ["name"],
  properties: { name: { type: "string", minLength: 1 } },
} as const;

const entryParams = {
  type: "object",
  required: ["name", "entryId"],
  properties: {
    name: { type: "string", minLength: 1 },
    entryId: { type: "string", minLength: 1 },
  },
} as const;

export function buildControlPlane(
  config: AppConfig = loadConfig(),
  options: ControlPlaneOptions = {}
): FastifyInstance {
  const logLevel = options.logLevel ?? config.logLevel;
  const app = Fastify({ logger: logLevel === "silent" ? false : { level: logLevel } });
  const logger = createLogger({ level: logLevel });

  const adminTokens = new AdminTokenVerifier(config.adminSecret);

  // Plugins wrap emit as they register.
  const ctx: QueuePluginContext = { emit() {} };

  const telemetry: TelemetryPlugin | null = options.plugins ? null : createTelemetryPlugin();
  const plugins: QueuePlugin[] = telemetry ? [telemetry] : (options.plugins ?? []);
  for (const plugin of plugins) {
    plugin.register(app, ctx);
  }

  const runtime = createRuntime(config, {
    logger,
    ctx,
    store: options.store,
    launcher: options.launcher,
    fetch: options.fetch,
  });
  const { admin, intake, engine } = runtime;

  const requireAdmin = async (req: FastifyRequest, reply: FastifyReply) => {
    if (!adminTokens.verify(req.headers["x-admin-token"])) {
      return reply.code(401).send({ ok: false, error: "unauthorized" });
    }
  };

  // Ticks are open to any trigger, but forcing past a pause is an admin action.
  const requireAdminToForce = async (
    req: FastifyRequest<{ Querystring: { force?: string } }>,
    reply: FastifyReply
  ) => {
    if (truthy(req.query.force)) return requireAdmin(req, reply);
  };

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof QueueError) {
      const statusCode = statusCodeFor(err);
      if (statusCode >= 500) req.log.error({ err }, "request failed");
      return reply.code(statusCode).send({ ok: false, error: err.code, message: err.message });
    }
    if (err.validation) {
      return reply.code(400).send({ ok: false, error: "invalid_request", message: err.message });
    }
    req.log.error({ err }, "request failed");
    const statusCode = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    return reply.code(statusCode).send({ ok: false, error: "internal_error", message: err.message });
  });

  app.get("/health", async () => ({ ok: true }));

  app.get("/metrics", async (_req, reply) => {
    const lines: string[] = [];
    for (const [metric, key, help] of COUNTERS) {
      lines.push(`# HELP ${metric} ${help}`, `# TYPE ${metric} counter`, `${metric} ${telemetry?.count(key) ?? 0}`);
    }
    lines.push(
      "# HELP launchq_queue_entries Entries per status in each scheduled queue",
      "# TYPE launchq_queue_entries gauge"
    );

    for (const queue of config.tickQueues) {
      let counts: Record<JobStatus, number>;
      try {
        counts = (await admin.status(queue)).counts;
      } catch (err) {
        if (err instanceof NotFoundError) continue;
        throw err;
      }
      for (const status of JOB_STATUSES) {
        lines.push(`launchq_queue_entries{queue="${queue}",status="${status}"} ${counts[status]}`);
      }
    }
    lines.push("");

    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(lines.join("\n"));
  });

  // Legacy trigger: GET /?queue_tick=1&name=<queue>[&force=1]; force needs the admin token.
  app.get<{ Querystring: { queue_tick?: string; name?: string; force?: string } }>(
    "/",
    { onRequest: requireAdminToForce },
    async (req) => {
      if (!truthy(req.query.queue_tick)) return { ok: true, service: "launch-queue" };
      const result = await engine.tick(req.query.name || config.defaultQueue, {
        force: truthy(req.query.force),
      });
      return { ok: true, result };
    }
  );

  // ── Queues ───────────────────────────────────────────────────────────────

  app.post<{ Body: { name: string; running?: boolean } }>(
    "/v1/queues",
    {
      onRequest: requireAdmin,
      schema: {
        body: {
          type: "object",
          required: ["name"],
          properties: {
            name: { type: "string", minLength: 1 },
            running: { type: "boolean" },
          },
        },
      },
    },
    async (req, reply) => {
      const created = await admin.createQueue(req.body.name, { running: req.body.running });
      return reply.code(201).send({ ok: true, queue: created.document, generation: created.generation });
    }
  );

  app.get<{ Params: { name: string } }>(
    "/v1/queues/:name",
    { schema: { params: queueParams } },
    async (req) => ({ ok: true, status: await admin.status(req.params.name) })
  );

  app.post<{ Params: { name: string }; Querystring: { force?: string } }>(
    "/v1/queues/:name/tick",
    { onRequest: requireAdminToForce, schema: { params: queueParams } },
    async (req) => {
      const result = await engine.tick(req.params.name, { force: truthy(req.query.force) });
      return { ok: true, result };
    }
  );

  app.post<{ Params: { name: string }; Body: { maxTicks?: number; force?: boolean } | undefined }>(
    "/v1/queues/:name/drain",
    {
      onRequest: requireAdmin,
      schema: {
        params: queueParams,
        body: {
          type: "object",
          properties: {
            maxTicks: { type: "integer", minimum: 1, maximum: 1000 },
            force: { type: "boolean" },
          },
        },
      },
    },
    async (req) => {
      const body = req.body ?? {};
      const result = await admin.drainToEmpty(req.params.name, body.maxTicks ?? config.drainMaxTicks, {
        force: body.force,
      });
      return { ok: true, result };
    }
  );

  app.post<{ Params: { name: string } }>(
    "/v1/queues/:name/pause",
    { onRequest: requireAdmin, schema: { params: queueParams } },
    async (req) => ({ ok: true, ...(await admin.pause(req.params.name)) })
  );

  app.post<{ Params: { name: string } }>(
    "/v1/queues/:name/resume",
    { onRequest: requireAdmin, schema: { params: queueParams } },
    async (req) => ({ ok: true, ...(await admin.resume(req.params.name)) })
  );

  app.post<{
    Params: { name: string };
    Body: { staleAfterMs?: number; action?: ReconcileAction } | undefined;
  }>(
    "/v1/queues/:name/reconcile",
    {
      onRequest: requireAdmin,
      schema: {
        params: queueParams,
        body: {
          type: "object",
          properties: {
            staleAfterMs: { type: "integer", minimum: 1 },
            action: { type: "string", enum: ["fail", "requeue"] },
          },
        },
      },
    },
    async (req) => {
      const result = await admin.reconcileStale(req.params.name, req.body ?? {});
      return { ok: true, ...result };
    }
  );

  app.post<{ Params: { name: string } }>(
    "/v1/queues/:name/sync",
    { onRequest: requireAdmin, schema: { params: queueParams } },
    async (req, reply) => {
      if (!runtime.statusSource) {
        return reply.code(400).send({
          ok: false,
          error: "status_source_unavailable",
          message: "the configured launcher cannot report execution status",
        });
      }
      return { ok: true, ...(await intake.syncRunning(req.params.name, runtime.statusSource)) };
    }
  );

  // ── Entries ──────────────────────────────────────────────────────────────

  app.post<{
    Params: { name: string };
    Body: { entries: EntrySubmission[]; createIfMissing?: boolean };
  }>(
    "/v1/queues/:name/entries",
    {
      onRequest: requireAdmin,
      schema: {
        params: queueParams,
        body: {
          type: "object",
          required: ["entries"],
          properties: {
            entries: {
              type: "array",
              minItems: 1,
              items: {
                type: "object",
                required: ["params"],
                properties: {
                  id: { type: "string", minLength: 1 },
                  params: { type: "object" },
                },
              },
            },
            createIfMissing: { type: "boolean" },
          },
        },
      },
    },
    async (req, reply) => {
      const entries = await intake.submit(req.params.name, req.body.entries, {
        createIfMissing: req.body.createIfMissing,
      });
      return reply.code(201).send({ ok: true, entries });
    }
  );

  app.post<{ Params: { name: string; entryId: string }; Body: CompletionReport }>(
    "/v1/queues/:name/entries/:entryId/completion",
    {
      onRequest: requireAdmin,
      schema: {
        params: entryParams,
        body: {
          type: "object",
          required: ["status"],
          properties: {
            status: { type: "string", enum: ["SUCCEEDED", "FAILED"] },
            executionRef: { type: "string" },
            message: { type: "string" },
          },
        },
      },
    },
    async (req) => {
      const result = await intake.reportCompletion(req.params.name, req.params.entryId, req.body);
      return { ok: true, ...result };
    }
  );

  app.post<{ Params: { name: string; entryId: string }; Body: { reason?: string } | undefined }>(
    "/v1/queues/:name/entries/:entryId/cancel",
    {
      onRequest: requireAdmin,
      schema: {
        params: entryParams,
        body: { type: "object", properties: { reason: { type: "string" } } },
      },
    },
    async (req) => {
      const entry = await admin.cancel(req.params.name, req.params.entryId, req.body?.reason);
      return { ok: true, entry };
    }
  );

  // Periodic drain; cleared on shutdown so tests don't leak open handles.
  if (config.tickIntervalMs > 0 && runtime.launcher) {
    const schedulerHandle = startTickScheduler(admin, config.tickQueues, {
      intervalMs: config.tickIntervalMs,
      maxTicks: config.drainMaxTicks,
      logger,
      ctx,
    });
    app.addHook("onClose", async () => clearInterval(schedulerHandle));
  }
  app.addHook("onClose", async () => runtime.close());

  return app;
}

export async function startControlPlane() {
  const config = loadProcessConfig();
  const app = buildControlPlane(config);
  await app.listen({ host: config.host, port: config.port });
  app.log.info(`launch-queue control plane listening on http://${config.host}:${config.port}`);
  return app;
}
