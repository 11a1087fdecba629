import type { FastifyInstance } from "fastify";
import type { QueueEvent, QueuePlugin, QueuePluginContext } from "./types.js";

export interface TelemetrySnapshot {
  counters: Record<string, number>;
  /** Event counts per queue, keyed by event type. */
  queues: Record<string, Record<string, number>>;
  events: QueueEvent[];
}

export interface TelemetryPlugin extends QueuePlugin {
  count(key: string): number;
  snapshot(queue?: string): TelemetrySnapshot;
}

export function createTelemetryPlugin(options: { maxEvents?: number } = {}): TelemetryPlugin {
  const maxEvents = options.maxEvents ?? 200;
  const counters = new Map<string, number>();
  const perQueue = new Map<string, Map<string, number>>();
  const recent: QueueEvent[] = [];

  const bump = (map: Map<string, number>, key: string) => map.set(key, (map.get(key) ?? 0) + 1);

  const record = (event: QueueEvent) => {
    bump(counters, `event.${event.type}`);
    let byType = perQueue.get(event.queue);
    if (!byType) {
      byType = new Map();
      perQueue.set(event.queue, byType);
    }
    bump(byType, event.type);
    recent.push(event);
    if (recent.length > maxEvents) recent.shift();
  };

  const snapshot = (queue?: string): TelemetrySnapshot => {
    const queues: Record<string, Record<string, number>> = {};
    for (const [name, byType] of perQueue) {
      if (queue === undefined || name === queue) queues[name] = Object.fromEntries(byType);
    }
    return {
      counters: Object.fromEntries(counters),
      queues,
      events: queue === undefined ? [...recent] : recent.filter((e) => e.queue === queue),
    };
  };

  return {
    name: "telemetry",
    count: (key) => counters.get(key) ?? 0,
    snapshot,
    register(app: FastifyInstance, ctx: QueuePluginContext) {
      app.addHook("onResponse", async (_req, reply) => {
        bump(counters, "http.requests.total");
        bump(counters, `http.status.${reply.statusCode}`);
      });

      const forward = ctx.emit;
      ctx.emit = (event) => {
        record(event);
        forward(event);
      };

      app.get<{ Querystring: { queue?: string } }>("/v1/plugins/telemetry", async (req) => ({
        ok: true,
        plugin: "telemetry",
        ...snapshot(req.query.queue || undefined),
      }));
    },
  };
}
