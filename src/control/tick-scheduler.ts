import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import type { QueuePluginContext } from "../plugins/types.js";
import type { QueueAdmin } from "./admin.js";

/**
 * Periodic drain of the given queues. A pass that is still running when the
 * next interval fires is not overlapped; that interval is skipped.
 */
export function startTickScheduler(
  admin: QueueAdmin,
  queues: string[],
  options: {
    intervalMs: number;
    maxTicks: number;
    logger: Logger;
    ctx: QueuePluginContext;
  }
): ReturnType<typeof setInterval> {
  const log = options.logger.child({ component: "tick-scheduler" });
  let inFlight = false;

  const pass = async () => {
    for (const queue of queues) {
      try {
        const result = await admin.drainToEmpty(queue, options.maxTicks);
        if (result.launched > 0) {
          log.info({ queue, launched: result.launched, reason: result.stoppedBy }, "scheduled drain");
        }
      } catch (err) {
        log.error({ queue, err: errorMessage(err) }, "scheduled drain failed");
        options.ctx.emit({
          type: "scheduler.error",
          at: Date.now(),
          queue,
          detail: { error: errorMessage(err) },
        });
      }
    }
  };

  return setInterval(() => {
    if (inFlight) return;
    inFlight = true;
    void pass().finally(() => {
      inFlight = false;
    });
  }, options.intervalMs);
}
