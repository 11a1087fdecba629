import type { Logger } from "pino";
import type { AppConfig } from "./config.js";
import { QueueAdmin } from "./control/admin.js";
import { QueueIntake } from "./control/intake.js";
import { TickEngine, type Ticker } from "./control/tick-engine.js";
import { CommandJobLauncher, splitCommandLine } from "./launcher/command-launcher.js";
import { HttpJobLauncher, type FetchLike } from "./launcher/http-launcher.js";
import type { ExecutionStatusSource, JobLauncher } from "./launcher/types.js";
import { InMemoryQueueStore, type QueueStore } from "./persistence.js";
import { RedisQueueStore } from "./persistence/redis-adapter.js";
import type { QueuePluginContext } from "./plugins/types.js";

export interface Runtime {
  config: AppConfig;
  store: QueueStore;
  launcher: JobLauncher | null;
  statusSource: ExecutionStatusSource | null;
  engine: Ticker;
  admin: QueueAdmin;
  intake: QueueIntake;
  close(): Promise<void>;
}

export function createStore(config: AppConfig): QueueStore {
  if (config.store === "redis") {
    return new RedisQueueStore(config.redisUrl, { queueRoot: config.queueRoot });
  }
  return new InMemoryQueueStore({ queueRoot: config.queueRoot });
}

/** The configured launcher, or null when its endpoint or command is not set. */
export function createLauncher(
  config: AppConfig,
  options: { fetch?: FetchLike } = {}
): JobLauncher | null {
  if (config.launcher === "command") {
    if (!config.launchCommand) return null;
    const { command, args } = splitCommandLine(config.launchCommand);
    return new CommandJobLauncher({ command, args });
  }
  if (!config.batchRunUrl) return null;
  return new HttpJobLauncher({
    runUrl: config.batchRunUrl,
    apiBase: config.batchApiBase,
    token: config.batchToken,
    fetch: options.fetch,
  });
}

function isStatusSource(value: JobLauncher): value is JobLauncher & ExecutionStatusSource {
  return value instanceof HttpJobLauncher;
}

const unconfigured: Ticker = {
  async tick() {
    throw new Error(
      "no launcher configured: set LAUNCHQ_BATCH_RUN_URL, or LAUNCHQ_LAUNCHER=command with LAUNCHQ_LAUNCH_COMMAND"
    );
  },
};

export function createRuntime(
  config: AppConfig,
  deps: {
    logger: Logger;
    ctx: QueuePluginContext;
    store?: QueueStore;
    launcher?: JobLauncher | null;
    fetch?: FetchLike;
  }
): Runtime {
  const store = deps.store ?? createStore(config);
  const launcher =
    deps.launcher !== undefined ? deps.launcher : createLauncher(config, { fetch: deps.fetch });
  const engine: Ticker = launcher
    ? new TickEngine(
        { store, launcher, logger: deps.logger, ctx: deps.ctx },
        {
          maxAttempts: config.maxAttempts,
          maxInFlightLaunches: config.maxInFlightLaunches,
          claimMaxRetries: config.claimMaxRetries,
          outcomeMaxRetries: config.outcomeMaxRetries,
          launchTimeoutMs: config.launchTimeoutMs,
          policy: config.failurePolicy,
        }
      )
    : unconfigured;

  const admin = new QueueAdmin(
    { store, engine, logger: deps.logger, ctx: deps.ctx },
    { conflictMaxRetries: config.claimMaxRetries, staleAfterMs: config.staleAfterMs }
  );
  const intake = new QueueIntake(
    { store, logger: deps.logger, ctx: deps.ctx },
    { conflictMaxRetries: config.claimMaxRetries }
  );

  return {
    config,
    store,
    launcher,
    statusSource: launcher && isStatusSource(launcher) ? launcher : null,
    engine,
    admin,
    intake,
    async close() {
      if (store instanceof RedisQueueStore) await store.quit();
    },
  };
}
