import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { errorMessage } from "./errors.js";
import {
  DEFAULT_FAILURE_POLICY,
  policyFromRetryableKinds,
  type FailurePolicy,
} from "./control/retry-policy.js";

const csv = (value: string) =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);

const envSchema = z.object({
  LAUNCHQ_HOST: z.string().default("0.0.0.0"),
  LAUNCHQ_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  LAUNCHQ_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LAUNCHQ_STORE: z.enum(["memory", "redis"]).default("memory"),
  LAUNCHQ_REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  LAUNCHQ_QUEUE_ROOT: z.string().min(1).default("launch-queues"),
  LAUNCHQ_DEFAULT_QUEUE: z.string().min(1).default("default"),
  LAUNCHQ_ADMIN_SECRET: z.string().min(1).default("admin-dev"),
  LAUNCHQ_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  LAUNCHQ_MAX_IN_FLIGHT: z.coerce.number().int().positive().default(1),
  LAUNCHQ_CLAIM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  LAUNCHQ_OUTCOME_MAX_RETRIES: z.coerce.number().int().min(0).default(10),
  LAUNCHQ_LAUNCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LAUNCHQ_STALE_AFTER_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  LAUNCHQ_RETRYABLE_KINDS: z.string().optional(),
  LAUNCHQ_LAUNCHER: z.enum(["http", "command"]).default("http"),
  LAUNCHQ_BATCH_RUN_URL: z.string().url().optional(),
  LAUNCHQ_BATCH_API_BASE: z.string().url().default("https://run.googleapis.com/v2"),
  LAUNCHQ_BATCH_TOKEN: z.string().optional(),
  LAUNCHQ_LAUNCH_COMMAND: z.string().optional(),
  LAUNCHQ_TICK_INTERVAL_MS: z.coerce.number().int().min(0).default(0),
  LAUNCHQ_TICK_QUEUES: z.string().default(""),
  LAUNCHQ_DRAIN_MAX_TICKS: z.coerce.number().int().positive().default(50),
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: z.infer<typeof envSchema>["LAUNCHQ_LOG_LEVEL"];
  store: "memory" | "redis";
  redisUrl: string;
  queueRoot: string;
  defaultQueue: string;
  adminSecret: string;
  maxAttempts: number;
  maxInFlightLaunches: number;
  claimMaxRetries: number;
  outcomeMaxRetries: number;
  launchTimeoutMs: number;
  staleAfterMs: number;
  failurePolicy: FailurePolicy;
  launcher: "http" | "command";
  batchRunUrl?: string;
  batchApiBase: string;
  batchToken?: string;
  launchCommand?: string;
  tickIntervalMs: number;
  /** Queues the in-process scheduler drains; the default queue when none are listed. */
  tickQueues: string[];
  drainMaxTicks: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  // Blank variables count as unset.
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([key, value]) => key.startsWith("LAUNCHQ_") && value !== "")
  );
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const env = parsed.data;

  let failurePolicy: FailurePolicy = { ...DEFAULT_FAILURE_POLICY };
  if (env.LAUNCHQ_RETRYABLE_KINDS !== undefined) {
    try {
      failurePolicy = policyFromRetryableKinds(csv(env.LAUNCHQ_RETRYABLE_KINDS));
    } catch (err) {
      throw new ConfigError([`LAUNCHQ_RETRYABLE_KINDS: ${errorMessage(err)}`]);
    }
  }

  const tickQueues = csv(env.LAUNCHQ_TICK_QUEUES);

  return {
    host: env.LAUNCHQ_HOST,
    port: env.LAUNCHQ_PORT,
    logLevel: env.LAUNCHQ_LOG_LEVEL,
    store: env.LAUNCHQ_STORE,
    redisUrl: env.LAUNCHQ_REDIS_URL,
    queueRoot: env.LAUNCHQ_QUEUE_ROOT,
    defaultQueue: env.LAUNCHQ_DEFAULT_QUEUE,
    adminSecret: env.LAUNCHQ_ADMIN_SECRET,
    maxAttempts: env.LAUNCHQ_MAX_ATTEMPTS,
    maxInFlightLaunches: env.LAUNCHQ_MAX_IN_FLIGHT,
    claimMaxRetries: env.LAUNCHQ_CLAIM_MAX_RETRIES,
    outcomeMaxRetries: env.LAUNCHQ_OUTCOME_MAX_RETRIES,
    launchTimeoutMs: env.LAUNCHQ_LAUNCH_TIMEOUT_MS,
    staleAfterMs: env.LAUNCHQ_STALE_AFTER_MS,
    failurePolicy,
    launcher: env.LAUNCHQ_LAUNCHER,
    batchRunUrl: env.LAUNCHQ_BATCH_RUN_URL,
    batchApiBase: env.LAUNCHQ_BATCH_API_BASE,
    batchToken: env.LAUNCHQ_BATCH_TOKEN,
    launchCommand: env.LAUNCHQ_LAUNCH_COMMAND,
    tickIntervalMs: env.LAUNCHQ_TICK_INTERVAL_MS,
    tickQueues: tickQueues.length > 0 ? tickQueues : [env.LAUNCHQ_DEFAULT_QUEUE],
    drainMaxTicks: env.LAUNCHQ_DRAIN_MAX_TICKS,
  };
}

/** Reads `.env` into the process environment, then parses it. */
export function loadProcessConfig(): AppConfig {
  loadEnv();
  return loadConfig(process.env);
}
