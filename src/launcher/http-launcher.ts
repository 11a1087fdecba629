import type { JobParams } from "../contracts.js";
import { LaunchError, errorMessage, type LaunchFailureKind } from "../errors.js";
import type {
  ExecutionStatus,
  ExecutionStatusSource,
  JobLauncher,
  LaunchContext,
} from "./types.js";

const MAX_ERROR_BODY = 512;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface EnvVar {
  name: string;
  value: string;
}

export interface RunJobRequest {
  overrides: { containerOverrides: Array<{ env: EnvVar[] }> };
}

export interface HttpJobLauncherOptions {
  /** Full URL of the backend's run endpoint, e.g. `.../jobs/<job>:run`. */
  runUrl: string;
  /** Base URL that execution references are resolved against for status reads. */
  apiBase?: string;
  token?: string | (() => Promise<string>);
  /** Extra container env vars sent with every launch. */
  env?: Record<string, string>;
  fetch?: FetchLike;
}

export function classifyHttpStatus(status: number): LaunchFailureKind {
  if (status === 401 || status === 403) return "permission";
  if (status === 404) return "not_found";
  if (status === 408) return "transient";
  if (status === 429) return "quota";
  if (status >= 500) return "transient";
  return "invalid";
}

function envName(key: string): string {
  return key.toUpperCase().replace(/[^A-Z0-9_]/g, "_");
}

export function buildRunRequest(params: JobParams, extraEnv: Record<string, string> = {}): RunJobRequest {
  const env: EnvVar[] = [];
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      env.push({ name: envName(key), value: String(value) });
    }
  }
  for (const [name, value] of Object.entries(extraEnv)) env.push({ name, value });
  env.push({ name: "JOB_PARAMS", value: JSON.stringify(params) });
  return { overrides: { containerOverrides: [{ env }] } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Execution name from a long-running-operation response, or the bare resource name. */
export function extractExecutionRef(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  const metadata = payload.metadata;
  if (isRecord(metadata) && typeof metadata.name === "string" && metadata.name) {
    return metadata.name;
  }
  return typeof payload.name === "string" && payload.name ? payload.name : undefined;
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...[truncated]` : text;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class HttpJobLauncher implements JobLauncher, ExecutionStatusSource {
  readonly name = "http";
  private readonly fetchImpl: FetchLike;
  private readonly apiBase: string;

  constructor(private readonly options: HttpJobLauncherOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.apiBase = (options.apiBase ?? "https://run.googleapis.com/v2").replace(/\/+$/, "");
  }

  async launch(params: JobParams, ctx: LaunchContext): Promise<string> {
    const body = buildRunRequest(params, {
      ...this.options.env,
      QUEUE_NAME: ctx.queueName,
      QUEUE_ENTRY_ID: ctx.entryId,
    });

    let status: number;
    let text: string;
    try {
      const res = await this.fetchImpl(this.options.runUrl, {
        method: "POST",
        headers: await this.headers(),
        body: JSON.stringify(body),
        signal: ctx.signal,
      });
      status = res.status;
      text = await res.text();
    } catch (err) {
      if (err instanceof LaunchError) throw err;
      if (ctx.signal.aborted) {
        throw new LaunchError("timeout", `run request aborted: ${errorMessage(err)}`, undefined, err);
      }
      throw new LaunchError("transient", `run request failed: ${errorMessage(err)}`, undefined, err);
    }

    if (status < 200 || status >= 300) {
      throw new LaunchError(classifyHttpStatus(status), `HTTP ${status}: ${truncate(text)}`);
    }

    const ref = extractExecutionRef(parseJson(text));
    if (!ref) {
      // The job may have started; without a reference it cannot be tracked.
      throw new LaunchError("unknown", "run response carried no execution reference");
    }
    return ref;
  }

  async getExecutionStatus(executionRef: string, signal?: AbortSignal): Promise<ExecutionStatus> {
    const url = /^https?:\/\//.test(executionRef)
      ? executionRef
      : `${this.apiBase}/${executionRef.replace(/^\/+/, "")}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, { method: "GET", headers: await this.headers(), signal });
    } catch (err) {
      throw new LaunchError("transient", `status request failed: ${errorMessage(err)}`, undefined, err);
    }

    const text = await res.text();
    if (res.status === 404) return { state: "UNKNOWN", message: "execution not found" };
    if (!res.ok) {
      throw new LaunchError(classifyHttpStatus(res.status), `HTTP ${res.status}: ${truncate(text)}`);
    }

    const execution = parseJson(text);
    if (!isRecord(execution)) return { state: "UNKNOWN", message: "unreadable execution payload" };
    if (typeof execution.completionTime !== "string" || !execution.completionTime) {
      return { state: "RUNNING" };
    }

    const succeeded = typeof execution.succeededCount === "number" ? execution.succeededCount : 0;
    if (succeeded > 0) return { state: "SUCCEEDED" };
    const failed = typeof execution.failedCount === "number" ? execution.failedCount : 0;
    return { state: "FAILED", message: `execution finished with ${failed} failed task(s)` };
  }

  private async headers(): Promise<Record<string, string>> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    const token =
      typeof this.options.token === "function" ? await this.options.token() : this.options.token;
    if (token) headers.authorization = `Bearer ${token}`;
    return headers;
  }
}
