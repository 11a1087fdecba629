import { spawn } from "node:child_process";
import type { JobParams } from "../contracts.js";
import { LaunchError, type LaunchFailureKind } from "../errors.js";
import type { JobLauncher, LaunchContext } from "./types.js";

const MAX_CAPTURE_BYTES = 64 * 1024;
const KILL_GRACE_MS = 1_000;

export interface CommandJobLauncherOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
}

const SPAWN_ERROR_KINDS: Record<string, LaunchFailureKind> = {
  ENOENT: "not_found",
  EACCES: "permission",
  EPERM: "permission",
};

export function classifySpawnError(err: Error): LaunchFailureKind {
  const code = "code" in err && typeof err.code === "string" ? err.code : "";
  return SPAWN_ERROR_KINDS[code] ?? "transient";
}

function truncateCapture(value: string): string {
  if (Buffer.byteLength(value) <= MAX_CAPTURE_BYTES) return value;
  const buf = Buffer.from(value);
  return `${buf.subarray(0, MAX_CAPTURE_BYTES).toString("utf8")}\n...[truncated]`;
}

/** Splits a configured command line on whitespace; no shell quoting is interpreted. */
export function splitCommandLine(line: string): { command: string; args: string[] } {
  const [command = "", ...args] = line.trim().split(/\s+/).filter(Boolean);
  return { command, args };
}

/**
 * Launches by running a local command that submits the job and prints the
 * execution reference as its last non-empty stdout line.
 */
export class CommandJobLauncher implements JobLauncher {
  readonly name = "command";

  constructor(private readonly options: CommandJobLauncherOptions) {
    if (!options.command) throw new Error("command launcher needs a command");
  }

  async launch(params: JobParams, ctx: LaunchContext): Promise<string> {
    if (ctx.signal.aborted) {
      throw new LaunchError("timeout", "launch aborted before the command started");
    }

    return await new Promise<string>((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args ?? [], {
        cwd: this.options.cwd,
        env: {
          ...process.env,
          ...(this.options.env ?? {}),
          JOB_PARAMS: JSON.stringify(params),
          QUEUE_NAME: ctx.queueName,
          QUEUE_ENTRY_ID: ctx.entryId,
          QUEUE_ATTEMPT: String(ctx.attempt),
        },
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const onAbort = () => {
        timedOut = true;
        child.kill("SIGTERM");
        setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS).unref();
      };
      ctx.signal.addEventListener("abort", onAbort, { once: true });

      child.stdout.on("data", (chunk) => {
        stdout += chunk.toString();
      });

      child.stderr.on("data", (chunk) => {
        stderr += chunk.toString();
      });

      child.on("error", (err) => {
        ctx.signal.removeEventListener("abort", onAbort);
        reject(new LaunchError(classifySpawnError(err), `spawn failed: ${err.message}`, undefined, err));
      });

      child.on("close", (code, signal) => {
        ctx.signal.removeEventListener("abort", onAbort);

        if (timedOut) {
          reject(new LaunchError("timeout", `command killed after launch timeout (${signal ?? "exit"})`));
          return;
        }

        if (code !== 0) {
          const detail = truncateCapture(stderr.trim() || stdout.trim());
          reject(new LaunchError("invalid", `process_exit:${code ?? "null"} ${detail}`.trim()));
          return;
        }

        const lines = stdout.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
        const ref = lines[lines.length - 1];
        if (!ref) {
          reject(new LaunchError("unknown", "command printed no execution reference"));
          return;
        }
        resolve(ref);
      });
    });
  }
}
