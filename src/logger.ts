import { pino, destination, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export function createLogger(
  options: { level?: LevelWithSilent; name?: string; stderr?: boolean } = {}
): Logger {
  const settings = { name: options.name ?? "launch-queue", level: options.level ?? "info" };
  // The CLI keeps stdout for command output.
  return options.stderr ? pino(settings, destination(2)) : pino(settings);
}

/** Logger for tests and library callers that do not want output. */
export const silentLogger: Logger = pino({ level: "silent" });
