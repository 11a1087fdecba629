import { setTimeout as sleep } from "node:timers/promises";
import type { LoadedQueue, QueueDocument } from "../contracts.js";
import { ConflictError } from "../errors.js";
import type { QueueStore } from "../persistence.js";

export type MutationStep<T> = { write: boolean; value: T };

export interface MutateOptions {
  /** Conflicts tolerated before the ConflictError is rethrown. */
  maxRetries: number;
  /** Linear backoff: the n-th retry waits n * backoffMs. */
  backoffMs?: number;
  now?: () => Date;
  onConflict?: (conflicts: number, err: ConflictError) => void;
}

export interface MutateResult<T> {
  value: T;
  /** Generation after the write, or the loaded one when nothing was written. */
  generation: string;
  written: boolean;
  conflicts: number;
}

/**
 * Load, apply, conditional save. On a generation conflict the local copy is
 * thrown away and `apply` runs again against a fresh load.
 */
export async function mutateQueue<T>(
  store: QueueStore,
  queueName: string,
  apply: (document: QueueDocument, loaded: LoadedQueue) => MutationStep<T>,
  options: MutateOptions
): Promise<MutateResult<T>> {
  const now = options.now ?? (() => new Date());
  let conflicts = 0;

  for (;;) {
    const loaded = await store.load(queueName);
    const step = apply(loaded.document, loaded);
    if (!step.write) {
      return { value: step.value, generation: loaded.generation, written: false, conflicts };
    }

    loaded.document.savedAt = now().toISOString();
    try {
      const generation = await store.save(queueName, loaded.document, loaded.generation);
      return { value: step.value, generation, written: true, conflicts };
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      conflicts += 1;
      options.onConflict?.(conflicts, err);
      if (conflicts > options.maxRetries) throw err;
      if (options.backoffMs) await sleep(options.backoffMs * conflicts);
    }
  }
}
