import type { LoadedQueue, QueueDocument } from "./contracts.js";
import { ConflictError, NotFoundError } from "./errors.js";
import {
  parseQueueDocument,
  sanitizeQueueName,
  serializeQueueDocument,
} from "./queue/document.js";

/** Expected generation meaning "the document must not exist yet". */
export const CREATE_GENERATION = "0";

/**
 * The only component that touches storage. Every write is conditional on the
 * generation observed at load time; retry policy lives with the callers.
 */
export interface QueueStore {
  load(queueName: string): Promise<LoadedQueue>;
  save(queueName: string, document: QueueDocument, expectedGeneration: string): Promise<string>;
  delete(queueName: string): Promise<void>;
}

export function queueBlobPath(queueRoot: string, queueName: string): string {
  return `${queueRoot}/${sanitizeQueueName(queueName)}/queue.json`;
}

type StoredBlob = { body: string; generation: number };

export class InMemoryQueueStore implements QueueStore {
  private blobs = new Map<string, StoredBlob>();
  private readonly queueRoot: string;

  constructor(options: { queueRoot?: string } = {}) {
    this.queueRoot = options.queueRoot ?? "launch-queues";
  }

  async load(queueName: string): Promise<LoadedQueue> {
    const blob = this.blobs.get(this.key(queueName));
    if (!blob) throw new NotFoundError("queue", sanitizeQueueName(queueName));
    return {
      document: parseQueueDocument(blob.body, queueName),
      generation: String(blob.generation),
    };
  }

  async save(
    queueName: string,
    document: QueueDocument,
    expectedGeneration: string
  ): Promise<string> {
    const key = this.key(queueName);
    const current = this.blobs.get(key);
    const currentGeneration = current ? String(current.generation) : CREATE_GENERATION;
    if (currentGeneration !== expectedGeneration) {
      throw new ConflictError(sanitizeQueueName(queueName), expectedGeneration);
    }

    const next = (current?.generation ?? 0) + 1;
    this.blobs.set(key, { body: serializeQueueDocument(document), generation: next });
    return String(next);
  }

  async delete(queueName: string): Promise<void> {
    this.blobs.delete(this.key(queueName));
  }

  /** Raw stored bytes, for tests that seed or inspect the wire format. */
  readRaw(queueName: string): string | undefined {
    return this.blobs.get(this.key(queueName))?.body;
  }

  writeRaw(queueName: string, body: string): string {
    const key = this.key(queueName);
    const next = (this.blobs.get(key)?.generation ?? 0) + 1;
    this.blobs.set(key, { body, generation: next });
    return String(next);
  }

  private key(queueName: string): string {
    return queueBlobPath(this.queueRoot, queueName);
  }
}
