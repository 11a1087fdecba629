import { Redis } from "ioredis";
import type { LoadedQueue, QueueDocument } from "../contracts.js";
import { ConflictError, NotFoundError, StorageUnavailableError, errorMessage } from "../errors.js";
import { queueBlobPath, type QueueStore } from "../persistence.js";
import {
  parseQueueDocument,
  sanitizeQueueName,
  serializeQueueDocument,
} from "../queue/document.js";

// Compare-and-set on the generation field; a missing hash has generation "0".
// Returns "ok:<new generation>" or "conflict:<current generation>".
const CONDITIONAL_WRITE = `
local current = redis.call('HGET', KEYS[1], 'generation')
if not current then current = '0' end
if current ~= ARGV[1] then return 'conflict:' .. current end
local nextGen = tostring(tonumber(current) + 1)
redis.call('HSET', KEYS[1], 'body', ARGV[2], 'generation', nextGen)
return 'ok:' .. nextGen
`;

export class RedisQueueStore implements QueueStore {
  private readonly redis: Redis;
  private readonly queueRoot: string;

  constructor(redisOrUrl: Redis | string, options: { queueRoot?: string } = {}) {
    this.redis =
      typeof redisOrUrl === "string"
        ? new Redis(redisOrUrl, { maxRetriesPerRequest: 2 })
        : redisOrUrl;
    this.queueRoot = options.queueRoot ?? "launch-queues";
  }

  async load(queueName: string): Promise<LoadedQueue> {
    const [body, generation] = await this.call("load", queueName, () =>
      this.redis.hmget(this.key(queueName), "body", "generation")
    );
    if (body === null || generation === null) {
      throw new NotFoundError("queue", sanitizeQueueName(queueName));
    }
    return { document: parseQueueDocument(body, queueName), generation };
  }

  async save(
    queueName: string,
    document: QueueDocument,
    expectedGeneration: string
  ): Promise<string> {
    const reply = await this.call("save", queueName, () =>
      this.redis.eval(
        CONDITIONAL_WRITE,
        1,
        this.key(queueName),
        expectedGeneration,
        serializeQueueDocument(document)
      )
    );

    if (typeof reply !== "string") {
      throw new StorageUnavailableError(`unexpected reply from conditional write: ${String(reply)}`);
    }
    if (reply.startsWith("conflict:")) {
      throw new ConflictError(sanitizeQueueName(queueName), expectedGeneration);
    }
    return reply.slice("ok:".length);
  }

  async delete(queueName: string): Promise<void> {
    await this.call("delete", queueName, () => this.redis.del(this.key(queueName)));
  }

  /** Seeds a raw body, bypassing the precondition. Used for migrations and tests. */
  async writeRaw(queueName: string, body: string): Promise<string> {
    const key = this.key(queueName);
    const generation = await this.call("writeRaw", queueName, () =>
      this.redis.hincrby(key, "generation", 1)
    );
    await this.call("writeRaw", queueName, () => this.redis.hset(key, "body", body));
    return String(generation);
  }

  async quit(): Promise<void> {
    await this.redis.quit();
  }

  private key(queueName: string): string {
    return queueBlobPath(this.queueRoot, queueName);
  }

  private async call<T>(op: string, queueName: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageUnavailableError(
        `redis ${op} failed for queue ${sanitizeQueueName(queueName)}: ${errorMessage(err)}`,
        err
      );
    }
  }
}
