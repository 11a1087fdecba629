import test from "node:test";
import assert from "node:assert/strict";
import type { QueueDocument } from "./contracts.js";
import { TickEngine } from "./control/tick-engine.js";
import type { JobLauncher } from "./launcher/types.js";
import { CREATE_GENERATION, InMemoryQueueStore, type QueueStore } from "./persistence.js";
import { appendEntries, createQueueDocument, findEntry } from "./queue/document.js";

const NOW = new Date("2024-05-01T10:00:00.000Z");
const now = () => NOW;

const launcher: JobLauncher = {
  name: "echo",
  async launch(_params, ctx) {
    return `exec-${ctx.entryId}`;
  },
};

async function seeded(ids: string[]) {
  const store = new InMemoryQueueStore();
  const doc = createQueueDocument("q");
  appendEntries(
    doc,
    ids.map((id) => ({ id, params: {} })),
    NOW
  );
  await store.save("q", doc, CREATE_GENERATION);
  return store;
}

/** Commits `interfere` to the inner store just before every save `when` selects. */
class InterferingStore implements QueueStore {
  saves = 0;
  constructor(
    private readonly inner: InMemoryQueueStore,
    private readonly interfere: (doc: QueueDocument) => void,
    private readonly when: (save: number) => boolean
  ) {}

  load(queueName: string) {
    return this.inner.load(queueName);
  }

  async save(queueName: string, document: QueueDocument, expectedGeneration: string) {
    this.saves += 1;
    if (this.when(this.saves)) {
      const current = await this.inner.load(queueName);
      this.interfere(current.document);
      await this.inner.save(queueName, current.document, current.generation);
    }
    return this.inner.save(queueName, document, expectedGeneration);
  }

  delete(queueName: string) {
    return this.inner.delete(queueName);
  }
}

test("concurrent ticks never launch the same entry twice", async () => {
  const store = await seeded(["a", "b", "c", "d"]);
  const engines = [1, 2, 3, 4].map(
    () => new TickEngine({ store, launcher }, { now, maxInFlightLaunches: 10, claimMaxRetries: 10 })
  );

  const results = await Promise.all(engines.map((engine) => engine.tick("q")));
  const launched = results.map((r) => r.launched?.id).sort();
  assert.deepEqual(launched, ["a", "b", "c", "d"]);

  const { document } = await store.load("q");
  for (const entry of document.entries) {
    assert.equal(entry.status, "RUNNING");
    assert.equal(entry.attempts, 1);
    assert.equal(entry.executionRef, `exec-${entry.id}`);
  }
});

test("claim retried after a conflict picks the next entry the winner left", async () => {
  const inner = await seeded(["a", "b"]);
  // The competing writer claims "a" between our load and our save.
  const store = new InterferingStore(
    inner,
    (doc) => {
      const a = findEntry(doc, "a");
      a.status = "LAUNCHING";
      a.attempts = 1;
    },
    (n) => n === 1
  );
  const engine = new TickEngine({ store, launcher }, { now, maxInFlightLaunches: 2 });

  const result = await engine.tick("q");
  assert.equal(result.reason, "launched");
  assert.equal(result.launched?.id, "b");
  assert.equal(result.conflicts, 1);

  const { document } = await inner.load("q");
  assert.deepEqual(
    document.entries.map((e) => [e.id, e.status, e.attempts]),
    [
      ["a", "LAUNCHING", 1],
      ["b", "RUNNING", 1],
    ]
  );
});

test("unrelated concurrent writes survive a retried claim", async () => {
  const inner = await seeded(["a"]);
  const store = new InterferingStore(
    inner,
    (doc) => {
      appendEntries(doc, [{ id: "late", params: {} }], NOW);
    },
    (n) => n === 1
  );
  const engine = new TickEngine({ store, launcher }, { now });

  const result = await engine.tick("q");
  assert.equal(result.launched?.id, "a");
  assert.equal(result.conflicts, 1);

  const { document } = await inner.load("q");
  assert.deepEqual(
    document.entries.map((e) => [e.id, e.status]),
    [
      ["a", "RUNNING"],
      ["late", "PENDING"],
    ]
  );
});

test("claim gives up after claimMaxRetries conflicts", async () => {
  const inner = await seeded(["a"]);
  const store = new InterferingStore(inner, () => {}, () => true);
  let called = 0;
  const counting: JobLauncher = {
    name: "counting",
    async launch() {
      called += 1;
      return "exec";
    },
  };
  const engine = new TickEngine({ store, launcher: counting }, { now, claimMaxRetries: 2 });

  const result = await engine.tick("q");
  assert.equal(result.reason, "conflict-exhausted");
  assert.equal(result.conflicts, 3);
  assert.equal(called, 0);
  assert.equal((await inner.load("q")).document.entries[0].status, "PENDING");
});

test("outcome write retries on conflict without relaunching", async () => {
  const inner = await seeded(["a"]);
  let launches = 0;
  // Saves: 1 = claim, 2 = outcome (interfered), 3 = outcome retry.
  const store = new InterferingStore(inner, () => {}, (n) => n === 2);
  const engine = new TickEngine(
    {
      store,
      launcher: {
        name: "once",
        async launch() {
          launches += 1;
          return "exec-1";
        },
      },
    },
    { now, outcomeBackoffMs: 0 }
  );

  const result = await engine.tick("q");
  assert.equal(launches, 1);
  assert.equal(result.reason, "launched");
  assert.equal(result.conflicts, 1);
  assert.equal((await inner.load("q")).document.entries[0].executionRef, "exec-1");
});
