import test from "node:test";
import assert from "node:assert/strict";
import type { EntrySubmission, JobParams, QueueDocument } from "./contracts.js";
import { LaunchError, NotFoundError, OutcomePersistError } from "./errors.js";
import { QueueAdmin } from "./control/admin.js";
import { TickEngine } from "./control/tick-engine.js";
import type { JobLauncher, LaunchContext } from "./launcher/types.js";
import { CREATE_GENERATION, InMemoryQueueStore, type QueueStore } from "./persistence.js";
import type { QueuePluginContext } from "./plugins/types.js";
import { appendEntries, createQueueDocument } from "./queue/document.js";

const T0 = new Date("2024-05-01T09:00:00.000Z");
const NOW = new Date("2024-05-01T10:00:00.000Z");
const now = () => NOW;

class FakeLauncher implements JobLauncher {
  readonly name = "fake";
  calls: Array<{ params: JobParams; ctx: LaunchContext }> = [];

  constructor(private readonly respond: (call: number, ctx: LaunchContext) => Promise<string> | string) {}

  async launch(params: JobParams, ctx: LaunchContext): Promise<string> {
    this.calls.push({ params, ctx });
    return this.respond(this.calls.length, ctx);
  }
}

function recorder(): QueuePluginContext & { types: string[] } {
  const types: string[] = [];
  return { types, emit: (event) => types.push(event.type) };
}

async function seed(
  store: InMemoryQueueStore,
  entries: EntrySubmission[],
  edit: (doc: QueueDocument) => void = () => {}
) {
  const doc = createQueueDocument("q");
  appendEntries(doc, entries, T0);
  edit(doc);
  await store.save("q", doc, CREATE_GENERATION);
}

// ── Happy path ──────────────────────────────────────────────────────────────

test("ticks launch pending entries one at a time in submission order", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [
    { id: "a", params: { lr: 0.1 } },
    { id: "b", params: { lr: 0.2 } },
  ]);
  const launcher = new FakeLauncher((n) => `exec-${n}`);
  const ctx = recorder();
  const engine = new TickEngine({ store, launcher, ctx }, { now });

  const first = await engine.tick("q");
  assert.equal(first.reason, "launched");
  assert.equal(first.launched?.id, "a");
  assert.deepEqual(first.entry, {
    id: "a",
    status: "RUNNING",
    params: { lr: 0.1 },
    executionRef: "exec-1",
    attempts: 1,
    lastError: "",
    createdAt: T0.toISOString(),
    updatedAt: NOW.toISOString(),
  });

  const second = await engine.tick("q");
  assert.equal(second.launched?.id, "b");
  assert.equal(second.launched?.executionRef, "exec-2");

  const third = await engine.tick("q");
  assert.equal(third.reason, "empty");
  assert.equal(third.launched, null);

  assert.deepEqual(
    launcher.calls.map((c) => [c.params, c.ctx.queueName, c.ctx.entryId, c.ctx.attempt]),
    [
      [{ lr: 0.1 }, "q", "a", 1],
      [{ lr: 0.2 }, "q", "b", 1],
    ]
  );
  assert.deepEqual(ctx.types, ["tick.claimed", "tick.launched", "tick.claimed", "tick.launched", "tick.empty"]);

  const { document } = await store.load("q");
  assert.equal(document.savedAt, NOW.toISOString());
  assert.deepEqual(
    document.entries.map((e) => [e.id, e.status, e.executionRef]),
    [
      ["a", "RUNNING", "exec-1"],
      ["b", "RUNNING", "exec-2"],
    ]
  );
});

test("a paused queue is left untouched unless forced", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }], (doc) => {
    doc.running = false;
  });
  const launcher = new FakeLauncher(() => "exec-1");
  const engine = new TickEngine({ store, launcher }, { now });

  const paused = await engine.tick("q");
  assert.equal(paused.reason, "paused");
  assert.equal(launcher.calls.length, 0);
  const after = await store.load("q");
  assert.equal(after.generation, "1");
  assert.equal(after.document.entries[0].status, "PENDING");

  const forced = await engine.tick("q", { force: true });
  assert.equal(forced.reason, "launched");
  assert.equal((await store.load("q")).document.running, false);
});

test("a missing queue propagates NotFoundError", async () => {
  const engine = new TickEngine({ store: new InMemoryQueueStore(), launcher: new FakeLauncher(() => "x") });
  await assert.rejects(engine.tick("nope"), NotFoundError);
});

// ── Failures ────────────────────────────────────────────────────────────────

test("non-retryable failure fails the entry after one attempt", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const launcher = new FakeLauncher(() => {
    throw new LaunchError("permission", "HTTP 403: denied");
  });
  const ctx = recorder();
  const engine = new TickEngine({ store, launcher, ctx }, { now });

  const result = await engine.tick("q");
  assert.equal(result.reason, "launch-failed");
  assert.equal(result.launched, null);
  assert.equal(result.entry?.status, "FAILED");
  assert.equal(result.entry?.attempts, 1);
  assert.equal(result.entry?.lastError, "permission: HTTP 403: denied");
  assert.deepEqual(ctx.types, ["tick.claimed", "tick.failed"]);

  assert.equal((await engine.tick("q")).reason, "empty");
  assert.equal(launcher.calls.length, 1);
});

test("retryable failures are bounded by maxAttempts", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const launcher = new FakeLauncher(() => {
    throw new LaunchError("transient", "HTTP 503: unavailable");
  });
  const engine = new TickEngine({ store, launcher }, { now, maxAttempts: 3 });

  const reasons: string[] = [];
  for (let i = 0; i < 4; i++) reasons.push((await engine.tick("q")).reason);

  assert.deepEqual(reasons, ["retry-scheduled", "retry-scheduled", "launch-failed", "empty"]);
  assert.deepEqual(
    launcher.calls.map((c) => c.ctx.attempt),
    [1, 2, 3]
  );
  const [entry] = (await store.load("q")).document.entries;
  assert.equal(entry.status, "FAILED");
  assert.equal(entry.attempts, 3);
  assert.equal(entry.lastError, "attempts exhausted (3/3): transient: HTTP 503: unavailable");
});

test("requeued entry keeps its error until the next claim", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const launcher = new FakeLauncher((n) => {
    if (n === 1) throw new LaunchError("quota", "HTTP 429: slow down");
    return "exec-2";
  });
  const engine = new TickEngine({ store, launcher }, { now });

  const retry = await engine.tick("q");
  assert.equal(retry.entry?.status, "PENDING");
  assert.equal(retry.entry?.lastError, "quota: HTTP 429: slow down");

  const launched = await engine.tick("q");
  assert.equal(launched.entry?.status, "RUNNING");
  assert.equal(launched.entry?.attempts, 2);
  assert.equal(launched.entry?.lastError, "");
});

test("an empty execution reference counts as an unknown failure", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const engine = new TickEngine({ store, launcher: new FakeLauncher(() => "") }, { now });

  const result = await engine.tick("q");
  assert.equal(result.reason, "launch-failed");
  assert.equal(result.entry?.executionRef, "");
  assert.equal(result.entry?.lastError, "unknown: fake launcher returned an empty execution reference");
});

test("plain errors from a launcher are treated as unknown", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const launcher = new FakeLauncher(() => {
    throw new Error("socket hang up");
  });
  const engine = new TickEngine({ store, launcher }, { now });

  const result = await engine.tick("q");
  assert.equal(result.entry?.status, "FAILED");
  assert.equal(result.entry?.lastError, "unknown: socket hang up");
});

test("the launch is aborted after launchTimeoutMs", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const launcher = new FakeLauncher(
    (_n, ctx) =>
      new Promise<string>((_resolve, reject) => {
        ctx.signal.addEventListener("abort", () => reject(new LaunchError("timeout", "launch timed out")));
      })
  );
  const engine = new TickEngine({ store, launcher }, { now, launchTimeoutMs: 20 });

  const result = await engine.tick("q");
  assert.equal(result.entry?.status, "FAILED");
  assert.equal(result.entry?.lastError, "timeout: launch timed out");
});

// ── In-flight limits ────────────────────────────────────────────────────────

test("busy while maxInFlightLaunches entries are LAUNCHING", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }, { id: "b", params: {} }], (doc) => {
    doc.entries[0].status = "LAUNCHING";
    doc.entries[0].attempts = 1;
  });
  const launcher = new FakeLauncher(() => "exec-b");

  const busy = await new TickEngine({ store, launcher }, { now }).tick("q");
  assert.equal(busy.reason, "busy");
  assert.equal(launcher.calls.length, 0);

  const wider = new TickEngine({ store, launcher }, { now, maxInFlightLaunches: 2 });
  const result = await wider.tick("q");
  assert.equal(result.launched?.id, "b");
});

// ── Races with administration ───────────────────────────────────────────────

test("cancel during launch stands and the execution stays traceable", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const admin = new QueueAdmin({ store, engine: { tick: () => Promise.reject(new Error("unused")) } }, { now });
  const launcher = new FakeLauncher(async () => {
    await admin.cancel("q", "a", "operator stop");
    return "exec-9";
  });
  const engine = new TickEngine({ store, launcher }, { now });

  const result = await engine.tick("q");
  assert.equal(result.reason, "launched");
  assert.equal(result.launched, null);
  assert.equal(result.entry?.status, "CANCELLED");
  assert.equal(result.entry?.executionRef, "exec-9");
  assert.equal(result.entry?.lastError, "operator stop");

  const [stored] = (await store.load("q")).document.entries;
  assert.equal(stored.status, "CANCELLED");
  assert.equal(stored.executionRef, "exec-9");
});

test("failed launch after a cancel leaves the cancelled entry alone", async () => {
  const store = new InMemoryQueueStore();
  await seed(store, [{ id: "a", params: {} }]);
  const admin = new QueueAdmin({ store, engine: { tick: () => Promise.reject(new Error("unused")) } }, { now });
  const launcher = new FakeLauncher(async () => {
    await admin.cancel("q", "a");
    throw new LaunchError("transient", "HTTP 502");
  });
  const engine = new TickEngine({ store, launcher }, { now });

  const before = await store.load("q");
  const result = await engine.tick("q");
  assert.equal(result.reason, "launch-failed");
  assert.equal(result.entry?.status, "CANCELLED");
  assert.equal(result.entry?.lastError, "cancelled by administrator");
  // claim + cancel; no outcome write
  assert.equal((await store.load("q")).generation, String(Number(before.generation) + 2));
});

// ── Outcome persistence ─────────────────────────────────────────────────────

class FlakyStore implements QueueStore {
  failSaves = false;
  constructor(private readonly inner: InMemoryQueueStore) {}

  load(queueName: string) {
    return this.inner.load(queueName);
  }

  async save(queueName: string, document: QueueDocument, expectedGeneration: string) {
    if (this.failSaves) {
      // A competing writer lands first every time.
      const current = await this.inner.load(queueName);
      await this.inner.save(queueName, current.document, current.generation);
    }
    return this.inner.save(queueName, document, expectedGeneration);
  }

  delete(queueName: string) {
    return this.inner.delete(queueName);
  }
}

test("outcome that cannot be written raises OutcomePersistError with the reference", async () => {
  const inner = new InMemoryQueueStore();
  await seed(inner, [{ id: "a", params: {} }]);
  const store = new FlakyStore(inner);
  const launcher = new FakeLauncher(() => {
    store.failSaves = true;
    return "exec-1";
  });
  const engine = new TickEngine({ store, launcher }, { now, outcomeMaxRetries: 1, outcomeBackoffMs: 0 });

  await assert.rejects(engine.tick("q"), (err: unknown) => {
    assert.ok(err instanceof OutcomePersistError);
    assert.equal(err.code, "outcome_not_persisted");
    assert.equal(err.entryId, "a");
    assert.equal(err.executionRef, "exec-1");
    assert.equal(err.message, "launch outcome for q/a not persisted (execution exec-1)");
    return true;
  });
  assert.equal((await inner.load("q")).document.entries[0].status, "LAUNCHING");
});
