import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import type { TickResult } from "./contracts.js";
import { QueueAdmin } from "./control/admin.js";
import { TickEngine, type Ticker } from "./control/tick-engine.js";
import { startTickScheduler } from "./control/tick-scheduler.js";
import { silentLogger } from "./logger.js";
import { CREATE_GENERATION, InMemoryQueueStore } from "./persistence.js";
import type { QueueEvent } from "./plugins/types.js";
import { appendEntries, createQueueDocument } from "./queue/document.js";

async function waitFor(check: () => Promise<boolean> | boolean, timeoutMs = 2_000) {
  const deadline = Date.now() + timeoutMs;
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await sleep(10);
  }
}

test("scheduler drains every listed queue and reports failures", async () => {
  const store = new InMemoryQueueStore();
  const doc = createQueueDocument("q");
  appendEntries(doc, [{ id: "a", params: {} }, { id: "b", params: {} }], new Date());
  await store.save("q", doc, CREATE_GENERATION);

  const engine = new TickEngine({
    store,
    launcher: { name: "echo", launch: async (_p, ctx) => `exec-${ctx.entryId}` },
  });
  const admin = new QueueAdmin({ store, engine });
  const events: QueueEvent[] = [];

  const handle = startTickScheduler(admin, ["q", "missing"], {
    intervalMs: 10,
    maxTicks: 5,
    logger: silentLogger,
    ctx: { emit: (event) => events.push(event) },
  });
  try {
    await waitFor(async () => (await admin.status("q")).counts.RUNNING === 2);
    await waitFor(() => events.some((e) => e.type === "scheduler.error"));
  } finally {
    clearInterval(handle);
  }

  const failure = events.find((e) => e.type === "scheduler.error");
  assert.equal(failure?.queue, "missing");
  assert.deepEqual(failure?.detail, { error: "queue not found: missing" });
});

test("scheduler skips an interval while the previous pass is running", async () => {
  let active = 0;
  let maxActive = 0;
  let calls = 0;
  const slow: Ticker = {
    async tick(queueName): Promise<TickResult> {
      calls += 1;
      active += 1;
      maxActive = Math.max(maxActive, active);
      await sleep(40);
      active -= 1;
      return { queueName, reason: "empty", launched: null, entry: null, conflicts: 0 };
    },
  };
  const admin = new QueueAdmin({ store: new InMemoryQueueStore(), engine: slow });

  const handle = startTickScheduler(admin, ["q"], {
    intervalMs: 5,
    maxTicks: 1,
    logger: silentLogger,
    ctx: { emit() {} },
  });
  try {
    await waitFor(() => calls >= 2);
  } finally {
    clearInterval(handle);
  }
  await waitFor(() => active === 0);
  assert.equal(maxActive, 1);
});
