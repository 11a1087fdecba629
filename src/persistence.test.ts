import test from "node:test";
import assert from "node:assert/strict";
import { ConflictError, NotFoundError } from "./errors.js";
import { CREATE_GENERATION, InMemoryQueueStore, queueBlobPath } from "./persistence.js";
import { appendEntries, createQueueDocument, serializeQueueDocument } from "./queue/document.js";

const NOW = new Date("2024-05-01T10:00:00.000Z");

test("queueBlobPath sanitizes the queue name", () => {
  assert.equal(queueBlobPath("launch-queues", "Train A"), "launch-queues/train-a/queue.json");
});

test("load of a missing queue throws NotFoundError", async () => {
  const store = new InMemoryQueueStore();
  await assert.rejects(store.load("My Q"), (err: unknown) => {
    assert.ok(err instanceof NotFoundError);
    assert.equal(err.code, "queue_not_found");
    assert.equal(err.message, "queue not found: my-q");
    return true;
  });
});

test("create-if-absent succeeds once", async () => {
  const store = new InMemoryQueueStore();
  const doc = createQueueDocument("q");

  assert.equal(await store.save("q", doc, CREATE_GENERATION), "1");
  await assert.rejects(store.save("q", doc, CREATE_GENERATION), ConflictError);
});

test("save with a stale generation conflicts and leaves the winner in place", async () => {
  const store = new InMemoryQueueStore();
  await store.save("q", createQueueDocument("q"), CREATE_GENERATION);

  const first = await store.load("q");
  const second = await store.load("q");
  appendEntries(first.document, [{ id: "a", params: {} }], NOW);
  appendEntries(second.document, [{ id: "b", params: {} }], NOW);

  assert.equal(await store.save("q", first.document, first.generation), "2");
  await assert.rejects(store.save("q", second.document, second.generation), ConflictError);

  const after = await store.load("q");
  assert.equal(after.generation, "2");
  assert.deepEqual(
    after.document.entries.map((e) => e.id),
    ["a"]
  );
});

test("stored bytes are exactly the serialized document", async () => {
  const store = new InMemoryQueueStore();
  const doc = createQueueDocument("q");
  appendEntries(doc, [{ id: "a", params: { lr: 0.01 } }], NOW);
  await store.save("q", doc, CREATE_GENERATION);

  assert.equal(store.readRaw("q"), serializeQueueDocument(doc));
  assert.deepEqual((await store.load("q")).document, doc);
});

test("legacy documents are upgraded on the next write", async () => {
  const store = new InMemoryQueueStore();
  const generation = store.writeRaw(
    "old",
    JSON.stringify({ version: 1, queue_running: true, entries: [{ id: 7, status: "PENDING" }] })
  );

  const loaded = await store.load("old");
  assert.equal(loaded.generation, generation);
  assert.equal(loaded.document.entries[0].id, "7");

  await store.save("old", loaded.document, loaded.generation);
  assert.match(store.readRaw("old") ?? "", /"schemaVersion": 2/);
});

test("delete removes the document", async () => {
  const store = new InMemoryQueueStore();
  await store.save("q", createQueueDocument("q"), CREATE_GENERATION);
  await store.delete("q");
  await assert.rejects(store.load("q"), NotFoundError);
  assert.equal(await store.save("q", createQueueDocument("q"), CREATE_GENERATION), "1");
});
