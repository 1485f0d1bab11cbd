import assert from "node:assert/strict";
import test, { TestContext } from "node:test";
import { MongoClient } from "mongodb";
import { MongoDBSegmentStore } from "../src/infrastructure/vector/mongodb.segment.store";
import { SearchServiceError } from "../src/domain/errors/search.errors";

const params = { minSimilarity: 0.5, maxCandidates: 10 };

// A client that is never connected: sessions and the collection are replaced in process
function stubbedStore(t: TestContext, toArray: () => Promise<Record<string, unknown>[]>) {
  const client = new MongoClient("mongodb://127.0.0.1:27017");
  const sessions = { started: 0, ended: 0 };
  const session = {
    endSession: async () => {
      sessions.ended++;
    },
  };
  const finds: Array<{ filter: unknown; options: unknown }> = [];

  t.mock.method(client, "startSession", () => {
    sessions.started++;
    return session;
  });
  t.mock.method(client, "db", () => ({
    collection: () => ({
      find: (filter: unknown, options: unknown) => {
        finds.push({ filter, options });
        return { toArray };
      },
    }),
  }));

  return { store: new MongoDBSegmentStore(client, "video-search"), sessions, session, finds };
}

test("search ranks stored segments and ends its session", async (t) => {
  const { store, sessions, session, finds } = stubbedStore(t, async () => [
    { videoId: "a", segmentText: "match", embedding: [1, 0] },
    { videoId: "b", segmentText: "orthogonal", embedding: [0, 1] },
  ]);

  const results = await store.search([1, 0], params);

  assert.deepEqual(results, [{ videoId: "a", segmentText: "match", similarity: 1 }]);
  assert.deepEqual(sessions, { started: 1, ended: 1 });
  assert.deepEqual(finds, [
    { filter: { embedding: { $exists: true } }, options: { session, projection: { _id: 0 } } },
  ]);
});

test("search ends its session when the query fails", async (t) => {
  const { store, sessions } = stubbedStore(t, async () => {
    throw new Error("connection reset");
  });

  await assert.rejects(store.search([1, 0], params), (error: unknown) => {
    assert.ok(error instanceof SearchServiceError);
    assert.equal(error.message, "Segment search failed: connection reset");
    assert.equal(error.status, 503);
    return true;
  });
  assert.deepEqual(sessions, { started: 1, ended: 1 });
});
