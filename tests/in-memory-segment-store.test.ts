import assert from "node:assert/strict";
import test from "node:test";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InMemorySegmentStore } from "../src/infrastructure/vector/in.memory.segment.store";
import { SearchServiceError } from "../src/domain/errors/search.errors";

async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "segment-store-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("search returns ranked candidates above the threshold", async () => {
  const store = new InMemorySegmentStore([
    { videoId: "v1", segmentStart: 0, embedding: [0, 1] },
    { videoId: "v2", segmentStart: 5, embedding: [1, 0] },
  ]);

  const results = await store.search([1, 0], { minSimilarity: 0.4, maxCandidates: 10 });

  assert.deepEqual(results, [{ videoId: "v2", segmentStart: 5, similarity: 1 }]);
});

test("search skips a segment with a mismatched embedding and returns the rest", async () => {
  const store = new InMemorySegmentStore([
    { videoId: "v1", embedding: [1, 0, 0] },
    { videoId: "v2", embedding: [1, 0] },
  ]);

  const results = await store.search([1, 0], { minSimilarity: 0.4, maxCandidates: 10 });

  assert.deepEqual(results, [{ videoId: "v2", similarity: 1 }]);
});

test("fromFile loads segment documents from a JSON array", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "segments.json");
    await writeFile(
      file,
      JSON.stringify([{ videoId: "v1", embedding: [1, 0] }, "not a record", { videoId: "v2", embedding: [0, 1] }])
    );

    const store = await InMemorySegmentStore.fromFile(file);

    assert.equal(store.size(), 2);
  });
});

test("fromFile rejects files that are not a JSON array", async () => {
  await withTempDir(async (dir) => {
    const file = path.join(dir, "segments.json");
    await writeFile(file, JSON.stringify({ videoId: "v1" }));

    await assert.rejects(InMemorySegmentStore.fromFile(file), SearchServiceError);
    await assert.rejects(InMemorySegmentStore.fromFile(path.join(dir, "missing.json")), SearchServiceError);
  });
});
