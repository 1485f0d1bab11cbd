import assert from "node:assert/strict";
import test from "node:test";
import { SearchVideosUseCase } from "../src/application/use-cases/search-videos.use-case";
import {
  EncodingError,
  QueryValidationError,
  SearchServiceError,
} from "../src/domain/errors/search.errors";
import { CandidateRecord } from "../src/domain/interfaces/isimilarity.search";
import { candidate, FakeEmbeddingProvider, FakeSearchService } from "./helpers/fixtures";

const defaults = { minSimilarity: 0.4, maxCandidates: 100 };

function setup(records: CandidateRecord[] = [], failures: { embed?: Error; search?: Error } = {}) {
  const embedder = new FakeEmbeddingProvider([0.1, 0.2], failures.embed);
  const search = new FakeSearchService(records, failures.search);
  const useCase = new SearchVideosUseCase(embedder, search, defaults);
  return { embedder, search, useCase };
}

test("execute rejects a blank query before embedding", async () => {
  const { embedder, useCase } = setup();

  await assert.rejects(useCase.execute({ query: "   " }), QueryValidationError);
  assert.equal(embedder.calls.length, 0);
});

test("execute embeds the trimmed query and passes defaults to the search service", async () => {
  const { embedder, search, useCase } = setup([candidate("v1", 0.9)]);

  const result = await useCase.execute({ query: "  tax policy " });

  assert.deepEqual(embedder.calls, ["tax policy"]);
  assert.deepEqual(search.calls, [
    { queryEmbedding: [0.1, 0.2], params: { minSimilarity: 0.4, maxCandidates: 100 } },
  ]);
  assert.equal(result.query, "tax policy");
  assert.equal(result.status, "ok");
});

test("execute forwards explicit search parameters", async () => {
  const { search, useCase } = setup([candidate("v1", 0.9)]);

  await useCase.execute({ query: "tax", minSimilarity: 0.65, maxCandidates: 20 });

  assert.deepEqual(search.calls[0].params, { minSimilarity: 0.65, maxCandidates: 20 });
});

test("execute validates search parameters", async () => {
  const { embedder, useCase } = setup();

  for (const maxCandidates of [0, 1.5, 1001]) {
    await assert.rejects(useCase.execute({ query: "tax", maxCandidates }), QueryValidationError);
  }
  await assert.rejects(useCase.execute({ query: "tax", minSimilarity: 2 }), QueryValidationError);
  await assert.rejects(
    useCase.execute({ query: "tax", category: { category: "Podcasts", subCategory: "Any" } }),
    QueryValidationError
  );
  assert.equal(embedder.calls.length, 0);
});

test("execute re-checks the threshold and groups what survives", async () => {
  const { useCase } = setup([
    candidate("v1", 0.8, { segmentStart: 5 }),
    candidate("v2", 0.75),
    candidate("v1", 0.3999999),
    candidate("v1", 0.9, { segmentStart: 40 }),
  ]);

  const result = await useCase.execute({ query: "tax" });

  assert.equal(result.status, "ok");
  if (result.status !== "ok") return;
  assert.equal(result.candidateCount, 4);
  assert.equal(result.totalSegments, 3);
  assert.equal(result.uniqueVideos, 2);
  assert.deepEqual(
    result.groups.map((g) => g.video.videoId),
    ["v1", "v2"]
  );
  assert.deepEqual(
    result.groups[0].segments.map((s) => s.segmentStart),
    [40, 5]
  );
});

test("execute drops malformed candidates and counts them", async () => {
  const { useCase } = setup([candidate("v1", "high"), candidate("v2", 0.6), { similarity: 0.9 }]);

  const result = await useCase.execute({ query: "tax" });

  assert.equal(result.status, "ok");
  assert.equal(result.rejectedCount, 2);
  if (result.status === "ok") {
    assert.deepEqual(
      result.groups.map((g) => g.video.videoId),
      ["v2"]
    );
  }
});

test("execute reports an empty outcome when nothing passes the threshold", async () => {
  const { useCase } = setup([candidate("v1", null)]);

  const result = await useCase.execute({ query: "tax" });

  assert.deepEqual(result, {
    query: "tax",
    minSimilarity: 0.4,
    maxCandidates: 100,
    candidateCount: 1,
    rejectedCount: 0,
    status: "empty",
  });
});

test("execute applies the category filter after the threshold", async () => {
  const { useCase } = setup([
    candidate("v1", 0.9, { title: "Xi Jinping speech" }),
    candidate("v2", 0.8, { title: "Weather report" }),
  ]);

  const result = await useCase.execute({
    query: "trade",
    category: { category: "Speeches of politicians", subCategory: "Xi Jinping" },
  });

  assert.equal(result.status, "ok");
  if (result.status === "ok") {
    assert.deepEqual(
      result.groups.map((g) => g.video.videoId),
      ["v1"]
    );
  }
});

test("execute propagates embedder failures without searching", async () => {
  const failure = new EncodingError("model unavailable");
  const { search, useCase } = setup([], { embed: failure });

  await assert.rejects(useCase.execute({ query: "tax" }), (error) => error === failure);
  assert.equal(search.calls.length, 0);
});

test("execute propagates search service failures unchanged", async () => {
  const failure = new SearchServiceError("connection refused");
  const { useCase } = setup([], { search: failure });

  await assert.rejects(useCase.execute({ query: "tax" }), (error) => error === failure);
});
