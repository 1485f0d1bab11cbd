import assert from "node:assert/strict";
import test from "node:test";
import { filterByCategory } from "../src/application/services/category.filter";
import { QueryValidationError } from "../src/domain/errors/search.errors";
import { makeMatch, makeVideo } from "./helpers/fixtures";

const matches = [
  makeMatch("v1", 0.9, 0, makeVideo("v1", { title: "Donald Trump rally in Ohio" })),
  makeMatch("v2", 0.8, 0, makeVideo("v2", { title: "Evening news", description: "Remarks by DONALD TRUMP" })),
  makeMatch("v3", 0.7, 0, makeVideo("v3", { title: "Xi Jinping state visit", description: null })),
];

test("filterByCategory keeps everything for the Any sub-category", () => {
  const kept = filterByCategory(matches, { category: "News clips", subCategory: "Any" });

  assert.deepEqual(kept, matches);
  assert.notEqual(kept, matches);
});

test("filterByCategory matches the sub-category in title or description", () => {
  const kept = filterByCategory(matches, { category: "Speeches of politicians", subCategory: "Donald Trump" });

  assert.deepEqual(
    kept.map((m) => m.videoId),
    ["v1", "v2"]
  );
});

test("filterByCategory rejects unknown selections", () => {
  assert.throws(
    () => filterByCategory(matches, { category: "Podcasts", subCategory: "Any" }),
    QueryValidationError
  );
  assert.throws(
    () => filterByCategory(matches, { category: "Movies", subCategory: "Xi Jinping" }),
    QueryValidationError
  );
  assert.throws(
    () => filterByCategory(matches, { category: "toString", subCategory: "Any" }),
    QueryValidationError
  );
});
