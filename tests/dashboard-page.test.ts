import assert from "node:assert/strict";
import test from "node:test";
import { DashboardForm, renderDashboardPage } from "../src/presentation/views/dashboard.page";
import { groupByVideo } from "../src/application/services/result.grouping.service";
import { SearchVideosMatched } from "../src/application/use-cases/search-videos.use-case";
import { makeMatch, makeVideo } from "./helpers/fixtures";

const form: DashboardForm = {
  query: "",
  minSimilarity: 0.4,
  maxCandidates: 100,
  category: "Speeches of politicians",
  subCategory: "Any",
};

function matched(groups: SearchVideosMatched["groups"]): SearchVideosMatched {
  const totalSegments = groups.reduce((n, g) => n + g.segments.length, 0);
  return {
    status: "ok",
    query: "trade",
    minSimilarity: 0.4,
    maxCandidates: 100,
    candidateCount: totalSegments,
    rejectedCount: 0,
    groups,
    totalSegments,
    uniqueVideos: groups.length,
  };
}

test("the initial page renders the form with defaults selected", () => {
  const html = renderDashboardPage(form);

  assert.ok(html.includes(`<input type="text" id="q" name="q" value="">`));
  assert.ok(html.includes(`<option value="Speeches of politicians" selected>Speeches of politicians</option>`));
  assert.ok(html.includes(`<option value="Donald Trump">Donald Trump</option>`));
  assert.ok(html.includes(`<output id="minSimilarityValue">0.40</output>`));
  assert.ok(!html.includes(`class="video-card"`));
});

test("results render numbered cards with metadata and an expander", () => {
  const groups = groupByVideo([
    makeMatch("v1", 0.9, 0, makeVideo("v1", { publishedAt: new Date("2023-05-01T12:00:00.000Z") })),
    makeMatch("v1", 0.8, 30),
    makeMatch("v2", 0.7, 0, makeVideo("v2", { transcriptionLanguage: null })),
  ]);

  const html = renderDashboardPage({ ...form, query: "trade" }, { kind: "results", result: matched(groups) });

  assert.ok(html.includes("<h3>1. Title v1</h3>"));
  assert.ok(html.includes("<h3>2. Title v2</h3>"));
  assert.ok(html.includes("<li>Published: 2023-05-01</li>"));
  assert.ok(html.includes("<li>Language: Unknown</li>"));
  assert.ok(html.includes("<summary>Show 1 more matching segment from this video</summary>"));
  assert.equal(html.split("<details>").length - 1, 1);
  assert.ok(
    html.includes(
      `<div class="notice success">Found 2 videos with 3 matching segments (similarity &ge; 40%).</div>`
    )
  );
});

test("empty and warning outcomes render notices", () => {
  const empty = renderDashboardPage(form, { kind: "empty", minSimilarity: 0.55 });
  const warning = renderDashboardPage(form, { kind: "warning", message: "query <required>" });

  assert.ok(empty.includes("No results found with the current settings (min similarity 0.55)."));
  assert.ok(warning.includes(`<div class="notice warning">query &lt;required&gt;</div>`));
});
