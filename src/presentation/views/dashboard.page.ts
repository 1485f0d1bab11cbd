import { VideoGroup } from "../../domain/entities/video-group";
import { CATEGORY_OPTIONS } from "../../domain/constants/categories";
import {
  formatCount,
  formatSimilarity,
  formatTimeRange,
  pluralize,
  toStartSeconds,
} from "../../domain/utils/format";
import { SearchVideosMatched } from "../../application/use-cases/search-videos.use-case";
import { embedUrl, escapeHtml, formatThresholdPercent, watchUrl } from "./html";

export const SIMILARITY_SLIDER = { min: 0.3, max: 0.9, step: 0.05 } as const;
export const MAX_RESULTS_SLIDER = { min: 20, max: 300, step: 20 } as const;

export interface DashboardForm {
  query: string;
  minSimilarity: number;
  maxCandidates: number;
  category: string;
  subCategory: string;
}

export type DashboardOutcome =
  | { kind: "results"; result: SearchVideosMatched }
  | { kind: "empty"; minSimilarity: number }
  | { kind: "warning"; message: string }
  | { kind: "error"; message: string };

const STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; color: #222; }
  form { display: flex; }
  aside { width: 260px; min-height: 100vh; background: #f5f6fa; padding: 24px; box-sizing: border-box; }
  main { flex: 1; padding: 24px 40px; max-width: 1200px; }
  .main-title { text-align: center; font-size: 3rem; font-weight: 800; margin-bottom: 0.3rem; }
  .subtitle { text-align: center; font-size: 1.1rem; color: #555; margin-bottom: 2rem; }
  label { display: block; font-weight: 600; margin: 12px 0 4px; }
  input[type=text], select { width: 100%; padding: 8px; box-sizing: border-box; }
  .sliders { display: flex; gap: 32px; }
  .sliders > div { flex: 1; }
  button { margin-top: 16px; padding: 8px 20px; font-weight: 600; cursor: pointer; }
  .notice { padding: 12px 16px; border-radius: 8px; margin: 16px 0; }
  .notice.success { background: #e8f7ee; }
  .notice.info { background: #e6f4ff; }
  .notice.warning { background: #fff6e0; }
  .notice.error { background: #fdecea; }
  .video-card { padding: 1.5rem; border-radius: 1rem; border: 1px solid #e5e5e5; box-shadow: 0 4px 12px rgba(0,0,0,0.03); margin-bottom: 2rem; }
  .video-row { display: flex; gap: 24px; }
  .video-row .player { flex: 2; position: relative; padding-bottom: 30%; }
  .video-row .player iframe { position: absolute; width: 100%; height: 100%; border: none; }
  .video-row .info { flex: 3; }
  .similarity-badge { display: inline-block; padding: 0.2rem 0.7rem; border-radius: 999px; background: #e6f4ff; color: #0056b3; font-size: 0.85rem; font-weight: 600; margin-bottom: 0.4rem; }
  details { margin-top: 1rem; }
  .extra-segment { border-top: 1px solid #eee; padding: 8px 0; }
`;

function renderOptions(values: readonly string[], selected: string): string {
  return values
    .map((value) => {
      const attr = value === selected ? " selected" : "";
      return `<option value="${escapeHtml(value)}"${attr}>${escapeHtml(value)}</option>`;
    })
    .join("");
}

// Keeps the sub-category select in step with the chosen category
function renderCategoryScript(): string {
  const options = JSON.stringify(CATEGORY_OPTIONS).replace(/</g, "\\u003c");
  return `
  <script>
    const CATEGORY_OPTIONS = ${options};
    document.getElementById('category').addEventListener('change', function (event) {
      const sub = document.getElementById('subCategory');
      sub.innerHTML = '';
      (CATEGORY_OPTIONS[event.target.value] || ['Any']).forEach(function (name) {
        const option = document.createElement('option');
        option.value = name;
        option.textContent = name;
        sub.appendChild(option);
      });
    });
  </script>`;
}

function renderForm(form: DashboardForm): string {
  const subCategories = Object.hasOwn(CATEGORY_OPTIONS, form.category)
    ? CATEGORY_OPTIONS[form.category]
    : ["Any"];

  return `
  <form method="get" action="/">
    <aside>
      <h2>Categories</h2>
      <label for="category">Main category</label>
      <select id="category" name="category">${renderOptions(Object.keys(CATEGORY_OPTIONS), form.category)}</select>
      <label for="subCategory">Sub category</label>
      <select id="subCategory" name="subCategory">${renderOptions(subCategories, form.subCategory)}</select>
    </aside>
    <main>
      <div class="main-title">Speech Explorer</div>
      <div class="subtitle">Semantic search in political speeches, news and more. Type a phrase and jump straight to the moment it appears.</div>
      <label for="q">Search phrase or word (e.g. 'China')</label>
      <input type="text" id="q" name="q" value="${escapeHtml(form.query)}">
      <div class="sliders">
        <div>
          <label for="minSimilarity">Minimum similarity (match quality): <output id="minSimilarityValue">${form.minSimilarity.toFixed(2)}</output></label>
          <input type="range" id="minSimilarity" name="minSimilarity" min="${SIMILARITY_SLIDER.min}" max="${SIMILARITY_SLIDER.max}" step="${SIMILARITY_SLIDER.step}" value="${form.minSimilarity}"
            oninput="document.getElementById('minSimilarityValue').value = Number(this.value).toFixed(2)">
        </div>
        <div>
          <label for="maxCandidates">Maximum number of segments: <output id="maxCandidatesValue">${form.maxCandidates}</output></label>
          <input type="range" id="maxCandidates" name="maxCandidates" min="${MAX_RESULTS_SLIDER.min}" max="${MAX_RESULTS_SLIDER.max}" step="${MAX_RESULTS_SLIDER.step}" value="${form.maxCandidates}"
            oninput="document.getElementById('maxCandidatesValue').value = this.value">
        </div>
      </div>
      <button type="submit">Search</button>`;
}

function renderDashboardCard(group: VideoGroup, position: number): string {
  const { video, segments } = group;
  const [best, ...rest] = segments;
  const start = toStartSeconds(best.segmentStart);
  const link = escapeHtml(watchUrl(video.videoId, start));
  const published = video.publishedAt
    ? `<li>Published: ${video.publishedAt.toISOString().slice(0, 10)}</li>`
    : "";

  let expander = "";
  if (rest.length > 0) {
    const items = rest
      .map((segment) => {
        const segmentLink = escapeHtml(watchUrl(video.videoId, toStartSeconds(segment.segmentStart)));
        return `
        <div class="extra-segment">
          <p><strong>Similarity:</strong> ${formatSimilarity(segment.similarity)}<br>
          <strong>Time:</strong> ${formatTimeRange(segment.segmentStart, segment.segmentEnd)}</p>
          <p>${escapeHtml(segment.segmentText || "(no text)")}</p>
          <a href="${segmentLink}" target="_blank">Open this moment on YouTube</a>
        </div>`;
      })
      .join("");
    expander = `
      <details>
        <summary>Show ${pluralize(rest.length, "more matching segment")} from this video</summary>${items}
      </details>`;
  }

  return `
    <div class="video-card">
      <h3>${position}. ${escapeHtml(video.title || "Untitled video")}</h3>
      <div class="video-row">
        <div class="player"><iframe src="${escapeHtml(embedUrl(video.videoId, start))}" allowfullscreen></iframe></div>
        <div class="info">
          <p><strong>Best matching segment:</strong></p>
          <p>${escapeHtml(best.segmentText || "(no text)")}</p>
          <span class="similarity-badge">${formatSimilarity(best.similarity)} match</span>
          <ul>
            <li>Timeframe: ${formatTimeRange(best.segmentStart, best.segmentEnd)}</li>
            <li>Language: ${escapeHtml(video.transcriptionLanguage || "Unknown")}</li>
            <li>Views: ${formatCount(video.viewCount)}</li>
            <li>Likes: ${formatCount(video.likeCount)}</li>${published}
          </ul>
          <a href="${link}" target="_blank">Watch on YouTube</a>
        </div>
      </div>${expander}
    </div>`;
}

function renderOutcome(form: DashboardForm, outcome: DashboardOutcome): string {
  switch (outcome.kind) {
    case "warning":
      return `<div class="notice warning">${escapeHtml(outcome.message)}</div>`;
    case "error":
      return `<div class="notice error">Search failed: ${escapeHtml(outcome.message)}</div>`;
    case "empty":
      return (
        `<div class="notice info">No results found with the current settings ` +
        `(min similarity ${outcome.minSimilarity.toFixed(2)}). Try lowering the threshold or changing the query.</div>`
      );
    case "results": {
      const { result } = outcome;
      return `
      <p><strong>Searching for:</strong> <code>${escapeHtml(result.query)}</code><br>
      <strong>Category:</strong> ${escapeHtml(form.category)} &rarr; ${escapeHtml(form.subCategory)}</p>
      <div class="notice success">Found ${pluralize(result.uniqueVideos, "video")} with ${pluralize(result.totalSegments, "matching segment")} (similarity &ge; ${formatThresholdPercent(result.minSimilarity)}).</div>
      ${result.groups.map((group, index) => renderDashboardCard(group, index + 1)).join("")}`;
    }
  }
}

/**
 * Interactive search page. The form submits back to itself; when an outcome
 * is given it is rendered below the controls.
 */
export function renderDashboardPage(form: DashboardForm, outcome?: DashboardOutcome): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Semantic Video Search</title>
  <style>${STYLES}</style>
</head>
<body>${renderForm(form)}
      ${outcome ? renderOutcome(form, outcome) : ""}
    </main>
  </form>${renderCategoryScript()}
</body>
</html>
`;
}
