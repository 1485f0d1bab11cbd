import { SegmentMatch } from "../../domain/entities/segment-match";
import { GroupedResultSet, VideoGroup } from "../../domain/entities/video-group";
import {
  formatCount,
  formatSimilarity,
  formatTimeRange,
  pluralize,
  toStartSeconds,
} from "../../domain/utils/format";
import { countSegments } from "../../application/services/result.grouping.service";
import {
  embedUrl,
  escapeHtml,
  formatThresholdPercent,
  formatTimestamp,
  watchUrl,
} from "./html";

export interface ResultsPageModel {
  query: string;
  minSimilarity: number;
  groups: GroupedResultSet;
  generatedAt: Date;
}

const STYLES = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
    min-height: 100vh;
    padding: 20px;
  }
  .container { max-width: 1400px; margin: 0 auto; }
  .header, .card { background: white; border-radius: 12px; box-shadow: 0 4px 6px rgba(0, 0, 0, 0.1); }
  .header { padding: 30px; margin-bottom: 30px; }
  .header h1 { color: #333; font-size: 28px; margin-bottom: 10px; }
  .query { color: #667eea; font-size: 18px; font-weight: 600; }
  .results-count { color: #666; font-size: 14px; margin-top: 10px; }
  .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(400px, 1fr)); gap: 25px; margin-bottom: 30px; }
  .card { overflow: hidden; }
  .video-container { position: relative; width: 100%; padding-bottom: 56.25%; background: #000; }
  .video-container iframe { position: absolute; top: 0; left: 0; width: 100%; height: 100%; border: none; }
  .card-content { padding: 20px; }
  .card-title { font-size: 18px; font-weight: 600; margin-bottom: 12px; }
  .card-title a { color: #667eea; text-decoration: none; }
  .segment-text { color: #666; font-size: 14px; line-height: 1.6; margin-bottom: 15px; }
  .segment-info, .stats, .segment-header { display: flex; flex-wrap: wrap; gap: 10px; margin-bottom: 10px; }
  .time-badge, .similarity-badge { padding: 4px 10px; border-radius: 12px; font-size: 12px; font-weight: 600; }
  .time-badge { background: #f0f0f0; color: #555; }
  .similarity-badge { background: #e6f4ff; color: #0056b3; }
  .stat-item { color: #888; font-size: 13px; }
  .youtube-link, .segment-link, .expand-button {
    display: inline-block; padding: 8px 16px; background: #667eea; color: white;
    border: none; border-radius: 6px; font-weight: 600; font-size: 13px; text-decoration: none; cursor: pointer;
  }
  .expand-button { margin-top: 15px; margin-left: 8px; }
  .expand-button .icon { display: inline-block; transition: transform 0.3s ease; }
  .expand-button.expanded .icon { transform: rotate(180deg); }
  .segments-list { display: none; margin-top: 20px; padding-top: 20px; border-top: 2px solid #f0f0f0; }
  .segments-list.expanded { display: block; }
  .segment-item { background: #f8f9fa; border-radius: 8px; padding: 15px; margin-bottom: 15px; border-left: 4px solid #667eea; }
  .segment-text-small { color: #666; font-size: 13px; line-height: 1.5; margin-bottom: 10px; }
  .footer { text-align: center; color: white; font-size: 13px; padding: 20px; }
`;

const TOGGLE_SCRIPT = `
  function toggleSegments(segmentId) {
    const segmentsList = document.getElementById(segmentId);
    const button = segmentsList.previousElementSibling;
    if (segmentsList.classList.contains('expanded')) {
      segmentsList.classList.remove('expanded');
      button.classList.remove('expanded');
      const count = segmentsList.children.length;
      button.innerHTML = '<span class="icon">&#9660;</span> <span>Show ' + count + ' more segment' + (count === 1 ? '' : 's') + '</span>';
    } else {
      segmentsList.classList.add('expanded');
      button.classList.add('expanded');
      button.innerHTML = '<span class="icon">&#9660;</span> <span>Hide segments</span>';
    }
  }
`;

function renderTimingBadges(segment: SegmentMatch): string {
  return (
    `<span class="time-badge">${formatTimeRange(segment.segmentStart, segment.segmentEnd)}</span>` +
    `<span class="similarity-badge">${formatSimilarity(segment.similarity)} match</span>`
  );
}

function renderAdditionalSegment(videoId: string, segment: SegmentMatch): string {
  const link = escapeHtml(watchUrl(videoId, toStartSeconds(segment.segmentStart)));
  return `
          <div class="segment-item">
            <div class="segment-header">${renderTimingBadges(segment)}</div>
            <div class="segment-text-small">${escapeHtml(segment.segmentText)}</div>
            <a href="${link}" target="_blank" class="segment-link">Watch this segment</a>
          </div>`;
}

export function renderVideoCard(group: VideoGroup, position: number): string {
  const { video, segments } = group;
  const [best, ...rest] = segments;
  const start = toStartSeconds(best.segmentStart);
  const link = escapeHtml(watchUrl(video.videoId, start));

  let expandable = "";
  if (rest.length > 0) {
    expandable = `
        <button class="expand-button" onclick="toggleSegments('segments-${position}')">
          <span class="icon">&#9660;</span> <span>Show ${pluralize(rest.length, "more segment")}</span>
        </button>
        <div id="segments-${position}" class="segments-list">${rest
          .map((segment) => renderAdditionalSegment(video.videoId, segment))
          .join("")}
        </div>`;
  }

  return `
    <div class="card">
      <div class="video-container">
        <iframe id="ytplayer-${position}" src="${escapeHtml(embedUrl(video.videoId, start))}"
          referrerpolicy="strict-origin-when-cross-origin"
          allow="accelerometer; autoplay; clipboard-write; encrypted-media; gyroscope; picture-in-picture"
          allowfullscreen></iframe>
      </div>
      <div class="card-content">
        <div class="card-title"><a href="${link}" target="_blank">${escapeHtml(video.title || "Untitled Video")}</a></div>
        <div class="segment-text">${escapeHtml(best.segmentText)}</div>
        <div class="segment-info">${renderTimingBadges(best)}</div>
        <div class="stats">
          <span class="stat-item">${formatCount(video.viewCount)} views</span>
          <span class="stat-item">${formatCount(video.likeCount)} likes</span>
        </div>
        <a href="${link}" target="_blank" class="youtube-link">Watch on YouTube</a>${expandable}
      </div>
    </div>`;
}

/**
 * Standalone HTML document for one query: one card per video, best segment
 * in the player, the rest behind an expand button.
 */
export function renderResultsPage(model: ResultsPageModel): string {
  const { query, minSimilarity, groups, generatedAt } = model;
  const totalSegments = countSegments(groups);
  const summary =
    `Found ${pluralize(groups.length, "unique video")} ` +
    `(${pluralize(totalSegments, "segment")} total, similarity &ge; ${formatThresholdPercent(minSimilarity)})`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <meta name="referrer" content="strict-origin-when-cross-origin">
  <title>Video Search Results: "${escapeHtml(query)}"</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>Video Search Results</h1>
      <div class="query">Query: "${escapeHtml(query)}"</div>
      <div class="results-count">${summary}</div>
    </div>
    <div class="grid">${groups.map((group, index) => renderVideoCard(group, index + 1)).join("")}
    </div>
    <div class="footer">Generated on ${formatTimestamp(generatedAt)}</div>
  </div>
  <script>${TOGGLE_SCRIPT}</script>
</body>
</html>
`;
}
