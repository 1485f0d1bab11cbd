/**
 * Display helpers shared by the results page and the dashboard.
 * All of them are pure and accept the nullable values found in VideoMetadata.
 */

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Format seconds as M:SS, or H:MM:SS from one hour up.
 * Missing, negative or non-finite input renders as "0:00".
 */
export function formatDuration(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds) || seconds < 0) {
    return "0:00";
  }

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}:${pad2(minutes)}:${pad2(secs)}`;
  }
  return `${minutes}:${pad2(secs)}`;
}

/**
 * Abbreviate large counts: 1500 -> "1.5K", 2300000 -> "2.3M".
 */
export function formatCount(value: number | null | undefined): string {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return "0";
  }
  if (value >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(1)}M`;
  }
  if (value >= 1_000) {
    return `${(value / 1_000).toFixed(1)}K`;
  }
  return String(value);
}

export function formatSimilarity(similarity: number | null): string {
  return `${((similarity ?? 0) * 100).toFixed(1)}%`;
}

// Offsets are untrusted: negative starts and ends before the start are clamped
export function formatTimeRange(start: number, end: number): string {
  const safeStart = Number.isFinite(start) ? Math.max(0, start) : 0;
  const safeEnd = Number.isFinite(end) ? Math.max(safeStart, end) : safeStart;
  return `${formatDuration(safeStart)} - ${formatDuration(safeEnd)}`;
}

// Whole seconds for player and deep-link URLs
export function toStartSeconds(start: number): number {
  return Number.isFinite(start) ? Math.max(0, Math.floor(start)) : 0;
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
