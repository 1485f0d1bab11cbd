const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function watchUrl(videoId: string, startSeconds: number): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}&t=${startSeconds}s`;
}

export function embedUrl(videoId: string, startSeconds: number): string {
  return `https://www.youtube.com/embed/${encodeURIComponent(videoId)}?start=${startSeconds}`;
}

const pad = (value: number): string => value.toString().padStart(2, "0");

// "2024-01-02 03:04:05" in local time
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// "20240102_030405" in local time, for result file names
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function formatThresholdPercent(minSimilarity: number): string {
  return `${(minSimilarity * 100).toFixed(0)}%`;
}
