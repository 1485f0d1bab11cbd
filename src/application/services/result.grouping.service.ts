import { SegmentMatch, VideoMetadata } from "../../domain/entities/segment-match";
import { GroupedResultSet, VideoGroup } from "../../domain/entities/video-group";
import { QueryValidationError } from "../../domain/errors/search.errors";

export function assertSimilarityThreshold(minSimilarity: number): void {
  if (!Number.isFinite(minSimilarity) || minSimilarity < 0 || minSimilarity > 1) {
    throw new QueryValidationError(`minSimilarity must be a number between 0 and 1, got ${minSimilarity}`);
  }
}

/**
 * Re-check the threshold on rows that already passed the backend filter.
 * Values can come back marginally below the bound after the round trip
 * through storage, so this check is not redundant. Order is preserved and
 * rows without a similarity never pass.
 */
export function filterByThreshold(
  candidates: readonly SegmentMatch[],
  minSimilarity: number
): SegmentMatch[] {
  assertSimilarityThreshold(minSimilarity);
  return candidates.filter(
    (candidate) => candidate.similarity !== null && candidate.similarity >= minSimilarity
  );
}

const rank = (match: SegmentMatch): number => match.similarity ?? 0;

// Detached, read-only copy; the Date is cloned so the caller's instance stays theirs
function freezeVideo(video: VideoMetadata): VideoMetadata {
  const publishedAt = video.publishedAt ? new Date(video.publishedAt.getTime()) : null;
  return Object.freeze({ ...video, publishedAt });
}

/**
 * Partition matches by video and rank both levels.
 *
 * Groups keep the metadata of the first match seen for their video. Segments
 * are sorted by descending similarity, groups by the similarity of their best
 * segment; both sorts are stable, so ties keep retrieval order. The returned
 * structure is frozen throughout and shares no objects with the input.
 */
export function groupByVideo(accepted: readonly SegmentMatch[]): GroupedResultSet {
  const videos = new Map<VideoMetadata, VideoMetadata>();
  const copyVideo = (video: VideoMetadata): VideoMetadata => {
    let copy = videos.get(video);
    if (!copy) {
      copy = freezeVideo(video);
      videos.set(video, copy);
    }
    return copy;
  };

  const groups = new Map<string, { video: VideoMetadata; segments: SegmentMatch[] }>();

  for (const match of accepted) {
    const segment: SegmentMatch = Object.freeze({ ...match, video: copyVideo(match.video) });
    const group = groups.get(match.videoId);
    if (group) {
      group.segments.push(segment);
    } else {
      groups.set(match.videoId, { video: segment.video, segments: [segment] });
    }
  }

  const ordered: VideoGroup[] = Array.from(groups.values())
    .map((group) => {
      const segments = [...group.segments].sort((a, b) => rank(b) - rank(a));
      return Object.freeze({ video: group.video, segments: Object.freeze(segments) });
    })
    .sort((a, b) => rank(b.segments[0]) - rank(a.segments[0]));

  return Object.freeze(ordered);
}

// Inverse of groupByVideo: segments in group order, best segment first
export function flattenGroups(groups: GroupedResultSet): SegmentMatch[] {
  return groups.flatMap((group) => group.segments);
}

export function countSegments(groups: GroupedResultSet): number {
  return groups.reduce((total, group) => total + group.segments.length, 0);
}
