import { SegmentMatch, VideoMetadata } from "./segment-match";

export interface VideoGroup {
  readonly video: VideoMetadata;
  // Ordered by descending similarity, best segment first
  readonly segments: readonly SegmentMatch[];
}

// Ordered by the similarity of each group's best segment
export type GroupedResultSet = readonly VideoGroup[];
