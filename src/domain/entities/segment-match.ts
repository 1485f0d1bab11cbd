export interface VideoMetadata {
  readonly videoId: string;
  readonly title: string | null;
  readonly description: string | null;
  readonly publishedAt: Date | null;
  readonly duration: number | null; // seconds
  readonly viewCount: number | null;
  readonly likeCount: number | null;
  readonly commentCount: number | null;
  readonly favoriteCount: number | null;
  readonly transcriptionLanguage: string | null;
}

export interface SegmentMatch {
  readonly videoId: string;
  readonly segmentStart: number; // seconds into the video
  readonly segmentEnd: number;
  readonly segmentText: string;
  readonly similarity: number | null;
  readonly video: VideoMetadata;
}
