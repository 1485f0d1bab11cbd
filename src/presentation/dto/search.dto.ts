import { SegmentMatch } from "../../domain/entities/segment-match";
import { VideoGroup } from "../../domain/entities/video-group";
import { QueryValidationError } from "../../domain/errors/search.errors";
import { ANY_SUB_CATEGORY, DEFAULT_CATEGORY } from "../../domain/constants/categories";
import { SearchVideosParams, SearchVideosResult } from "../../application/use-cases/search-videos.use-case";

export interface SearchRequest {
  query: string;
  minSimilarity?: number;
  maxCandidates?: number; // Rows fetched before grouping (default: 100)
  category?: string; // Defaults to "Speeches of politicians" when only subCategory is given
  subCategory?: string; // Defaults to "Any" when category is given
}

export interface SegmentResponse {
  start: number;
  end: number;
  text: string;
  similarity: number | null;
}

export interface VideoGroupResponse {
  videoId: string;
  title: string | null;
  description: string | null;
  publishedAt: string | null;
  duration: number | null;
  viewCount: number | null;
  likeCount: number | null;
  commentCount: number | null;
  favoriteCount: number | null;
  transcriptionLanguage: string | null;
  segments: SegmentResponse[];
}

export interface SearchResponse {
  query: string;
  minSimilarity: number;
  status: "ok" | "empty";
  uniqueVideos: number;
  totalSegments: number;
  rejectedCount: number;
  groups: VideoGroupResponse[];
}

// Accepts numbers and numeric strings (query-string input); absent -> undefined
export function readNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new QueryValidationError(`${field} must be a number`);
  }
  return parsed;
}

export function readString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toSearchParams(fields: unknown): SearchVideosParams {
  if (!isRecord(fields)) {
    throw new QueryValidationError("request body must be a JSON object");
  }

  const query = readString(fields.query);
  if (!query || query.trim().length === 0) {
    throw new QueryValidationError("query is required and must be a non-empty string");
  }

  const category = readString(fields.category) || undefined;
  const subCategory = readString(fields.subCategory) || undefined;
  return {
    query,
    minSimilarity: readNumber(fields.minSimilarity, "minSimilarity"),
    maxCandidates: readNumber(fields.maxCandidates, "maxCandidates"),
    category:
      category || subCategory
        ? { category: category ?? DEFAULT_CATEGORY, subCategory: subCategory ?? ANY_SUB_CATEGORY }
        : undefined,
  };
}

function toSegmentResponse(segment: SegmentMatch): SegmentResponse {
  return {
    start: segment.segmentStart,
    end: segment.segmentEnd,
    text: segment.segmentText,
    similarity: segment.similarity,
  };
}

export function toVideoGroupResponse(group: VideoGroup): VideoGroupResponse {
  const { video } = group;
  return {
    videoId: video.videoId,
    title: video.title,
    description: video.description,
    publishedAt: video.publishedAt ? video.publishedAt.toISOString() : null,
    duration: video.duration,
    viewCount: video.viewCount,
    likeCount: video.likeCount,
    commentCount: video.commentCount,
    favoriteCount: video.favoriteCount,
    transcriptionLanguage: video.transcriptionLanguage,
    segments: group.segments.map(toSegmentResponse),
  };
}

export function toSearchResponse(result: SearchVideosResult): SearchResponse {
  if (result.status === "empty") {
    return {
      query: result.query,
      minSimilarity: result.minSimilarity,
      status: "empty",
      uniqueVideos: 0,
      totalSegments: 0,
      rejectedCount: result.rejectedCount,
      groups: [],
    };
  }
  return {
    query: result.query,
    minSimilarity: result.minSimilarity,
    status: "ok",
    uniqueVideos: result.uniqueVideos,
    totalSegments: result.totalSegments,
    rejectedCount: result.rejectedCount,
    groups: result.groups.map(toVideoGroupResponse),
  };
}
