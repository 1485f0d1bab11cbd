import { SegmentMatch, VideoMetadata } from "../../domain/entities/segment-match";
import { DataIntegrityError } from "../../domain/errors/search.errors";
import { CandidateRecord } from "../../domain/interfaces/isimilarity.search";

export interface ParsedCandidates {
  matches: SegmentMatch[];
  rejected: DataIntegrityError[];
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function optionalNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function optionalDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "string" || typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function parseCandidate(record: CandidateRecord, index: number): SegmentMatch {
  const { videoId, similarity, segmentStart, segmentEnd, segmentText } = record;

  if (typeof videoId !== "string" || videoId.trim().length === 0) {
    throw new DataIntegrityError(`Candidate ${index} has no videoId`, index, "videoId");
  }

  // Cosine similarity lives in [-1, 1]; anything else is a backend defect
  let parsedSimilarity: number | null = null;
  if (similarity !== null && similarity !== undefined) {
    if (typeof similarity !== "number" || !Number.isFinite(similarity) || similarity < -1 || similarity > 1) {
      throw new DataIntegrityError(
        `Candidate ${index} (${videoId}) has malformed similarity: ${String(similarity)}`,
        index,
        "similarity"
      );
    }
    parsedSimilarity = similarity;
  }

  const offsets: Record<string, number> = {};
  for (const [field, value] of Object.entries({ segmentStart, segmentEnd })) {
    if (value === null || value === undefined) {
      offsets[field] = 0;
    } else if (typeof value === "number" && Number.isFinite(value)) {
      offsets[field] = value;
    } else {
      throw new DataIntegrityError(
        `Candidate ${index} (${videoId}) has non-numeric ${field}: ${String(value)}`,
        index,
        field
      );
    }
  }

  let text = "";
  if (typeof segmentText === "string") {
    text = segmentText;
  } else if (segmentText !== null && segmentText !== undefined) {
    throw new DataIntegrityError(`Candidate ${index} (${videoId}) has non-text segmentText`, index, "segmentText");
  }

  const video: VideoMetadata = {
    videoId,
    title: optionalString(record.title),
    description: optionalString(record.description),
    publishedAt: optionalDate(record.publishedAt),
    duration: optionalNumber(record.duration),
    viewCount: optionalNumber(record.viewCount),
    likeCount: optionalNumber(record.likeCount),
    commentCount: optionalNumber(record.commentCount),
    favoriteCount: optionalNumber(record.favoriteCount),
    transcriptionLanguage: optionalString(record.transcriptionLanguage),
  };

  return {
    videoId,
    segmentStart: offsets.segmentStart,
    segmentEnd: offsets.segmentEnd,
    segmentText: text,
    similarity: parsedSimilarity,
    video,
  };
}

/**
 * Validate raw search rows into SegmentMatch records.
 * Rows that break the contract are collected in `rejected` and left out;
 * a null similarity is kept here and dropped later by the threshold check.
 */
export function parseCandidates(records: readonly CandidateRecord[]): ParsedCandidates {
  const matches: SegmentMatch[] = [];
  const rejected: DataIntegrityError[] = [];

  records.forEach((record, index) => {
    try {
      matches.push(parseCandidate(record, index));
    } catch (error) {
      if (error instanceof DataIntegrityError) {
        rejected.push(error);
        return;
      }
      throw error;
    }
  });

  return { matches, rejected };
}
