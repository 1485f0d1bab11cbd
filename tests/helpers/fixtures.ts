import { SegmentMatch, VideoMetadata } from "../../src/domain/entities/segment-match";
import { IEmbeddingProvider } from "../../src/domain/interfaces/iembedding.provider";
import {
  CandidateRecord,
  ISimilaritySearchService,
  SimilaritySearchParams,
} from "../../src/domain/interfaces/isimilarity.search";

export function makeVideo(videoId: string, overrides: Partial<VideoMetadata> = {}): VideoMetadata {
  return {
    videoId,
    title: `Title ${videoId}`,
    description: null,
    publishedAt: null,
    duration: 600,
    viewCount: 1500,
    likeCount: 20,
    commentCount: 3,
    favoriteCount: 0,
    transcriptionLanguage: "en",
    ...overrides,
  };
}

// segmentStart doubles as a retrieval-order marker in ordering tests
export function makeMatch(
  videoId: string,
  similarity: number | null,
  segmentStart = 0,
  video: VideoMetadata = makeVideo(videoId)
): SegmentMatch {
  return {
    videoId,
    segmentStart,
    segmentEnd: segmentStart + 5,
    segmentText: `segment ${videoId}@${segmentStart}`,
    similarity,
    video,
  };
}

export class FakeEmbeddingProvider implements IEmbeddingProvider {
  calls: string[] = [];

  constructor(private vector: number[] = [1, 0], private failure?: Error) {}

  async embedQuery(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failure) throw this.failure;
    return this.vector;
  }
}

export class FakeSearchService implements ISimilaritySearchService {
  calls: Array<{ queryEmbedding: number[]; params: SimilaritySearchParams }> = [];

  constructor(private records: CandidateRecord[] = [], private failure?: Error) {}

  async search(queryEmbedding: number[], params: SimilaritySearchParams): Promise<CandidateRecord[]> {
    this.calls.push({ queryEmbedding, params });
    if (this.failure) throw this.failure;
    return this.records;
  }
}

export function candidate(videoId: string, similarity: unknown, fields: CandidateRecord = {}): CandidateRecord {
  return {
    videoId,
    title: `Title ${videoId}`,
    segmentStart: 10,
    segmentEnd: 20,
    segmentText: `text ${videoId}`,
    similarity,
    ...fields,
  };
}
