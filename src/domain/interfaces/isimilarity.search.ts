export interface SimilaritySearchParams {
  minSimilarity: number;
  // Rows fetched before grouping; set above the desired post-filter count
  maxCandidates: number;
}

/**
 * A row as returned by a search backend, before it is validated into a
 * SegmentMatch. Field names follow the SegmentMatch/VideoMetadata shape.
 */
export type CandidateRecord = Record<string, unknown>;

export interface ISimilaritySearchService {
  /**
   * Records with similarity >= minSimilarity, ordered by descending
   * similarity and truncated to maxCandidates.
   * Rejects with SearchServiceError when the backend fails.
   */
  search(queryEmbedding: number[], params: SimilaritySearchParams): Promise<CandidateRecord[]>;
}
