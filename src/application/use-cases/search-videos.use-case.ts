import { IEmbeddingProvider } from "../../domain/interfaces/iembedding.provider";
import { ISimilaritySearchService } from "../../domain/interfaces/isimilarity.search";
import { GroupedResultSet } from "../../domain/entities/video-group";
import { QueryValidationError } from "../../domain/errors/search.errors";
import { parseCandidates } from "../services/candidate.parser";
import {
  assertSimilarityThreshold,
  countSegments,
  filterByThreshold,
  groupByVideo,
} from "../services/result.grouping.service";
import { assertCategorySelection, CategorySelection, filterByCategory } from "../services/category.filter";

export const MAX_CANDIDATES_LIMIT = 1000;

export interface SearchDefaults {
  minSimilarity: number;
  maxCandidates: number;
}

export interface SearchVideosParams {
  query: string;
  minSimilarity?: number;
  maxCandidates?: number;
  category?: CategorySelection;
}

interface SearchOutcomeBase {
  query: string;
  minSimilarity: number;
  maxCandidates: number;
  candidateCount: number; // rows returned by the search backend
  rejectedCount: number; // rows dropped for malformed data
}

export interface SearchVideosMatched extends SearchOutcomeBase {
  status: "ok";
  groups: GroupedResultSet;
  totalSegments: number;
  uniqueVideos: number;
}

// Nothing passed the threshold: a normal outcome, not a failure
export interface SearchVideosEmpty extends SearchOutcomeBase {
  status: "empty";
}

export type SearchVideosResult = SearchVideosMatched | SearchVideosEmpty;

export class SearchVideosUseCase {
  constructor(
    private embeddingProvider: IEmbeddingProvider,
    private searchService: ISimilaritySearchService,
    private defaults: SearchDefaults
  ) {}

  /**
   * Embed the query, fetch ranked candidates, re-check the threshold and
   * group the survivors by video. Embedder and search failures propagate
   * unchanged; nothing is retried.
   */
  async execute(params: SearchVideosParams): Promise<SearchVideosResult> {
    const query = typeof params.query === "string" ? params.query.trim() : "";
    if (!query) {
      throw new QueryValidationError("query is required and must be a non-empty string");
    }

    const minSimilarity = params.minSimilarity ?? this.defaults.minSimilarity;
    const maxCandidates = params.maxCandidates ?? this.defaults.maxCandidates;
    assertSimilarityThreshold(minSimilarity);
    if (!Number.isInteger(maxCandidates) || maxCandidates < 1 || maxCandidates > MAX_CANDIDATES_LIMIT) {
      throw new QueryValidationError(
        `maxCandidates must be an integer between 1 and ${MAX_CANDIDATES_LIMIT}, got ${maxCandidates}`
      );
    }
    if (params.category) {
      assertCategorySelection(params.category);
    }

    console.log(`[SearchVideos] Searching for "${query}" (min similarity ${minSimilarity}, max ${maxCandidates})`);

    const queryEmbedding = await this.embeddingProvider.embedQuery(query);
    const candidates = await this.searchService.search(queryEmbedding, { minSimilarity, maxCandidates });

    const { matches, rejected } = parseCandidates(candidates);
    if (rejected.length > 0) {
      console.warn(
        `[SearchVideos] Dropped ${rejected.length} malformed candidate(s): ` +
          rejected.slice(0, 3).map((e) => e.message).join("; ")
      );
    }

    let accepted = filterByThreshold(matches, minSimilarity);
    if (accepted.length < matches.length) {
      console.log(`[SearchVideos] ${matches.length - accepted.length} candidate(s) below threshold after re-check`);
    }
    if (params.category) {
      accepted = filterByCategory(accepted, params.category);
    }

    const base: SearchOutcomeBase = {
      query,
      minSimilarity,
      maxCandidates,
      candidateCount: candidates.length,
      rejectedCount: rejected.length,
    };

    if (accepted.length === 0) {
      console.log(`[SearchVideos] No segments with similarity >= ${minSimilarity}`);
      return { ...base, status: "empty" };
    }

    const groups = groupByVideo(accepted);
    console.log(`[SearchVideos] Found ${groups.length} unique videos with ${accepted.length} segments`);

    return {
      ...base,
      status: "ok",
      groups,
      totalSegments: countSegments(groups),
      uniqueVideos: groups.length,
    };
  }
}
