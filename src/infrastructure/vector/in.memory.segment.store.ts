import { readFile } from "fs/promises";
import {
  CandidateRecord,
  ISimilaritySearchService,
  SimilaritySearchParams,
} from "../../domain/interfaces/isimilarity.search";
import { SearchServiceError } from "../../domain/errors/search.errors";
import { rankSegmentDocuments, SegmentDocument } from "./segment.scoring";

function isRecord(value: unknown): value is SegmentDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class InMemorySegmentStore implements ISimilaritySearchService {
  private records: SegmentDocument[];

  constructor(records: SegmentDocument[] = []) {
    this.records = [...records];
  }

  /**
   * Load segment documents from a JSON array on disk.
   */
  static async fromFile(filePath: string): Promise<InMemorySegmentStore> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(filePath, "utf-8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SearchServiceError(`Could not load segments from ${filePath}: ${reason}`, { cause: error });
    }
    if (!Array.isArray(parsed)) {
      throw new SearchServiceError(`Segments file ${filePath} must contain a JSON array`);
    }

    const records = parsed.filter(isRecord);
    console.log(`[InMemorySegmentStore] Loaded ${records.length} segments from ${filePath}`);
    return new InMemorySegmentStore(records);
  }

  add(...records: SegmentDocument[]): void {
    this.records.push(...records);
  }

  size(): number {
    return this.records.length;
  }

  async search(queryEmbedding: number[], params: SimilaritySearchParams): Promise<CandidateRecord[]> {
    try {
      return rankSegmentDocuments(this.records, queryEmbedding, params);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SearchServiceError(`Segment search failed: ${reason}`, { cause: error });
    }
  }
}
