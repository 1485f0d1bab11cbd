import { Collection, Document, MongoClient } from "mongodb";
import {
  CandidateRecord,
  ISimilaritySearchService,
  SimilaritySearchParams,
} from "../../domain/interfaces/isimilarity.search";
import { SearchServiceError } from "../../domain/errors/search.errors";
import { rankSegmentDocuments } from "./segment.scoring";

/**
 * MongoDB-backed segment search.
 * Each query runs in its own client session, ended on every exit path.
 */
export class MongoDBSegmentStore implements ISimilaritySearchService {
  private collection: Collection<Document>;

  constructor(
    private client: MongoClient,
    dbName: string,
    collectionName: string = "transcriptions"
  ) {
    this.collection = client.db(dbName).collection(collectionName);
  }

  async search(queryEmbedding: number[], params: SimilaritySearchParams): Promise<CandidateRecord[]> {
    const session = this.client.startSession();
    try {
      // Scores every embedded segment in process; an Atlas vector index would replace this scan
      const docs = await this.collection
        .find({ embedding: { $exists: true } }, { session, projection: { _id: 0 } })
        .toArray();

      console.log(`[MongoDBSegmentStore] Scoring ${docs.length} segments`);
      const ranked = rankSegmentDocuments(docs, queryEmbedding, params);
      console.log(
        `[MongoDBSegmentStore] Returning ${ranked.length} segments ` +
          `(min similarity ${params.minSimilarity}, cap ${params.maxCandidates})`
      );
      return ranked;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[MongoDBSegmentStore] Error searching segments: ${reason}`);
      throw new SearchServiceError(`Segment search failed: ${reason}`, { cause: error });
    } finally {
      await session.endSession();
    }
  }
}
