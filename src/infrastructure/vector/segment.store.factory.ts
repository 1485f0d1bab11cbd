import { AppConfig } from "../config/app.config";
import { ISimilaritySearchService } from "../../domain/interfaces/isimilarity.search";
import { SearchServiceError } from "../../domain/errors/search.errors";
import { closeMongoDBConnection, connectToMongoDB } from "../database/mongodb.connection";
import { MongoDBSegmentStore } from "./mongodb.segment.store";
import { InMemorySegmentStore } from "./in.memory.segment.store";

export interface SegmentStoreHandle {
  store: ISimilaritySearchService;
  close(): Promise<void>;
}

export async function createSegmentStore(config: AppConfig): Promise<SegmentStoreHandle> {
  if (config.segmentStore === "memory") {
    if (!config.segmentsFile) {
      throw new Error("segmentsFile is required for the memory segment store");
    }
    const store = await InMemorySegmentStore.fromFile(config.segmentsFile);
    return { store, close: async () => {} };
  }

  try {
    const client = await connectToMongoDB(config.mongodb);
    return {
      store: new MongoDBSegmentStore(client, config.mongodb.dbName, config.mongodb.collection),
      close: closeMongoDBConnection,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SearchServiceError(`Could not connect to MongoDB: ${reason}`, { cause: error });
  }
}
