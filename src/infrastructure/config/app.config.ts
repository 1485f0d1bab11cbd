/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values.
 * Entry points call loadConfig() once and pass the result down.
 */

import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

export type SegmentStoreKind = "mongodb" | "memory";

export interface AppConfig {
  // Server
  port: number;

  // OpenAI
  openai: {
    apiKey: string;
    embeddingModel: string;
  };

  // Where segment embeddings are searched
  segmentStore: SegmentStoreKind;

  // MongoDB
  mongodb: {
    uri: string;
    dbName: string;
    collection: string;
  };

  // JSON array of segment documents, used when segmentStore is "memory"
  segmentsFile?: string;

  search: {
    minSimilarity: number;
    maxCandidates: number; // CLI
    dashboardMaxCandidates: number;
  };

  // Directory the CLI writes result pages into
  outputDir: string;
}

function parseNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Validate required environment variables
  const openaiApiKey = env.OPENAI_API_KEY;
  if (!openaiApiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required");
  }

  const segmentStore = (env.SEGMENT_STORE || "mongodb").trim().toLowerCase();
  if (segmentStore !== "mongodb" && segmentStore !== "memory") {
    throw new Error(`SEGMENT_STORE must be "mongodb" or "memory", got "${segmentStore}"`);
  }
  if (segmentStore === "memory" && !env.SEGMENTS_FILE) {
    throw new Error("SEGMENTS_FILE environment variable is required when SEGMENT_STORE is memory");
  }

  const minSimilarity = parseNumber(env, "SEARCH_MIN_SIMILARITY", 0.4);
  if (minSimilarity < 0 || minSimilarity > 1) {
    throw new Error(`SEARCH_MIN_SIMILARITY must be between 0 and 1, got ${minSimilarity}`);
  }

  return {
    port: parseNumber(env, "PORT", 3000),

    openai: {
      apiKey: openaiApiKey,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    },

    segmentStore,

    mongodb: {
      uri: env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: env.MONGODB_DB_NAME || "video-search",
      collection: env.MONGODB_COLLECTION || "transcriptions",
    },

    segmentsFile: env.SEGMENTS_FILE,

    search: {
      minSimilarity,
      maxCandidates: parseNumber(env, "SEARCH_MAX_CANDIDATES", 200),
      dashboardMaxCandidates: parseNumber(env, "DASHBOARD_MAX_CANDIDATES", 100),
    },

    outputDir: env.OUTPUT_DIR || ".",
  };
}
