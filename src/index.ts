import { loadConfig } from "./infrastructure/config/app.config";
import { createSegmentStore } from "./infrastructure/vector/segment.store.factory";
import { OpenAIEmbeddingProvider } from "./infrastructure/openai/openai.embedding.provider";
import { SearchVideosUseCase } from "./application/use-cases/search-videos.use-case";
import { SearchController } from "./presentation/controllers/search.controller";
import { createApp } from "./presentation/app";

async function main() {
  try {
    const config = loadConfig();

    // Initialize infrastructure
    const segmentStore = await createSegmentStore(config);
    const embeddingProvider = new OpenAIEmbeddingProvider(
      config.openai.apiKey,
      config.openai.embeddingModel
    );

    // Initialize use cases
    const dashboardDefaults = {
      minSimilarity: config.search.minSimilarity,
      maxCandidates: config.search.dashboardMaxCandidates,
    };
    const searchVideosUseCase = new SearchVideosUseCase(
      embeddingProvider,
      segmentStore.store,
      dashboardDefaults
    );

    // Initialize controllers
    const searchController = new SearchController(searchVideosUseCase, dashboardDefaults);

    const app = createApp(searchController);

    // Start server
    const server = app.listen(config.port, () => {
      console.log(`Video search service running on port ${config.port}`);
      console.log(`Dashboard: http://localhost:${config.port}/`);
      console.log(`Health check: http://localhost:${config.port}/health`);
    });

    // Handle graceful shutdown
    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down gracefully`);
      server.close(() => {
        segmentStore
          .close()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            console.error("Failed to close segment store:", error);
            process.exit(1);
          });
      });
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
}

void main();
