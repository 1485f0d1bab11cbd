#!/usr/bin/env node
import path from "path";
import { writeFile } from "fs/promises";
import { createInterface } from "readline/promises";
import { loadConfig } from "./infrastructure/config/app.config";
import { createSegmentStore } from "./infrastructure/vector/segment.store.factory";
import { OpenAIEmbeddingProvider } from "./infrastructure/openai/openai.embedding.provider";
import { SearchVideosUseCase } from "./application/use-cases/search-videos.use-case";
import { renderResultsPage } from "./presentation/views/results.page";
import { formatFileTimestamp, formatThresholdPercent } from "./presentation/views/html";

async function readQuery(args: string[]): Promise<string> {
  if (args.length > 0) {
    return args.join(" ").trim();
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question("Enter your search query: ")).trim();
  } finally {
    rl.close();
  }
}

/**
 * Search once and write the grouped results to a standalone HTML page.
 * Returns the process exit code.
 */
async function main(args: string[]): Promise<number> {
  const query = await readQuery(args);
  if (!query) {
    console.error("[cli] Query cannot be empty");
    return 1;
  }

  const config = loadConfig();
  const threshold = formatThresholdPercent(config.search.minSimilarity);
  console.log(`[cli] Starting semantic search for query: "${query}"`);

  const segmentStore = await createSegmentStore(config);
  try {
    const useCase = new SearchVideosUseCase(
      new OpenAIEmbeddingProvider(config.openai.apiKey, config.openai.embeddingModel),
      segmentStore.store,
      { minSimilarity: config.search.minSimilarity, maxCandidates: config.search.maxCandidates }
    );

    const result = await useCase.execute({ query });
    if (result.status === "empty") {
      console.log(`No results found for your query (minimum similarity: ${threshold}).`);
      return 0;
    }

    const generatedAt = new Date();
    const html = renderResultsPage({
      query: result.query,
      minSimilarity: result.minSimilarity,
      groups: result.groups,
      generatedAt,
    });
    const outputFile = path.join(config.outputDir, `search_results_${formatFileTimestamp(generatedAt)}.html`);
    await writeFile(outputFile, html, "utf-8");

    console.log(`[cli] HTML page saved to: ${outputFile}`);
    console.log(`Search complete! Results saved to: ${outputFile}`);
    console.log(`Found ${result.totalSegments} segments across ${result.uniqueVideos} videos`);
    console.log(`Open ${outputFile} in your browser to view the results`);
    return 0;
  } finally {
    await segmentStore.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[cli] Search failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
