import OpenAI from "openai";
import { IEmbeddingProvider } from "../../domain/interfaces/iembedding.provider";
import { EncodingError } from "../../domain/errors/search.errors";

// The slice of the OpenAI client this provider calls
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: EmbeddingsClient;

  constructor(
    apiKey: string,
    private model: string = "text-embedding-3-small",
    client?: EmbeddingsClient
  ) {
    this.client = client ?? new OpenAI({ apiKey });
  }

  async embedQuery(text: string): Promise<number[]> {
    const input = text.trim();
    if (!input) {
      throw new EncodingError("Cannot encode an empty query");
    }

    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({ model: this.model, input });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[OpenAIEmbeddingProvider] Error encoding query: ${reason}`);
      throw new EncodingError(`Failed to encode query with ${this.model}: ${reason}`, { cause: error });
    }

    if (!embedding || embedding.length === 0 || !embedding.every((v) => Number.isFinite(v))) {
      throw new EncodingError(`${this.model} returned no usable embedding for the query`);
    }
    return embedding;
  }
}
