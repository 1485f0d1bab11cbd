export interface IEmbeddingProvider {
  /**
   * Convert query text into a fixed-length vector.
   * Rejects with EncodingError when the model cannot process the text.
   */
  embedQuery(text: string): Promise<number[]>;
}
