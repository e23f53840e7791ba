/**
 * Text → vector function the product index depends on.
 *
 * Implementations: OpenAI embeddings, or the local feature-hashing embedder.
 * `embedBatch` returns one vector per input, in input order.
 */
export interface EmbeddingPort {
  readonly name: string;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}
