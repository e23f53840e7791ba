import type { EmbeddingPort } from "@domain/rag/ports";
import { normalizeText, tokenize } from "@domain/memory/signals";
import { normalizeVector } from "@utils/vector";

/**
 * Offline embedder: feature hashing of unigrams and adjacent bigrams into a
 * fixed number of buckets, log-scaled term frequency, L2-normalized.
 *
 * Deterministic and dependency-free, so the engine runs (and tests run)
 * without an API key. Text goes through the same normalization as fact
 * extraction, so Persian digit and letter variants hash alike.
 */
export class HashingEmbeddingProvider implements EmbeddingPort {
  readonly name = "local";

  constructor(private readonly dimensions = 512) {
    if (!Number.isInteger(dimensions) || dimensions < 8) {
      throw new RangeError("dimensions must be an integer >= 8");
    }
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const tokens = tokenize(normalizeText(text));
    const counts = new Map<number, number>();

    const add = (feature: string): void => {
      const bucket = fnv1a(feature) % this.dimensions;
      counts.set(bucket, (counts.get(bucket) ?? 0) + 1);
    };

    tokens.forEach((token, i) => {
      add(token);
      const next = tokens[i + 1];
      if (next !== undefined) {
        add(`${token} ${next}`);
      }
    });

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const [bucket, count] of counts) {
      vector[bucket] = 1 + Math.log(count);
    }

    return normalizeVector(vector);
  }
}

/** 32-bit FNV-1a over UTF-16 code units. */
export function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
