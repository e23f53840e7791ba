import { z } from "zod";

export interface ProductRecord {
  productId: string;
  textDescription: string;
  /** Fixed at build/upsert time for this exact description. */
  embedding: readonly number[];
  metadata: Record<string, unknown>;
}

/** A product as supplied for indexing, before it is embedded. */
export interface ProductInput {
  productId: string;
  textDescription: string;
  metadata?: Record<string, unknown>;
}

export interface ScoredProduct {
  record: ProductRecord;
  score: number;
}

export type IndexState = "unbuilt" | "ready" | "failed";

export interface IndexStatus {
  state: IndexState;
  version: number;
  size: number;
  builtAt: string | null;
  lastBuildError: string | null;
}

/**
 * Reference to one immutable index generation, taken at query start.
 */
export interface IndexHandle {
  readonly version: number;
  readonly size: number;
}

export const StoredIndexSnapshotSchema = z.object({
  version: z.number().int().nonnegative(),
  builtAt: z.string(),
  records: z.array(
    z.object({
      productId: z.string(),
      textDescription: z.string(),
      embedding: z.array(z.number()),
      metadata: z.record(z.unknown()),
    })
  ),
});

export type StoredIndexSnapshot = z.infer<typeof StoredIndexSnapshotSchema>;
