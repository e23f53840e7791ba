/**
 * Admin and search operations over the product index.
 *
 * Writes (full rebuild, upsert, delete) are validated up front and then run
 * on the persistence queue under one key, so they apply in submission order
 * and never block the request. Search reads the index directly.
 */
import { loadCatalogFile, type CatalogFileOptions } from "@app/catalog/catalogLoader";
import type { PersistenceQueue } from "@app/persistence/PersistenceQueue";
import { InvalidInputError } from "@domain/errors";
import { normalizeProductInputs, type ProductIndex } from "@domain/rag/ProductIndex";
import type { IndexStatus, ProductInput } from "@domain/rag/types";
import { logEvent } from "@infrastructure/logging/Logger";

export const CATALOG_QUEUE_KEY = "catalog";

export interface CatalogWriteAccepted {
  accepted: number;
  queued: true;
}

export interface CatalogIngestResult extends CatalogWriteAccepted {
  filepath: string;
  skipped: number;
}

export interface ProductSearchHit {
  productId: string;
  score: number;
  textDescription: string;
  metadata: Record<string, unknown>;
}

export interface ProductSearchResponse {
  query: string;
  results: ProductSearchHit[];
}

export class CatalogUseCase {
  constructor(
    private readonly index: ProductIndex,
    private readonly queue: PersistenceQueue
  ) {}

  /** Full rebuild in the background; the current generation serves until it lands. */
  reindex(records: readonly ProductInput[]): CatalogWriteAccepted {
    const valid = normalizeProductInputs(records);

    this.queue.submit(
      CATALOG_QUEUE_KEY,
      async () => {
        await this.index.build(valid);
      },
      "index.build"
    );

    logEvent("CATALOG_REINDEX_QUEUED", { products: valid.length });
    return { accepted: valid.length, queued: true };
  }

  upsertProducts(records: readonly ProductInput[]): CatalogWriteAccepted {
    const valid = normalizeProductInputs(records);
    if (valid.length === 0) {
      throw new InvalidInputError("At least one product is required");
    }

    this.queue.submit(
      CATALOG_QUEUE_KEY,
      async () => {
        await this.index.upsert(valid);
      },
      "index.upsert"
    );

    return { accepted: valid.length, queued: true };
  }

  deleteProduct(productId: string): CatalogWriteAccepted {
    const id = typeof productId === "string" ? productId.trim() : "";
    if (!id) {
      throw new InvalidInputError("productId is required");
    }

    this.queue.submit(
      CATALOG_QUEUE_KEY,
      async () => {
        const removed = await this.index.delete(id);
        if (!removed) {
          logEvent("CATALOG_DELETE_MISSING", { productId: id });
        }
      },
      "index.delete"
    );

    return { accepted: 1, queued: true };
  }

  ingestCatalogFile(filepath: string, sources: CatalogFileOptions = {}): CatalogIngestResult {
    const { products, skipped } = loadCatalogFile(filepath, sources);
    const result = this.reindex(products);
    return { ...result, filepath, skipped };
  }

  async searchProducts(query: string, limit?: number): Promise<ProductSearchResponse> {
    const normalized = typeof query === "string" ? query.trim() : "";
    if (!normalized) {
      throw new InvalidInputError("query is required");
    }

    const results = await this.index.query(normalized, limit);

    return {
      query: normalized,
      results: results.map(({ record, score }) => ({
        productId: record.productId,
        score,
        textDescription: record.textDescription,
        metadata: record.metadata,
      })),
    };
  }

  status(): IndexStatus {
    return this.index.status();
  }
}
