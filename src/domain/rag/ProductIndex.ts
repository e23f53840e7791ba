/**
 * In-process vector index over the product catalog.
 *
 * The index is a sequence of immutable generations. Writers (`build`,
 * `upsert`, `delete`) run one at a time, assemble the next generation off to
 * the side and publish it with a single reference assignment. Readers pin the
 * generation that was live when they started and never wait for a writer.
 *
 * Deletes also leave a version-stamped tombstone: a query still holding an
 * older generation drops the deleted id before returning. Tombstones are
 * pruned once no pinned generation predates them.
 */
import {
  IndexBuildFailedError,
  IndexUnavailableError,
  InvalidInputError,
  errorMessage,
} from "@domain/errors";
import type { EmbeddingPort } from "@domain/rag/ports";
import {
  StoredIndexSnapshotSchema,
  type IndexHandle,
  type IndexStatus,
  type ProductInput,
  type ProductRecord,
  type ScoredProduct,
  type StoredIndexSnapshot,
} from "@domain/rag/types";
import { storeCall, type DocumentStore } from "@domain/storage/ports";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { withDeadline } from "@utils/deadline";
import { KeyedMutex } from "@utils/KeyedMutex";
import { assertFiniteVector, cosineSimilarity } from "@utils/vector";

interface Generation {
  readonly version: number;
  readonly records: ReadonlyMap<string, ProductRecord>;
  readonly builtAt: string;
}

interface Pin {
  generation: Generation | null;
  count: number;
}

export interface ProductIndexOptions {
  defaultTopK: number;
  maxTopK: number;
  strict: boolean;
  queryTimeoutMs?: number;
  /** When set, every published generation is snapshotted here. */
  snapshots?: DocumentStore;
  now?: () => Date;
}

export interface QueryOptions {
  timeoutMs?: number;
}

const WRITER_KEY = "product-index";

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
const SNAPSHOT_KEY = "current";

/**
 * Trims and checks product inputs. Later entries for the same id win.
 * Throws InvalidInputError before anything is embedded or published.
 */
export function normalizeProductInputs(inputs: readonly ProductInput[]): ProductInput[] {
  const byId = new Map<string, ProductInput>();

  for (const input of inputs) {
    const productId = typeof input.productId === "string" ? input.productId.trim() : "";
    const textDescription =
      typeof input.textDescription === "string" ? input.textDescription.trim() : "";

    if (!productId) {
      throw new InvalidInputError("Product id is required");
    }
    if (!textDescription) {
      throw new InvalidInputError(`Product ${productId} has no description`, {
        productId,
      });
    }

    byId.set(productId, {
      productId,
      textDescription,
      metadata: input.metadata ?? {},
    });
  }

  return [...byId.values()];
}

export class ProductIndex {
  private live: Generation | null = null;
  private nextVersion = 1;
  private lastBuildError: string | null = null;

  private readonly writer = new KeyedMutex();
  private readonly pins = new Map<number, Pin>();
  private readonly tombstones = new Map<string, number>();
  private readonly now: () => Date;

  constructor(
    private readonly embedder: EmbeddingPort,
    private readonly options: ProductIndexOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // --- Readers -------------------------------------------------------------

  acquire(): IndexHandle {
    const generation = this.live;
    const version = generation?.version ?? 0;

    const pin = this.pins.get(version);
    if (pin) {
      pin.count++;
    } else {
      this.pins.set(version, { generation, count: 1 });
    }

    return { version, size: generation?.records.size ?? 0 };
  }

  release(handle: IndexHandle): void {
    const pin = this.pins.get(handle.version);
    if (!pin) {
      return;
    }
    pin.count--;
    if (pin.count <= 0) {
      this.pins.delete(handle.version);
      this.pruneTombstones();
    }
  }

  private pruneTombstones(): void {
    const oldestPinned = Math.min(...this.pins.keys());
    for (const [productId, removedAt] of this.tombstones) {
      if (!(oldestPinned < removedAt)) {
        this.tombstones.delete(productId);
      }
    }
  }

  private clampTopK(k: number | undefined): number {
    if (k === undefined || !Number.isFinite(k)) {
      return this.options.defaultTopK;
    }
    return Math.min(Math.max(1, Math.floor(k)), this.options.maxTopK);
  }

  private unavailable(generation: Generation | null): Error {
    if (generation) {
      return new IndexUnavailableError("empty", { version: generation.version });
    }
    if (this.lastBuildError !== null) {
      return new IndexBuildFailedError(this.lastBuildError);
    }
    return new IndexUnavailableError("not_built");
  }

  /**
   * Top-k by cosine similarity against the generation `handle` refers to,
   * highest first, ties by productId.
   */
  async queryWith(handle: IndexHandle, text: string, k?: number): Promise<ScoredProduct[]> {
    const query = typeof text === "string" ? text.trim() : "";
    if (!query) {
      throw new InvalidInputError("Query text must not be empty");
    }

    const generation = this.pins.get(handle.version)?.generation ?? null;
    const limit = this.clampTopK(k);

    if (!generation || generation.records.size === 0) {
      if (this.options.strict) {
        throw this.unavailable(generation);
      }
      return [];
    }

    const queryVector = await this.embedder.embed(query);

    const scored: ScoredProduct[] = [];
    for (const record of generation.records.values()) {
      scored.push({ record, score: cosineSimilarity(queryVector, record.embedding) });
    }

    scored.sort((a, b) => b.score - a.score || compareIds(a.record.productId, b.record.productId));

    // Deletes published after this generation still hide their ids.
    const visible = scored.filter((item) => {
      const removedAt = this.tombstones.get(item.record.productId);
      return removedAt === undefined || removedAt <= handle.version;
    });

    return visible.slice(0, limit);
  }

  async query(text: string, k?: number, options: QueryOptions = {}): Promise<ScoredProduct[]> {
    const handle = this.acquire();
    const startedAt = Date.now();

    try {
      const results = await withDeadline(
        this.queryWith(handle, text, k),
        options.timeoutMs ?? this.options.queryTimeoutMs ?? 0,
        "product index query"
      );

      logEvent("RAG_QUERY", {
        version: handle.version,
        indexSize: handle.size,
        k: this.clampTopK(k),
        returned: results.length,
        durationMs: Date.now() - startedAt,
      });

      return results;
    } finally {
      this.release(handle);
    }
  }

  get(productId: string): ProductRecord | null {
    return this.live?.records.get(productId) ?? null;
  }

  status(): IndexStatus {
    const live = this.live;
    return {
      state: live ? "ready" : this.lastBuildError !== null ? "failed" : "unbuilt",
      version: live?.version ?? 0,
      size: live?.records.size ?? 0,
      builtAt: live?.builtAt ?? null,
      lastBuildError: this.lastBuildError,
    };
  }

  // --- Writers -------------------------------------------------------------

  /**
   * Embeds the inputs, reusing the vector of any live record whose
   * description is unchanged.
   */
  private async embedRecords(inputs: readonly ProductInput[]): Promise<ProductRecord[]> {
    const pending: ProductInput[] = [];
    const reused = new Map<string, readonly number[]>();

    for (const input of inputs) {
      const existing = this.live?.records.get(input.productId);
      if (existing && existing.textDescription === input.textDescription) {
        reused.set(input.productId, existing.embedding);
      } else {
        pending.push(input);
      }
    }

    const vectors =
      pending.length > 0
        ? await this.embedder.embedBatch(pending.map((p) => p.textDescription))
        : [];

    if (vectors.length !== pending.length) {
      throw new Error(
        `Embedding provider returned ${vectors.length} vectors for ${pending.length} products`
      );
    }

    const fresh = new Map<string, readonly number[]>();
    pending.forEach((input, i) => {
      const vector = vectors[i] ?? [];
      assertFiniteVector(vector, `embedding for product ${input.productId}`);
      fresh.set(input.productId, vector);
    });

    logEvent("RAG_EMBED_RECORDS", {
      provider: this.embedder.name,
      embedded: pending.length,
      reused: reused.size,
    });

    return inputs.map((input) => ({
      productId: input.productId,
      textDescription: input.textDescription,
      embedding: fresh.get(input.productId) ?? reused.get(input.productId) ?? [],
      metadata: input.metadata ?? {},
    }));
  }

  private async publish(records: ReadonlyMap<string, ProductRecord>, operation: string): Promise<Generation> {
    const generation: Generation = {
      version: this.nextVersion++,
      records,
      builtAt: this.now().toISOString(),
    };

    this.live = generation;
    this.lastBuildError = null;

    logEvent("RAG_GENERATION_PUBLISHED", {
      operation,
      version: generation.version,
      size: records.size,
    });

    await this.persistSnapshot(generation);
    return generation;
  }

  private async persistSnapshot(generation: Generation): Promise<void> {
    const snapshots = this.options.snapshots;
    if (!snapshots) {
      return;
    }

    const snapshot: StoredIndexSnapshot = {
      version: generation.version,
      builtAt: generation.builtAt,
      records: [...generation.records.values()].map((record) => ({
        productId: record.productId,
        textDescription: record.textDescription,
        embedding: [...record.embedding],
        metadata: record.metadata,
      })),
    };

    try {
      await storeCall("index.snapshot", () => snapshots.put("product-index", SNAPSHOT_KEY, snapshot));
    } catch (error: unknown) {
      // The in-memory generation is authoritative; a missed snapshot only
      // costs a re-embed after restart.
      logger.log("warn", "RAG_SNAPSHOT_FAILED", {
        version: generation.version,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Replaces the whole index. Queries keep using the previous generation
   * until the new one is published; a failed build leaves it in place.
   */
  async build(inputs: readonly ProductInput[]): Promise<IndexStatus> {
    const valid = normalizeProductInputs(inputs);

    return this.writer.run(WRITER_KEY, async () => {
      const startedAt = Date.now();

      let records: ProductRecord[];
      try {
        records = await this.embedRecords(valid);
      } catch (error: unknown) {
        this.lastBuildError = errorMessage(error);

        logEvent("RAG_BUILD_FAILURE", {
          products: valid.length,
          message: this.lastBuildError,
          keptVersion: this.live?.version ?? 0,
        });
        throw error;
      }

      await this.publish(new Map(records.map((r) => [r.productId, r])), "build");

      logEvent("RAG_BUILD_SUCCESS", {
        products: records.length,
        durationMs: Date.now() - startedAt,
      });

      return this.status();
    });
  }

  /** Adds or replaces records without re-embedding the rest of the catalog. */
  async upsert(inputs: readonly ProductInput[]): Promise<IndexStatus> {
    const valid = normalizeProductInputs(inputs);
    if (valid.length === 0) {
      return this.status();
    }

    return this.writer.run(WRITER_KEY, async () => {
      const records = await this.embedRecords(valid);
      const next = new Map(this.live?.records ?? []);

      for (const record of records) {
        next.delete(record.productId);
        next.set(record.productId, record);
      }

      await this.publish(next, "upsert");
      return this.status();
    });
  }

  /** Resolves false when the id was not in the live generation. */
  async delete(productId: string): Promise<boolean> {
    const id = typeof productId === "string" ? productId.trim() : "";
    if (!id) {
      throw new InvalidInputError("Product id is required");
    }

    return this.writer.run(WRITER_KEY, async () => {
      const live = this.live;
      if (!live || !live.records.has(id)) {
        return false;
      }

      const next = new Map(live.records);
      next.delete(id);

      // Stamped with the version about to be published, before any await.
      this.tombstones.set(id, this.nextVersion);
      await this.publish(next, "delete");
      if (this.pins.size === 0) {
        this.pruneTombstones();
      }

      return true;
    });
  }

  /**
   * Loads the last persisted snapshot when nothing has been built yet.
   * Resolves the number of restored records.
   */
  async restore(): Promise<number> {
    const snapshots = this.options.snapshots;
    if (!snapshots) {
      return 0;
    }

    return this.writer.run(WRITER_KEY, async () => {
      if (this.live) {
        return 0;
      }

      const raw = await storeCall("index.restore", () => snapshots.get("product-index", SNAPSHOT_KEY));
      if (raw === null) {
        return 0;
      }

      const parsed = StoredIndexSnapshotSchema.safeParse(raw);
      if (!parsed.success) {
        logEvent("RAG_SNAPSHOT_INVALID", { issues: parsed.error.issues.length });
        return 0;
      }

      const snapshot = parsed.data;
      this.nextVersion = Math.max(this.nextVersion, snapshot.version + 1);
      this.live = {
        version: snapshot.version,
        builtAt: snapshot.builtAt,
        records: new Map(snapshot.records.map((r) => [r.productId, r])),
      };

      logEvent("RAG_SNAPSHOT_RESTORED", {
        version: snapshot.version,
        size: snapshot.records.length,
      });

      return snapshot.records.length;
    });
  }
}
