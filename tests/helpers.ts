import type { EngineSettings } from "@app/engine";
import type { EmbeddingPort } from "@domain/rag/ports";
import type { DocumentNamespace, DocumentStore } from "@domain/storage/ports";
import { InMemoryDocumentStore } from "@infrastructure/store/InMemoryDocumentStore";

/**
 * Deterministic embedder: one dimension per vocabulary phrase, 1 when the
 * text contains it. Cosine scores are easy to work out by hand.
 */
export class VocabularyEmbedder implements EmbeddingPort {
  readonly name = "vocabulary";
  readonly batches: string[][] = [];
  readonly queries: string[] = [];

  private queryGate: Promise<void> | null = null;
  private batchGate: Promise<void> | null = null;
  private openQueries: (() => void) | null = null;
  private openBatches: (() => void) | null = null;
  private batchFailure: Error | null = null;
  private queryFailure: Error | null = null;

  constructor(private readonly vocabulary: readonly string[]) {}

  vectorFor(text: string): number[] {
    return this.vocabulary.map((term) => (text.includes(term) ? 1 : 0));
  }

  holdQueries(): void {
    this.queryGate = new Promise((resolve) => {
      this.openQueries = resolve;
    });
  }

  releaseQueries(): void {
    this.openQueries?.();
    this.queryGate = null;
  }

  holdBatches(): void {
    this.batchGate = new Promise((resolve) => {
      this.openBatches = resolve;
    });
  }

  releaseBatches(): void {
    this.openBatches?.();
    this.batchGate = null;
  }

  failBatches(error: Error | null): void {
    this.batchFailure = error;
  }

  failQueries(error: Error | null): void {
    this.queryFailure = error;
  }

  async embed(text: string): Promise<number[]> {
    this.queries.push(text);
    if (this.queryGate) {
      await this.queryGate;
    }
    if (this.queryFailure) {
      throw this.queryFailure;
    }
    return this.vectorFor(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    if (this.batchGate) {
      await this.batchGate;
    }
    if (this.batchFailure) {
      throw this.batchFailure;
    }
    return texts.map((text) => this.vectorFor(text));
  }
}

/** A store whose every call rejects, like a database that went away. */
export class UnreachableStore implements DocumentStore {
  async get(_namespace: DocumentNamespace, _key: string): Promise<unknown | null> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }

  async put(_namespace: DocumentNamespace, _key: string, _document: object): Promise<void> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }

  async delete(_namespace: DocumentNamespace, _key: string): Promise<boolean> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
  }
}

/**
 * In-memory store whose writes to one namespace can be held back, and whose
 * next writes can be made to fail.
 */
export class GatedDocumentStore extends InMemoryDocumentStore {
  private held: { namespace: DocumentNamespace; gate: Deferred } | null = null;
  private failures = 0;

  holdWrites(namespace: DocumentNamespace): void {
    this.held = { namespace, gate: deferred() };
  }

  releaseWrites(): void {
    this.held?.gate.resolve();
    this.held = null;
  }

  failWrites(count: number): void {
    this.failures = count;
  }

  override async put(namespace: DocumentNamespace, key: string, document: object): Promise<void> {
    if (this.held && this.held.namespace === namespace) {
      await this.held.gate.promise;
    }
    if (this.failures > 0) {
      this.failures--;
      throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    }
    await super.put(namespace, key, document);
  }
}

export const SKINCARE_VOCABULARY: readonly string[] = [
  "ضد آفتاب",
  "پوست چرب",
  "رنگی",
  "آبرسان",
  "خشک",
  "جوش",
];

export function testSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    rag: {
      topK: 5,
      maxTopK: 50,
      strict: false,
      queryTimeoutMs: 0,
      persistSnapshots: false,
      catalogPath: "",
    },
    conversation: {
      maxWindow: 200,
      historyWindow: 20,
      defaultHistoryLimit: 50,
    },
    profileCache: { capacity: 100, ttlMs: 60_000 },
    context: { maxHistoryChars: 6000, timeoutMs: 0 },
    queue: {
      maxAttempts: 3,
      backoffMs: [0, 200, 500],
      maxPending: 1000,
      deadLetterCapacity: 50,
    },
    ...overrides,
  };
}

export const noSleep = async (_ms: number): Promise<void> => undefined;

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
