/**
 * OpenAI-backed embedding provider for the product index.
 *
 * Single and batch embedding through the embeddings endpoint, with the
 * shared retry policy for rate limits and transient network failures.
 * Failures are logged and rethrown; the index decides what a failed batch
 * means (keep the previous generation, or let the queue retry).
 */
import OpenAI from "openai";

import { config } from "@config/index";
import { InfrastructureError } from "@domain/errors";
import type { EmbeddingPort } from "@domain/rag/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { withRetry } from "@utils/retry";

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  client?: Pick<OpenAI, "embeddings">;
}

function failureDetails(error: unknown): { message: string; name: string | undefined } {
  return error instanceof Error
    ? { message: error.message, name: error.name }
    : { message: String(error), name: undefined };
}

export class OpenAIEmbeddingProvider implements EmbeddingPort {
  readonly name = "openai";

  private readonly client: Pick<OpenAI, "embeddings">;
  private readonly model: string;

  constructor(options: OpenAIEmbeddingOptions = {}) {
    this.model = options.model ?? config.openai.embeddingModel;

    if (options.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options.apiKey ?? config.openai.key;
    if (!apiKey) {
      throw new InfrastructureError(
        "OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai",
        500,
        { provider: this.name }
      );
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseUrl ?? config.openai.baseUrl,
      timeout: options.timeoutMs ?? config.openai.timeoutMs,
    });
  }

  async embed(text: string): Promise<number[]> {
    const normalized = text.trim();
    if (!normalized) {
      throw new Error("Cannot embed empty text");
    }

    const startedAt = Date.now();

    try {
      const response = await withRetry(
        () => this.client.embeddings.create({ model: this.model, input: normalized }),
        "embeddings.create.single"
      );

      const first = response.data[0];
      if (!first || first.embedding.length === 0) {
        throw new InfrastructureError("Embedding API returned invalid data", 502);
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        inputLength: normalized.length,
        vectorLength: first.embedding.length,
      });

      return first.embedding;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        ...failureDetails(error),
      });
      throw error;
    }
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const normalized = texts.map((t) => t.trim());
    if (normalized.some((t) => t.length === 0)) {
      throw new Error("Cannot embed empty text");
    }

    const startedAt = Date.now();

    try {
      const response = await withRetry(
        () => this.client.embeddings.create({ model: this.model, input: normalized }),
        "embeddings.create.batch"
      );

      // The API may reorder; `index` ties each vector to its input.
      const vectors: number[][] = new Array<number[]>(normalized.length);
      for (const item of response.data) {
        vectors[item.index] = item.embedding;
      }

      logEvent("EMBEDDING_BATCH_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: normalized.length,
        vectorLength: response.data[0]?.embedding.length ?? 0,
      });

      return vectors;
    } catch (error: unknown) {
      logEvent("EMBEDDING_BATCH_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        batchSize: normalized.length,
        ...failureDetails(error),
      });
      throw error;
    }
  }
}
