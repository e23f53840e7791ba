/**
 * Composition root: wires stores, caches, the index, the queue and the use
 * cases from configuration. Anything passed in replaces the configured
 * default, which is how tests run the engine fully in process.
 */
import fs from "fs";

import { CatalogUseCase } from "@app/catalog/CatalogUseCase";
import { ChatUseCase } from "@app/chat/ChatUseCase";
import { ConversationUseCase } from "@app/conversation/ConversationUseCase";
import { PersistenceQueue, type QueueStats } from "@app/persistence/PersistenceQueue";
import { ProfileUseCase } from "@app/profile/ProfileUseCase";
import { config } from "@config/index";
import { ContextAssembler } from "@domain/context/ContextAssembler";
import { ConversationStore } from "@domain/conversation/ConversationStore";
import type { GenerationPort } from "@domain/llm/ports";
import { MemorySummarizer } from "@domain/memory/MemorySummarizer";
import { ProfileCache, type ProfileCacheStats } from "@domain/profile/ProfileCache";
import { ProductIndex } from "@domain/rag/ProductIndex";
import type { EmbeddingPort } from "@domain/rag/ports";
import type { IndexStatus } from "@domain/rag/types";
import type { DocumentStore } from "@domain/storage/ports";
import { PostgresDocumentStore } from "@infrastructure/database/PostgresDocumentStore";
import { OpenAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import { HashingEmbeddingProvider } from "@infrastructure/llm/HashingEmbeddingProvider";
import { MastraGenerationAdapter } from "@infrastructure/llm/OpenAIAdapter";
import { logEvent } from "@infrastructure/logging/Logger";
import { InMemoryDocumentStore } from "@infrastructure/store/InMemoryDocumentStore";

export interface EngineSettings {
  rag: {
    topK: number;
    maxTopK: number;
    strict: boolean;
    queryTimeoutMs: number;
    persistSnapshots: boolean;
    catalogPath: string;
    commentsPath?: string;
    summariesPath?: string;
  };
  conversation: {
    maxWindow: number;
    historyWindow: number;
    defaultHistoryLimit: number;
  };
  profileCache: { capacity: number; ttlMs: number };
  context: { maxHistoryChars: number; timeoutMs: number };
  queue: {
    maxAttempts: number;
    backoffMs: readonly number[];
    maxPending: number;
    deadLetterCapacity: number;
  };
}

export interface EngineOverrides {
  store?: DocumentStore;
  embedder?: EmbeddingPort;
  generator?: GenerationPort | null;
  settings?: EngineSettings;
  sleep?: (ms: number) => Promise<void>;
}

export interface EngineStats {
  profileCache: ProfileCacheStats;
  queue: QueueStats;
  index: IndexStatus;
}

export interface Engine {
  chat: ChatUseCase;
  profiles: ProfileUseCase;
  conversations: ConversationUseCase;
  catalog: CatalogUseCase;
  queue: PersistenceQueue;
  index: ProductIndex;
  store: DocumentStore;
  stats(): EngineStats;
  /** Restores the index snapshot, or ingests the configured catalog file. */
  warmUp(): Promise<IndexStatus>;
  shutdown(): Promise<void>;
}

function defaultStore(): DocumentStore {
  return config.store.backend === "postgres"
    ? new PostgresDocumentStore()
    : new InMemoryDocumentStore();
}

function defaultEmbedder(): EmbeddingPort {
  return config.embedding.provider === "openai"
    ? new OpenAIEmbeddingProvider()
    : new HashingEmbeddingProvider(config.embedding.localDimensions);
}

function defaultGenerator(): GenerationPort | null {
  return config.openai.key ? new MastraGenerationAdapter() : null;
}

export function createEngine(overrides: EngineOverrides = {}): Engine {
  const settings: EngineSettings = overrides.settings ?? config;
  const store = overrides.store ?? defaultStore();
  const embedder = overrides.embedder ?? defaultEmbedder();
  const generator = overrides.generator === undefined ? defaultGenerator() : overrides.generator;

  const conversationStore = new ConversationStore(store, {
    maxWindow: settings.conversation.maxWindow,
  });
  const profileCache = new ProfileCache(store, settings.profileCache);
  const memory = new MemorySummarizer(store);
  const index = new ProductIndex(embedder, {
    defaultTopK: settings.rag.topK,
    maxTopK: settings.rag.maxTopK,
    strict: settings.rag.strict,
    queryTimeoutMs: settings.rag.queryTimeoutMs,
    ...(settings.rag.persistSnapshots ? { snapshots: store } : {}),
  });
  const assembler = new ContextAssembler(conversationStore, memory, index, {
    historyWindow: settings.conversation.historyWindow,
    maxHistoryChars: settings.context.maxHistoryChars,
    timeoutMs: settings.context.timeoutMs,
    topK: settings.rag.topK,
    strict: settings.rag.strict,
  });
  const queue = new PersistenceQueue({
    ...settings.queue,
    ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
  });

  const catalog = new CatalogUseCase(index, queue);

  logEvent("ENGINE_CREATED", {
    embedder: embedder.name,
    generator: generator?.model ?? null,
    strict: settings.rag.strict,
  });

  return {
    chat: new ChatUseCase({
      profiles: profileCache,
      assembler,
      conversations: conversationStore,
      memory,
      queue,
      generator,
    }),
    profiles: new ProfileUseCase(profileCache, memory, queue),
    conversations: new ConversationUseCase(
      conversationStore,
      memory,
      settings.conversation.defaultHistoryLimit
    ),
    catalog,
    queue,
    index,
    store,

    stats() {
      return {
        profileCache: profileCache.stats(),
        queue: queue.stats(),
        index: index.status(),
      };
    },

    async warmUp() {
      const restored = await index.restore();
      const catalogPath = settings.rag.catalogPath;

      if (restored === 0 && catalogPath && fs.existsSync(catalogPath)) {
        catalog.ingestCatalogFile(catalogPath, {
          commentsPath: settings.rag.commentsPath,
          summariesPath: settings.rag.summariesPath,
        });
        await queue.onIdle();
      }

      return index.status();
    },

    async shutdown() {
      await queue.shutdown();
    },
  };
}
