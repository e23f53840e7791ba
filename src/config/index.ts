/**
 * Centralized configuration for the skincare memory & retrieval engine.
 *
 * Provides type-safe access to environment variables and engine settings:
 * - OpenAI configuration (chat model, embedding model, timeouts)
 * - Durable store backend selection and PostgreSQL connection parameters
 * - Retrieval settings (top-k, strict mode, query deadline)
 * - Conversation window, profile cache and context bounds
 * - Background persistence queue retry policy
 *
 * Everything is read once at startup; adapters that need an API key check for
 * it when they are constructed, not here.
 */
import dotenv from "dotenv";

dotenv.config();

export type StoreBackend = "memory" | "postgres";
export type EmbeddingProviderName = "openai" | "local";

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

function booleanFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === "true" || raw === "1" || raw === "yes";
}

function listFromEnv(name: string, fallback: number[]): number[] {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const values = raw
    .split(",")
    .map((part) => Number(part.trim()))
    .filter((value) => Number.isFinite(value) && value >= 0);
  return values.length > 0 ? values : fallback;
}

function storeBackendFromEnv(): StoreBackend {
  return process.env.STORE_BACKEND === "postgres" ? "postgres" : "memory";
}

function embeddingProviderFromEnv(): EmbeddingProviderName {
  return process.env.EMBEDDING_PROVIDER === "openai" ? "openai" : "local";
}

export const config = {
  env: process.env.NODE_ENV || "development",

  port: numberFromEnv("PORT", 8001),

  openai: {
    key: process.env.OPENAI_API_KEY || "",
    model: process.env.OPENAI_MODEL || "gpt-4o-mini",
    embeddingModel:
      process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    timeoutMs: numberFromEnv("OPENAI_TIMEOUT_MS", 30000),
  },

  store: {
    backend: storeBackendFromEnv(),
  },

  db: {
    host: process.env.DB_HOST || "localhost",
    port: numberFromEnv("DB_PORT", 5432),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_NAME,
    max: numberFromEnv("DB_POOL_MAX", 10),
    idleTimeoutMs: numberFromEnv("DB_IDLE_TIMEOUT_MS", 30000),
    connectionTimeoutMs: numberFromEnv("DB_CONN_TIMEOUT_MS", 10000),
  },

  embedding: {
    provider: embeddingProviderFromEnv(),
    localDimensions: numberFromEnv("EMBEDDING_LOCAL_DIMENSIONS", 512),
  },

  rag: {
    topK: numberFromEnv("RAG_TOP_K", 5),
    maxTopK: numberFromEnv("RAG_MAX_TOP_K", 50),
    strict: booleanFromEnv("RAG_STRICT", false),
    queryTimeoutMs: numberFromEnv("RAG_QUERY_TIMEOUT_MS", 5000),
    persistSnapshots: booleanFromEnv("RAG_PERSIST_SNAPSHOTS", true),
    catalogPath: process.env.CATALOG_PATH || "data/products.json",
    commentsPath: process.env.CATALOG_COMMENTS_PATH || undefined,
    summariesPath: process.env.CATALOG_SUMMARIES_PATH || undefined,
  },

  conversation: {
    maxWindow: numberFromEnv("CONVERSATION_MAX_WINDOW", 200),
    historyWindow: numberFromEnv("CONVERSATION_HISTORY_WINDOW", 20),
    defaultHistoryLimit: numberFromEnv("CONVERSATION_DEFAULT_LIMIT", 50),
  },

  profileCache: {
    capacity: numberFromEnv("PROFILE_CACHE_CAPACITY", 1000),
    ttlMs: numberFromEnv("PROFILE_CACHE_TTL_MS", 5 * 60 * 1000),
  },

  context: {
    maxHistoryChars: numberFromEnv("CONTEXT_MAX_HISTORY_CHARS", 6000),
    timeoutMs: numberFromEnv("CONTEXT_TIMEOUT_MS", 8000),
  },

  queue: {
    maxAttempts: numberFromEnv("QUEUE_MAX_ATTEMPTS", 3),
    backoffMs: listFromEnv("QUEUE_BACKOFF_MS", [0, 200, 500]),
    maxPending: numberFromEnv("QUEUE_MAX_PENDING", 10000),
    deadLetterCapacity: numberFromEnv("QUEUE_DEAD_LETTER_CAPACITY", 500),
  },

  observability: {
    logLevel: process.env.LOG_LEVEL || "info",
    logToFile: booleanFromEnv("LOG_TO_FILE", true),
  },
} as const;

export type AppConfig = typeof config;
