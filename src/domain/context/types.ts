import type { ConversationKey, Turn } from "@domain/conversation/types";
import type { MemorySummary } from "@domain/memory/types";
import type { Profile } from "@domain/profile/types";
import type { ScoredProduct } from "@domain/rag/types";

export interface HistoryEntry extends Turn {
  /** True for the incoming message, which is committed in the background. */
  pending: boolean;
}

export interface ContextMeta {
  indexVersion: number;
  indexSize: number;
  historyTurns: number;
  historyChars: number;
  trimmedTurns: number;
  /** Retrieval was skipped because the embedding provider failed. */
  retrievalDegraded: boolean;
  assembledAt: string;
  durationMs: number;
}

export interface Context {
  key: ConversationKey;
  /** Oldest first; the pending turn is always last. */
  history: HistoryEntry[];
  pending: HistoryEntry;
  memory: MemorySummary;
  profile: Profile;
  retrieved: ScoredProduct[];
  meta: ContextMeta;
}

export interface AssembleOptions {
  topK?: number;
  historyWindow?: number;
  timeoutMs?: number;
}
