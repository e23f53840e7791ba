import type { ConversationLog } from "@domain/conversation/ports";
import type { ConversationKey, Turn } from "@domain/conversation/types";
import { validateId } from "@domain/conversation/types";
import type { MemorySummarizer } from "@domain/memory/MemorySummarizer";
import type { MemorySummary } from "@domain/memory/types";

/** History and memory reads, plus the user-initiated history clear. */
export class ConversationUseCase {
  constructor(
    private readonly conversations: ConversationLog,
    private readonly memory: MemorySummarizer,
    private readonly defaultLimit: number
  ) {}

  getHistory(key: ConversationKey, limit?: number): Promise<Turn[]> {
    return this.conversations.recent(key, limit ?? this.defaultLimit);
  }

  /** Resolves the number of turns removed; the memory summary is kept. */
  clearHistory(key: ConversationKey): Promise<number> {
    return this.conversations.clear(key);
  }

  getMemory(userId: string): Promise<MemorySummary> {
    return this.memory.summaryFor(validateId(userId, "userId"));
  }
}
