/**
 * Builds the bounded prompt context for one chat turn.
 *
 * History, memory summary and product retrieval are read in parallel. The
 * incoming message joins the history as a pending turn (it is staged only
 * once a reply exists), then the history is trimmed
 * oldest-first to the turn and character budgets. Nothing here writes.
 */
import {
  ContextUnavailableError,
  IndexBuildFailedError,
  IndexUnavailableError,
  InvalidInputError,
  errorMessage,
} from "@domain/errors";
import type { ConversationLog } from "@domain/conversation/ports";
import type { ConversationKey } from "@domain/conversation/types";
import type {
  AssembleOptions,
  Context,
  HistoryEntry,
} from "@domain/context/types";
import type { MemorySummary } from "@domain/memory/types";
import type { Profile } from "@domain/profile/types";
import type { ProductIndex } from "@domain/rag/ProductIndex";
import type { IndexHandle, ScoredProduct } from "@domain/rag/types";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { withDeadline } from "@utils/deadline";

export interface MemoryReader {
  summaryFor(userId: string): Promise<MemorySummary>;
}

export interface ContextAssemblerOptions {
  historyWindow: number;
  maxHistoryChars: number;
  timeoutMs: number;
  topK: number;
  /** Retrieval failures fail the turn instead of degrading to no products. */
  strict: boolean;
  now?: () => Date;
}

interface Retrieval {
  items: ScoredProduct[];
  degraded: boolean;
}

/**
 * Drops the oldest entries until both budgets hold. The last entry is never
 * dropped, even when it alone exceeds `maxChars`.
 */
export function trimHistory(
  entries: readonly HistoryEntry[],
  maxTurns: number,
  maxChars: number
): { history: HistoryEntry[]; trimmed: number; chars: number } {
  const history = [...entries];
  let chars = history.reduce((sum, turn) => sum + turn.text.length, 0);
  let trimmed = 0;

  while (history.length > 1 && (history.length > maxTurns || chars > maxChars)) {
    const dropped = history.shift();
    chars -= dropped?.text.length ?? 0;
    trimmed++;
  }

  return { history, trimmed, chars };
}

export class ContextAssembler {
  private readonly now: () => Date;

  constructor(
    private readonly conversations: ConversationLog,
    private readonly memory: MemoryReader,
    private readonly index: ProductIndex,
    private readonly options: ContextAssemblerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async assemble(
    key: ConversationKey,
    profile: Profile,
    incomingText: string,
    options: AssembleOptions = {}
  ): Promise<Context> {
    const text = typeof incomingText === "string" ? incomingText.trim() : "";
    if (!text) {
      throw new InvalidInputError("Message must not be empty", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
      });
    }

    return withDeadline(
      this.build(key, profile, text, options),
      options.timeoutMs ?? this.options.timeoutMs,
      "context assembly"
    );
  }

  private async build(
    key: ConversationKey,
    profile: Profile,
    text: string,
    options: AssembleOptions
  ): Promise<Context> {
    const startedAt = Date.now();
    const window = Math.max(1, Math.floor(options.historyWindow ?? this.options.historyWindow));
    const handle = this.index.acquire();

    try {
      const [stored, lastSequenceNo, memory, retrieval] = await Promise.all([
        this.conversations.recent(key, window),
        this.conversations.lastSequenceNo(key),
        this.memory.summaryFor(key.userId),
        this.retrieve(handle, text, options.topK ?? this.options.topK),
      ]);

      const assembledAt = this.now().toISOString();

      const pending: HistoryEntry = {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
        role: "user",
        text,
        timestamp: assembledAt,
        sequenceNo: lastSequenceNo + 1,
        pending: true,
      };

      const { history, trimmed, chars } = trimHistory(
        [...stored.map((turn) => ({ ...turn, pending: false })), pending],
        window,
        this.options.maxHistoryChars
      );

      const context: Context = {
        key,
        history,
        pending,
        memory,
        profile,
        retrieved: retrieval.items,
        meta: {
          indexVersion: handle.version,
          indexSize: handle.size,
          historyTurns: history.length,
          historyChars: chars,
          trimmedTurns: trimmed,
          retrievalDegraded: retrieval.degraded,
          assembledAt,
          durationMs: Date.now() - startedAt,
        },
      };

      logEvent("CONTEXT_ASSEMBLED", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
        historyTurns: history.length,
        trimmedTurns: trimmed,
        retrieved: retrieval.items.length,
        factsCount: Object.keys(memory.facts).length,
        indexVersion: handle.version,
        durationMs: context.meta.durationMs,
      });

      return context;
    } finally {
      this.index.release(handle);
    }
  }

  private async retrieve(handle: IndexHandle, text: string, topK: number): Promise<Retrieval> {
    try {
      return { items: await this.index.queryWith(handle, text, topK), degraded: false };
    } catch (error: unknown) {
      if (error instanceof IndexUnavailableError || error instanceof IndexBuildFailedError) {
        throw new ContextUnavailableError("Product retrieval is unavailable", error, {
          reason: error.code,
        });
      }

      if (this.options.strict) {
        throw new ContextUnavailableError("Product retrieval failed", error);
      }

      logger.log("warn", "CONTEXT_RETRIEVAL_DEGRADED", {
        indexVersion: handle.version,
        error: errorMessage(error),
      });
      return { items: [], degraded: true };
    }
  }
}

function formatProfile(profile: Profile): string {
  const lines: string[] = [];
  if (profile.skinType) lines.push(`- skin type: ${profile.skinType}`);
  if (profile.age !== null) lines.push(`- age: ${profile.age}`);
  if (profile.concerns.length > 0) lines.push(`- concerns: ${profile.concerns.join(", ")}`);
  for (const [name, value] of Object.entries(profile.preferences)) {
    lines.push(`- ${name}: ${value}`);
  }
  return lines.length > 0 ? lines.join("\n") : "No profile.";
}

function formatMemory(memory: MemorySummary): string {
  const entries = Object.entries(memory.facts).sort(([a], [b]) => a.localeCompare(b));
  return entries.length > 0
    ? entries.map(([name, value]) => `- ${name}: ${value}`).join("\n")
    : "No memory.";
}

function formatProducts(products: readonly ScoredProduct[]): string {
  if (products.length === 0) {
    return "No products.";
  }
  return products
    .map(
      ({ record, score }, i) =>
        `${i + 1}. [${record.productId}] (score ${score.toFixed(3)})\n${record.textDescription}`
    )
    .join("\n\n");
}

/**
 * System-prompt sections for the generation adapter. History is passed to the
 * model as messages, not rendered here.
 */
export function renderContext(context: Context): string {
  return [
    `USER PROFILE:\n${formatProfile(context.profile)}`,
    `MEMORY:\n${formatMemory(context.memory)}`,
    `PRODUCT CONTEXT:\n${formatProducts(context.retrieved)}`,
  ].join("\n\n");
}
