/**
 * Per-user memory summary derived from conversation turns and profile edits.
 *
 * Provides the long-term memory side of the assistant:
 * - Mines user turns for durable attributes (skin type, concerns, age)
 * - Merges them into one summary per user, later values superseding earlier
 * - Deduplicates observations by (chat room, sequence number)
 * - Folds explicit profile updates into the same fact set; a turn said
 *   before such an update cannot override the stated value
 *
 * Observation runs from the background persistence queue, never on the
 * request path, so a summary may briefly lag the latest turn.
 */
import type { Turn } from "@domain/conversation/types";
import {
  emptySummary,
  FACT_KEYS,
  StoredMemorySummarySchema,
  type MemorySummary,
  type StoredMemorySummary,
} from "@domain/memory/types";
import { extractFacts } from "@domain/memory/signals";
import { StoreUnavailableError } from "@domain/errors";
import type { Profile } from "@domain/profile/types";
import { storeCall, type DocumentStore } from "@domain/storage/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { KeyedMutex } from "@utils/KeyedMutex";

export type FactExtractor = (text: string) => Record<string, string>;

export interface MemorySummarizerOptions {
  extractor?: FactExtractor;
  now?: () => Date;
}

function emptyStored(userId: string): StoredMemorySummary {
  return { ...emptySummary(userId), observedThrough: {}, statedAt: {} };
}

function toPublic(stored: StoredMemorySummary): MemorySummary {
  return {
    userId: stored.userId,
    facts: { ...stored.facts },
    evidenceCount: stored.evidenceCount,
    lastUpdated: stored.lastUpdated,
  };
}

export class MemorySummarizer {
  private readonly locks = new KeyedMutex();
  private readonly extractor: FactExtractor;
  private readonly now: () => Date;

  constructor(
    private readonly store: DocumentStore,
    options: MemorySummarizerOptions = {}
  ) {
    this.extractor = options.extractor ?? extractFacts;
    this.now = options.now ?? (() => new Date());
  }

  private async load(userId: string): Promise<StoredMemorySummary | null> {
    const raw = await storeCall("memory.read", () =>
      this.store.get("memory-summaries", userId)
    );
    if (raw === null) {
      return null;
    }

    const parsed = StoredMemorySummarySchema.safeParse(raw);
    if (!parsed.success) {
      logEvent("MEMORY_DOCUMENT_INVALID", {
        userId,
        issues: parsed.error.issues.length,
      });
      throw new StoreUnavailableError("memory.read", parsed.error, {
        userId,
        reason: "invalid_document",
      });
    }
    return parsed.data;
  }

  private async save(summary: StoredMemorySummary): Promise<void> {
    await storeCall("memory.write", () =>
      this.store.put("memory-summaries", summary.userId, summary)
    );
  }

  async observe(userId: string, turn: Turn): Promise<void> {
    await this.locks.run(userId, async () => {
      const current = (await this.load(userId)) ?? emptyStored(userId);

      const mark = current.observedThrough[turn.chatRoomId] ?? 0;
      if (turn.sequenceNo <= mark) {
        logEvent("MEMORY_OBSERVE_SKIPPED", {
          userId,
          chatRoomId: turn.chatRoomId,
          sequenceNo: turn.sequenceNo,
        });
        return;
      }

      const extracted = turn.role === "user" ? this.extractor(turn.text) : {};
      const facts: Record<string, string> = {};
      const shadowed: string[] = [];

      for (const [name, value] of Object.entries(extracted)) {
        const stated = current.statedAt[name];
        if (stated !== undefined && stated >= turn.timestamp) {
          shadowed.push(name);
        } else {
          facts[name] = value;
        }
      }
      const detected = Object.keys(facts);

      const next: StoredMemorySummary = {
        ...current,
        facts: { ...current.facts, ...facts },
        evidenceCount: current.evidenceCount + (detected.length > 0 ? 1 : 0),
        lastUpdated:
          detected.length > 0 ? this.now().toISOString() : current.lastUpdated,
        observedThrough: {
          ...current.observedThrough,
          [turn.chatRoomId]: turn.sequenceNo,
        },
      };

      await this.save(next);

      if (shadowed.length > 0) {
        logEvent("MEMORY_FACTS_SHADOWED", {
          userId,
          chatRoomId: turn.chatRoomId,
          sequenceNo: turn.sequenceNo,
          keys: shadowed,
        });
      }

      if (detected.length > 0) {
        logEvent("MEMORY_FACTS_MERGED", {
          userId,
          chatRoomId: turn.chatRoomId,
          sequenceNo: turn.sequenceNo,
          keys: detected,
          evidenceCount: next.evidenceCount,
        });
      }
    });
  }

  /**
   * Explicit profile values supersede the matching facts. Not counted as
   * evidence: nothing was observed.
   */
  async recordProfileUpdate(profile: Profile): Promise<void> {
    const facts: Record<string, string> = {};

    if (profile.skinType) {
      facts[FACT_KEYS.skinType] = profile.skinType;
    }
    if (profile.age !== null) {
      facts[FACT_KEYS.age] = String(profile.age);
    }
    for (const concern of profile.concerns) {
      facts[`${FACT_KEYS.concernPrefix}${concern}`] = "stated";
    }
    for (const [name, value] of Object.entries(profile.preferences)) {
      facts[`${FACT_KEYS.preferencePrefix}${name}`] = value;
    }

    if (Object.keys(facts).length === 0) {
      return;
    }

    await this.locks.run(profile.userId, async () => {
      const current = (await this.load(profile.userId)) ?? emptyStored(profile.userId);
      const at = this.now().toISOString();

      await this.save({
        ...current,
        facts: { ...current.facts, ...facts },
        lastUpdated: at,
        statedAt: {
          ...current.statedAt,
          ...Object.fromEntries(Object.keys(facts).map((name) => [name, at])),
        },
      });
    });
  }

  async summaryFor(userId: string): Promise<MemorySummary> {
    const stored = await this.load(userId);
    return stored ? toPublic(stored) : emptySummary(userId);
  }
}
