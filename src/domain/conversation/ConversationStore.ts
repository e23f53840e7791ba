/**
 * Append-only conversation history per (user, chat room).
 *
 * Each conversation is one document in the `conversations` namespace holding
 * the retained turns and the last sequence number ever assigned. Numbers are
 * handed out under a per-key numbering lock and documents are written under a
 * per-key write lock, so sequence numbers are assigned exactly once and in
 * order, and a slow write never holds up numbering.
 *
 * A chat exchange is staged first: its turns get their numbers and become
 * visible to `recent` and `lastSequenceNo` at once, while the durable write
 * (`commit`) runs later on the persistence queue. Readers merge the stored
 * document with the staged turns it does not cover yet.
 */
import { z } from "zod";

import { InvalidInputError, StoreUnavailableError } from "@domain/errors";
import type {
  AppendOptions,
  ConversationLog,
  TurnInput,
} from "@domain/conversation/ports";
import {
  conversationKeyToString,
  isTurnRole,
  type ConversationKey,
  type Turn,
  type TurnRole,
} from "@domain/conversation/types";
import { storeCall, type DocumentStore } from "@domain/storage/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { KeyedMutex } from "@utils/KeyedMutex";

const TurnSchema = z.object({
  userId: z.string(),
  chatRoomId: z.string(),
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  timestamp: z.string(),
  sequenceNo: z.number().int().positive(),
  requestId: z.string().optional(),
});

const StoredConversationSchema = z.object({
  userId: z.string(),
  chatRoomId: z.string(),
  lastSequenceNo: z.number().int().nonnegative(),
  turns: z.array(TurnSchema),
});

type StoredConversation = z.infer<typeof StoredConversationSchema>;

interface ConversationView {
  stored: StoredConversation;
  /** Staged turns newer than the stored document, oldest first. */
  staged: Turn[];
}

export interface ConversationStoreOptions {
  /** Upper bound for `recent(limit)`. */
  maxWindow: number;
  /** Oldest turns beyond this count are dropped from the stored document. */
  retainTurns?: number;
  now?: () => Date;
}

function emptyConversation(key: ConversationKey): StoredConversation {
  return {
    userId: key.userId,
    chatRoomId: key.chatRoomId,
    lastSequenceNo: 0,
    turns: [],
  };
}

function lastNumber(view: ConversationView): number {
  return view.staged.at(-1)?.sequenceNo ?? view.stored.lastSequenceNo;
}

function validateTurnInput(key: ConversationKey, input: TurnInput): TurnInput {
  const text = typeof input.text === "string" ? input.text.trim() : "";

  if (!text) {
    throw new InvalidInputError("Turn text must not be empty", {
      userId: key.userId,
      chatRoomId: key.chatRoomId,
    });
  }

  if (!isTurnRole(input.role)) {
    throw new InvalidInputError(`Unknown turn role "${String(input.role)}"`);
  }

  return { role: input.role, text };
}

export class ConversationStore implements ConversationLog {
  private readonly numbering = new KeyedMutex();
  private readonly writes = new KeyedMutex();
  private readonly pending = new Map<string, Turn[]>();
  private readonly maxWindow: number;
  private readonly retainTurns: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: DocumentStore,
    options: ConversationStoreOptions
  ) {
    this.maxWindow = Math.max(1, Math.floor(options.maxWindow));
    this.retainTurns = Math.max(this.maxWindow, options.retainTurns ?? 1000);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * A stored document that does not parse, or that belongs to another key,
   * fails the call: treating it as absent would restart numbering at 1.
   */
  private async load(key: ConversationKey): Promise<StoredConversation | null> {
    const storeKey = conversationKeyToString(key);
    const raw = await storeCall("conversation.read", () =>
      this.store.get("conversations", storeKey)
    );

    if (raw === null) {
      return null;
    }

    const parsed = StoredConversationSchema.safeParse(raw);
    if (!parsed.success) {
      logEvent("CONVERSATION_DOCUMENT_INVALID", {
        key: storeKey,
        issues: parsed.error.issues.length,
      });
      throw new StoreUnavailableError("conversation.read", parsed.error, {
        key: storeKey,
        reason: "invalid_document",
      });
    }

    if (parsed.data.userId !== key.userId || parsed.data.chatRoomId !== key.chatRoomId) {
      logEvent("CONVERSATION_DOCUMENT_MISMATCH", { key: storeKey });
      throw new StoreUnavailableError("conversation.read", undefined, {
        key: storeKey,
        reason: "key_mismatch",
      });
    }

    return parsed.data;
  }

  private async view(key: ConversationKey): Promise<ConversationView> {
    // Staged turns are read before the document: a commit landing in between
    // then shows up as stored, never as missing.
    const snapshot = this.pending.get(conversationKeyToString(key)) ?? [];
    const stored = (await this.load(key)) ?? emptyConversation(key);
    const staged = snapshot.filter((turn) => turn.sequenceNo > stored.lastSequenceNo);
    return { stored, staged };
  }

  /** Runs `task` holding both locks of the key, numbering first. */
  private exclusive<T>(key: ConversationKey, task: () => Promise<T>): Promise<T> {
    const storeKey = conversationKeyToString(key);
    return this.numbering.run(storeKey, () => this.writes.run(storeKey, task));
  }

  private findByRequest(view: ConversationView, requestId: string, role: TurnRole): Turn | undefined {
    return [...view.stored.turns, ...view.staged].find(
      (t) => t.requestId === requestId && t.role === role
    );
  }

  private createTurn(
    key: ConversationKey,
    input: TurnInput,
    sequenceNo: number,
    requestId: string | undefined
  ): Turn {
    return {
      userId: key.userId,
      chatRoomId: key.chatRoomId,
      role: input.role,
      text: input.text,
      timestamp: this.now().toISOString(),
      sequenceNo,
      ...(requestId ? { requestId } : {}),
    };
  }

  /** Writes `turns` after the stored ones and drops them from the staging area. */
  private async flush(
    key: ConversationKey,
    stored: StoredConversation,
    turns: readonly Turn[],
    operation: string
  ): Promise<void> {
    const last = turns.at(-1);
    if (!last) {
      return;
    }

    const storeKey = conversationKeyToString(key);
    const all = [...stored.turns, ...turns];
    const next: StoredConversation = {
      ...stored,
      lastSequenceNo: last.sequenceNo,
      turns: all.length > this.retainTurns ? all.slice(-this.retainTurns) : all,
    };

    await storeCall(operation, () => this.store.put("conversations", storeKey, next));

    const remaining = (this.pending.get(storeKey) ?? []).filter(
      (turn) => turn.sequenceNo > last.sequenceNo
    );
    if (remaining.length > 0) {
      this.pending.set(storeKey, remaining);
    } else {
      this.pending.delete(storeKey);
    }
  }

  async append(
    key: ConversationKey,
    role: TurnRole,
    text: string,
    options: AppendOptions = {}
  ): Promise<Turn> {
    const input = validateTurnInput(key, { role, text });

    return this.exclusive(key, async () => {
      const view = await this.view(key);

      const existing = options.requestId
        ? this.findByRequest(view, options.requestId, input.role)
        : undefined;
      if (existing && view.staged.length === 0) {
        return existing;
      }

      // Staged turns are older, so they are written first.
      const turn = existing ?? this.createTurn(key, input, lastNumber(view) + 1, options.requestId);
      await this.flush(
        key,
        view.stored,
        existing ? view.staged : [...view.staged, turn],
        "conversation.append"
      );

      return turn;
    });
  }

  async stage(
    key: ConversationKey,
    inputs: readonly TurnInput[],
    options: AppendOptions = {}
  ): Promise<Turn[]> {
    if (inputs.length === 0) {
      throw new InvalidInputError("Nothing to stage", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
      });
    }
    const valid = inputs.map((input) => validateTurnInput(key, input));
    const storeKey = conversationKeyToString(key);

    return this.numbering.run(storeKey, async () => {
      const view = await this.view(key);
      let sequenceNo = lastNumber(view);
      const created: Turn[] = [];

      const turns = valid.map((input) => {
        const existing = options.requestId
          ? this.findByRequest(view, options.requestId, input.role)
          : undefined;
        if (existing) {
          return existing;
        }
        sequenceNo += 1;
        const turn = this.createTurn(key, input, sequenceNo, options.requestId);
        created.push(turn);
        return turn;
      });

      if (created.length > 0) {
        this.pending.set(storeKey, [...view.staged, ...created]);
      }

      return turns;
    });
  }

  async commit(key: ConversationKey, throughSequenceNo: number): Promise<number> {
    return this.writes.run(conversationKeyToString(key), async () => {
      const view = await this.view(key);
      const turns = view.staged.filter((turn) => turn.sequenceNo <= throughSequenceNo);

      await this.flush(key, view.stored, turns, "conversation.commit");
      return turns.length;
    });
  }

  clampLimit(limit: number): number {
    if (!Number.isFinite(limit) || limit <= 0) {
      return 0;
    }
    return Math.min(Math.floor(limit), this.maxWindow);
  }

  async recent(key: ConversationKey, limit: number): Promise<Turn[]> {
    const bounded = this.clampLimit(limit);
    if (bounded === 0) {
      return [];
    }

    const { stored, staged } = await this.view(key);
    return [...stored.turns, ...staged].slice(-bounded);
  }

  async lastSequenceNo(key: ConversationKey): Promise<number> {
    return lastNumber(await this.view(key));
  }

  async clear(key: ConversationKey): Promise<number> {
    const storeKey = conversationKeyToString(key);

    return this.exclusive(key, async () => {
      const view = await this.view(key);
      const removed = view.stored.turns.length + view.staged.length;

      if (removed === 0) {
        return 0;
      }

      // Keep the counter so numbers are never reused after a clear.
      await storeCall("conversation.clear", () =>
        this.store.put("conversations", storeKey, {
          ...view.stored,
          lastSequenceNo: lastNumber(view),
          turns: [],
        })
      );
      this.pending.delete(storeKey);

      logEvent("CONVERSATION_CLEARED", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
        removed,
      });

      return removed;
    });
  }
}
