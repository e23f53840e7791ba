/**
 * Main chat orchestration: context assembly, reply generation and the
 * background commit of the exchange.
 *
 * One chat turn:
 * - resolves the conversation key and loads the profile (read-through cache)
 * - assembles history, memory and retrieved products into one context
 * - asks the generation adapter for a reply
 * - stages both turns, numbered and visible to the next read of the key
 * - hands their durable commit and the memory summarizer to the persistence
 *   queue
 *
 * Serves /api/v1/chat.
 */
import crypto from "crypto";

import type { PersistenceQueue } from "@app/persistence/PersistenceQueue";
import type { ContextAssembler } from "@domain/context/ContextAssembler";
import type { Context } from "@domain/context/types";
import type { ConversationLog } from "@domain/conversation/ports";
import {
  conversationKeyToString,
  normalizeConversationKey,
  type ConversationKey,
} from "@domain/conversation/types";
import { GenerationUnavailableError, InvalidInputError } from "@domain/errors";
import type { GenerationPort } from "@domain/llm/ports";
import type { MemorySummarizer } from "@domain/memory/MemorySummarizer";
import type { ProfileCache } from "@domain/profile/ProfileCache";
import { logEvent } from "@infrastructure/logging/Logger";

export interface ChatRequest {
  userId: string;
  chatId?: string | null;
  chatRoomId?: string | null;
  message: string;
  requestId?: string;
}

export interface ChatFailure {
  code: string;
  message: string;
}

export interface ChatResult {
  requestId: string;
  context: Context;
  reply: string | null;
  error: ChatFailure | null;
}

export interface ChatUseCaseDeps {
  profiles: ProfileCache;
  assembler: ContextAssembler;
  conversations: ConversationLog;
  memory: MemorySummarizer;
  queue: PersistenceQueue;
  /** Null when no model is configured; chat then reports GENERATION_UNAVAILABLE. */
  generator: GenerationPort | null;
}

export class ChatUseCase {
  constructor(private readonly deps: ChatUseCaseDeps) {}

  async handleTurn(
    userId: string,
    chatRoomId: string | null | undefined,
    message: string
  ): Promise<Context> {
    const key = normalizeConversationKey({ userId, chatRoomId });
    return this.assemble(key, message);
  }

  private async assemble(key: ConversationKey, message: string): Promise<Context> {
    if (typeof message !== "string" || !message.trim()) {
      throw new InvalidInputError("Message must not be empty", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
      });
    }

    const profile = await this.deps.profiles.get(key.userId);
    return this.deps.assembler.assemble(key, profile, message);
  }

  /**
   * Stages both turns of an exchange under the conversation lock, so the next
   * read of this key sees them, then queues their durable commit and memory
   * observation. Safe to retry: turns are keyed by `requestId`, observation
   * by sequence number.
   */
  async submitFollowup(
    key: ConversationKey,
    userText: string,
    assistantText: string,
    requestId: string = crypto.randomUUID()
  ): Promise<string> {
    if (!userText.trim() || !assistantText.trim()) {
      throw new InvalidInputError("Both turns of an exchange must be non-empty", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
      });
    }

    const { conversations, memory, queue } = this.deps;

    const turns = await conversations.stage(
      key,
      [
        { role: "user", text: userText },
        { role: "assistant", text: assistantText },
      ],
      { requestId }
    );
    const throughSequenceNo = Math.max(...turns.map((turn) => turn.sequenceNo));

    queue.submit(
      conversationKeyToString(key),
      async () => {
        await conversations.commit(key, throughSequenceNo);
        for (const turn of turns) {
          await memory.observe(key.userId, turn);
        }
      },
      "turn.commit"
    );

    return requestId;
  }

  async chat(request: ChatRequest): Promise<ChatResult> {
    const key = normalizeConversationKey(request);
    const requestId = request.requestId ?? crypto.randomUUID();
    const startedAt = Date.now();

    const context = await this.assemble(key, request.message);

    let reply: string;
    try {
      if (!this.deps.generator) {
        throw new GenerationUnavailableError("Reply generation is not configured");
      }
      reply = await this.deps.generator.generate(context);
    } catch (error: unknown) {
      if (!(error instanceof GenerationUnavailableError)) {
        throw error;
      }

      // Nothing is persisted for a turn that got no reply.
      logEvent("CHAT_GENERATION_UNAVAILABLE", {
        userId: key.userId,
        chatRoomId: key.chatRoomId,
        requestId,
        message: error.message,
      });

      return {
        requestId,
        context,
        reply: null,
        error: { code: error.code, message: error.message },
      };
    }

    await this.submitFollowup(key, context.pending.text, reply, requestId);

    logEvent("CHAT_TURN_COMPLETED", {
      userId: key.userId,
      chatRoomId: key.chatRoomId,
      requestId,
      historyTurns: context.meta.historyTurns,
      retrieved: context.retrieved.length,
      durationMs: Date.now() - startedAt,
    });

    return { requestId, context, reply, error: null };
  }
}
