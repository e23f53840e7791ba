/**
 * Chat HTTP controller.
 *
 * Express handler for POST /api/v1/chat:
 * - Validates the request body with the chat schema
 * - Delegates to ChatUseCase for context assembly and reply generation
 * - Maps the result to the public response shape
 *
 * A reply that could not be generated is still a 200 carrying `error`, so
 * clients get the assembled recommendations either way.
 */
import type { Request, Response } from "express";

import type { ChatResult, ChatUseCase } from "@app/chat/ChatUseCase";
import {
  ChatRequestSchema,
  ChatResponseSchema,
  type ChatResponseBody,
} from "@interfaces/http/chat/schema";
import { parseInput } from "@interfaces/http/validation";

function metadataString(metadata: Record<string, unknown>, field: string): string | null {
  const value = metadata[field];
  return typeof value === "string" && value !== "" ? value : null;
}

export function toChatResponse(result: ChatResult): ChatResponseBody {
  const { context } = result;

  return {
    request_id: result.requestId,
    user_id: context.key.userId,
    chat_id: context.key.chatRoomId,
    chat_room_id: context.key.chatRoomId,
    response: result.reply,
    recommended_products: context.retrieved.map(({ record, score }) => ({
      product_id: record.productId,
      score,
      name_fa: metadataString(record.metadata, "nameFa"),
      name_en: metadataString(record.metadata, "nameEn"),
    })),
    memory_facts: context.memory.facts,
    meta: {
      history_turns: context.meta.historyTurns,
      trimmed_turns: context.meta.trimmedTurns,
      index_version: context.meta.indexVersion,
      retrieval_degraded: context.meta.retrievalDegraded,
    },
    error: result.error,
    timestamp: context.meta.assembledAt,
  };
}

export function createChatController(chat: ChatUseCase) {
  return {
    async chat(req: Request, res: Response): Promise<void> {
      const body = parseInput(ChatRequestSchema, req.body);

      const result = await chat.chat({
        userId: body.user_id,
        chatId: body.chat_id,
        chatRoomId: body.chat_room_id,
        message: body.message,
        ...(body.request_id ? { requestId: body.request_id } : {}),
      });

      res.json(parseInput(ChatResponseSchema, toChatResponse(result), "response"));
    },
  };
}
