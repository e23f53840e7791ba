import type { Request, Response } from "express";

import type { ConversationUseCase } from "@app/conversation/ConversationUseCase";
import { normalizeConversationKey, type ConversationKey } from "@domain/conversation/types";
import { ConversationQuerySchema } from "@interfaces/http/conversation/schema";
import { parseInput } from "@interfaces/http/validation";

function keyFrom(req: Request<{ userId: string }>): { key: ConversationKey; limit?: number } {
  const query = parseInput(ConversationQuerySchema, req.query, "query");
  const key = normalizeConversationKey({
    userId: req.params.userId,
    chatId: query.chat_id,
    chatRoomId: query.chat_room_id,
  });
  return query.limit === undefined ? { key } : { key, limit: query.limit };
}

/** Conversation history and memory summary endpoints. */
export function createConversationController(conversations: ConversationUseCase) {
  return {
    async history(req: Request<{ userId: string }>, res: Response): Promise<void> {
      const { key, limit } = keyFrom(req);
      const turns = await conversations.getHistory(key, limit);

      res.json({
        user_id: key.userId,
        chat_id: key.chatRoomId,
        chat_room_id: key.chatRoomId,
        messages: turns.map((turn) => ({
          role: turn.role,
          text: turn.text,
          timestamp: turn.timestamp,
          sequence_no: turn.sequenceNo,
        })),
        total_count: turns.length,
      });
    },

    async clear(req: Request<{ userId: string }>, res: Response): Promise<void> {
      const { key } = keyFrom(req);
      const removed = await conversations.clearHistory(key);

      res.json({
        user_id: key.userId,
        chat_room_id: key.chatRoomId,
        removed,
      });
    },

    async memory(req: Request<{ userId: string }>, res: Response): Promise<void> {
      const summary = await conversations.getMemory(req.params.userId);

      res.json({
        user_id: summary.userId,
        facts: summary.facts,
        evidence_count: summary.evidenceCount,
        last_updated: summary.lastUpdated,
      });
    },
  };
}
