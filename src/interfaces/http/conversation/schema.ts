import { z } from "zod";

/** Query string of the conversation endpoints. */
export const ConversationQuerySchema = z.object({
  chat_id: z.string().min(1).optional(),
  chat_room_id: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(0).optional(),
});

export const TurnResponseSchema = z.object({
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  timestamp: z.string(),
  sequence_no: z.number().int(),
});
