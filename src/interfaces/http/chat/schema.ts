import { z } from "zod";

/**
 * Zod validation schemas for the chat endpoint.
 *
 * Field names follow the public wire format (snake_case). `chat_id` and
 * `chat_room_id` are both accepted; the core resolves them to one key.
 */
export const ChatRequestSchema = z.object({
  user_id: z.string().min(1),
  chat_id: z.string().min(1).nullish(),
  chat_room_id: z.string().min(1).nullish(),
  message: z.string().trim().min(1),
  request_id: z.string().min(1).max(128).optional(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;

export const RecommendedProductSchema = z.object({
  product_id: z.string(),
  score: z.number(),
  name_fa: z.string().nullable(),
  name_en: z.string().nullable(),
});

export const ChatResponseSchema = z.object({
  request_id: z.string(),
  user_id: z.string(),
  chat_id: z.string(),
  chat_room_id: z.string(),
  response: z.string().nullable(),
  recommended_products: z.array(RecommendedProductSchema),
  memory_facts: z.record(z.string()),
  meta: z.object({
    history_turns: z.number().int(),
    trimmed_turns: z.number().int(),
    index_version: z.number().int(),
    retrieval_degraded: z.boolean(),
  }),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
    })
    .nullable(),
  timestamp: z.string(),
});

export type ChatResponseBody = z.infer<typeof ChatResponseSchema>;
