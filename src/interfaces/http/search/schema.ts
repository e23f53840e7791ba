import { z } from "zod";

/**
 * Zod validation schema for product search: the raw retrieval step of a chat
 * turn, exposed for debugging and catalog checks.
 */
export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  limit: z.number().int().min(1).optional(),
});
