import { z } from "zod";

/**
 * Partial profile update. Omitted fields are left untouched; `null` clears
 * `skin_type` or `age`. `skin_concerns` (the historical name) and `concerns`
 * are interchangeable.
 */
export const ProfilePatchSchema = z
  .object({
    skin_type: z.string().max(64).nullable().optional(),
    age: z.number().int().min(0).max(150).nullable().optional(),
    skin_concerns: z.array(z.string().max(64)).max(50).optional(),
    concerns: z.array(z.string().max(64)).max(50).optional(),
    preferences: z
      .record(z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value)))
      .optional(),
  })
  .strict();

export type ProfilePatchBody = z.infer<typeof ProfilePatchSchema>;

export const ProfileResponseSchema = z.object({
  user_id: z.string(),
  skin_type: z.string().nullable(),
  age: z.number().int().nullable(),
  skin_concerns: z.array(z.string()),
  preferences: z.record(z.string()),
  updated_at: z.string().nullable(),
});

export type ProfileResponseBody = z.infer<typeof ProfileResponseSchema>;
