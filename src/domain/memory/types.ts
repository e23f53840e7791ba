import { z } from "zod";

export interface MemorySummary {
  userId: string;
  facts: Record<string, string>;
  /** Distinct observed turns that contributed at least one fact. */
  evidenceCount: number;
  lastUpdated: string | null;
}

export const StoredMemorySummarySchema = z.object({
  userId: z.string(),
  facts: z.record(z.string()),
  evidenceCount: z.number().int().nonnegative(),
  lastUpdated: z.string().nullable(),
  /** Highest sequence number observed per chat room. */
  observedThrough: z.record(z.number().int().nonnegative()),
  /** When each fact was last set from the profile; older turns cannot override it. */
  statedAt: z.record(z.string()).default({}),
});

export type StoredMemorySummary = z.infer<typeof StoredMemorySummarySchema>;

export function emptySummary(userId: string): MemorySummary {
  return {
    userId,
    facts: {},
    evidenceCount: 0,
    lastUpdated: null,
  };
}

export const FACT_KEYS = {
  skinType: "skin_type",
  age: "age",
  concernPrefix: "concern.",
  preferencePrefix: "preference.",
} as const;
