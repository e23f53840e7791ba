import { z } from "zod";

export interface Profile {
  userId: string;
  skinType: string | null;
  age: number | null;
  /** Set semantics: deduplicated, in order of first appearance. */
  concerns: string[];
  preferences: Record<string, string>;
  updatedAt: string | null;
}

/**
 * Partial profile update. A field left undefined is not present and keeps the
 * stored value; `null` clears `skinType`/`age`; `concerns` and `preferences`
 * replace the stored value wholesale when present.
 */
export interface ProfilePatch {
  skinType?: string | null;
  age?: number | null;
  concerns?: string[];
  preferences?: Record<string, string>;
}

export const ProfileSchema = z.object({
  userId: z.string(),
  skinType: z.string().nullable(),
  age: z.number().int().nullable(),
  concerns: z.array(z.string()),
  preferences: z.record(z.string()),
  updatedAt: z.string().nullable(),
});

export function defaultProfile(userId: string): Profile {
  return {
    userId,
    skinType: null,
    age: null,
    concerns: [],
    preferences: {},
    updatedAt: null,
  };
}

function normalizeConcerns(concerns: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const raw of concerns) {
    const concern = raw.trim();
    if (concern && !seen.has(concern)) {
      seen.add(concern);
      out.push(concern);
    }
  }

  return out;
}

function normalizeText(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

/**
 * Pure field-by-field merge; the input profile is never mutated.
 */
export function applyProfilePatch(
  current: Profile,
  patch: ProfilePatch,
  now: Date
): Profile {
  return {
    userId: current.userId,
    skinType:
      patch.skinType !== undefined ? normalizeText(patch.skinType) : current.skinType,
    age: patch.age !== undefined ? patch.age : current.age,
    concerns:
      patch.concerns !== undefined
        ? normalizeConcerns(patch.concerns)
        : [...current.concerns],
    preferences:
      patch.preferences !== undefined
        ? { ...patch.preferences }
        : { ...current.preferences },
    updatedAt: now.toISOString(),
  };
}

export function isEmptyPatch(patch: ProfilePatch): boolean {
  return (
    patch.skinType === undefined &&
    patch.age === undefined &&
    patch.concerns === undefined &&
    patch.preferences === undefined
  );
}
