/**
 * Read-through LRU cache of user profiles.
 *
 * The persisted `profiles` namespace is the source of truth; the cache only
 * accelerates reads. Misses and stale entries are refreshed under the same
 * per-user mutex that serializes updates, so a refresh can never reinstall a
 * value older than a concurrent update.
 */
import { InvalidInputError } from "@domain/errors";
import { validateId } from "@domain/conversation/types";
import {
  applyProfilePatch,
  defaultProfile,
  ProfileSchema,
  type Profile,
  type ProfilePatch,
} from "@domain/profile/types";
import { storeCall, type DocumentStore } from "@domain/storage/ports";
import { logEvent } from "@infrastructure/logging/Logger";
import { KeyedMutex } from "@utils/KeyedMutex";

interface CacheEntry {
  profile: Profile;
  loadedAt: number;
}

export interface ProfileCacheOptions {
  capacity: number;
  ttlMs: number;
  now?: () => number;
}

export interface ProfileCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

function cloneProfile(profile: Profile): Profile {
  return {
    ...profile,
    concerns: [...profile.concerns],
    preferences: { ...profile.preferences },
  };
}

const MAX_AGE = 150;

const PATCH_FIELDS: readonly (keyof ProfilePatch)[] = [
  "skinType",
  "age",
  "concerns",
  "preferences",
];

function validatePatch(patch: ProfilePatch): void {
  if (patch.age !== undefined && patch.age !== null) {
    if (!Number.isInteger(patch.age) || patch.age < 0 || patch.age > MAX_AGE) {
      throw new InvalidInputError("age must be an integer between 0 and 150", {
        field: "age",
      });
    }
  }
}

export class ProfileCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly locks = new KeyedMutex();
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(
    private readonly store: DocumentStore,
    options: ProfileCacheOptions
  ) {
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  private freshEntry(userId: string): CacheEntry | null {
    const entry = this.entries.get(userId);
    if (!entry) {
      return null;
    }
    if (this.now() - entry.loadedAt >= this.ttlMs) {
      return null;
    }
    return entry;
  }

  private install(profile: Profile): void {
    this.entries.delete(profile.userId);
    this.entries.set(profile.userId, {
      profile: cloneProfile(profile),
      loadedAt: this.now(),
    });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  private async loadPersisted(userId: string): Promise<Profile | null> {
    const raw = await storeCall("profile.read", () => this.store.get("profiles", userId));
    if (raw === null) {
      return null;
    }

    const parsed = ProfileSchema.safeParse(raw);
    if (!parsed.success) {
      logEvent("PROFILE_DOCUMENT_INVALID", {
        userId,
        issues: parsed.error.issues.length,
      });
      return null;
    }

    return parsed.data;
  }

  async get(userId: string): Promise<Profile> {
    const id = validateId(userId, "userId");

    const cached = this.freshEntry(id);
    if (cached) {
      this.hits++;
      this.entries.delete(id);
      this.entries.set(id, cached);
      return cloneProfile(cached.profile);
    }

    this.misses++;

    return this.locks.run(id, async () => {
      // Another caller may have refreshed while we waited for the lock.
      const refreshed = this.freshEntry(id);
      if (refreshed) {
        return cloneProfile(refreshed.profile);
      }

      const persisted = await this.loadPersisted(id);
      const profile = persisted ?? defaultProfile(id);

      if (!persisted) {
        await storeCall("profile.seed", () => this.store.put("profiles", id, profile));
        logEvent("PROFILE_SEEDED", { userId: id });
      }

      this.install(profile);
      return cloneProfile(profile);
    });
  }

  async update(userId: string, patch: ProfilePatch): Promise<Profile> {
    const id = validateId(userId, "userId");
    validatePatch(patch);

    return this.locks.run(id, async () => {
      const current = (await this.loadPersisted(id)) ?? defaultProfile(id);
      const next = applyProfilePatch(current, patch, new Date(this.now()));

      await storeCall("profile.update", () => this.store.put("profiles", id, next));

      this.install(next);

      logEvent("PROFILE_UPDATED", {
        userId: id,
        fields: PATCH_FIELDS.filter((field) => patch[field] !== undefined),
      });

      return cloneProfile(next);
    });
  }

  invalidate(userId: string): boolean {
    return this.entries.delete(userId);
  }

  stats(): ProfileCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
