import type { PersistenceQueue } from "@app/persistence/PersistenceQueue";
import { InvalidInputError } from "@domain/errors";
import type { MemorySummarizer } from "@domain/memory/MemorySummarizer";
import type { ProfileCache, ProfileCacheStats } from "@domain/profile/ProfileCache";
import { isEmptyPatch, type Profile, type ProfilePatch } from "@domain/profile/types";

/**
 * Profile reads and partial updates. An update is visible to the next read at
 * once; folding it into the memory summary happens in the background.
 */
export class ProfileUseCase {
  constructor(
    private readonly profiles: ProfileCache,
    private readonly memory: MemorySummarizer,
    private readonly queue: PersistenceQueue
  ) {}

  getProfile(userId: string): Promise<Profile> {
    return this.profiles.get(userId);
  }

  async setProfile(userId: string, patch: ProfilePatch): Promise<Profile> {
    if (isEmptyPatch(patch)) {
      throw new InvalidInputError("No profile fields supplied");
    }

    const updated = await this.profiles.update(userId, patch);

    this.queue.submit(
      `profile/${updated.userId}`,
      () => this.memory.recordProfileUpdate(updated),
      "memory.profile"
    );

    return updated;
  }

  cacheStats(): ProfileCacheStats {
    return this.profiles.stats();
  }
}
