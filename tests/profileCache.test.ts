import { describe, it, expect } from "vitest";

import { InvalidInputError } from "@domain/errors";
import { ProfileCache } from "@domain/profile/ProfileCache";
import { applyProfilePatch, defaultProfile, isEmptyPatch } from "@domain/profile/types";
import { InMemoryDocumentStore } from "@infrastructure/store/InMemoryDocumentStore";

function createCache(options: { capacity?: number; ttlMs?: number; now?: () => number } = {}) {
  const documents = new InMemoryDocumentStore();
  const cache = new ProfileCache(documents, {
    capacity: options.capacity ?? 10,
    ttlMs: options.ttlMs ?? 60_000,
    now: options.now ?? (() => Date.parse("2026-02-01T00:00:00.000Z")),
  });
  return { documents, cache };
}

describe("ProfileCache", () => {
  it("should seed and persist a default profile for a new user", async () => {
    const { documents, cache } = createCache();

    const profile = await cache.get("u1");

    expect(profile).toEqual(defaultProfile("u1"));
    expect(documents.count("profiles")).toBe(1);
    expect(await documents.get("profiles", "u1")).toEqual(defaultProfile("u1"));
  });

  it("should merge partial updates field by field", async () => {
    const { cache } = createCache();

    await cache.update("u1", { skinType: "oily", age: 30 });
    const updated = await cache.update("u1", { concerns: ["acne", "acne", " redness "] });

    expect(updated).toEqual({
      userId: "u1",
      skinType: "oily",
      age: 30,
      concerns: ["acne", "redness"],
      preferences: {},
      updatedAt: "2026-02-01T00:00:00.000Z",
    });
  });

  it("should clear a field set to null", async () => {
    const { cache } = createCache();

    await cache.update("u1", { skinType: "dry", age: 41 });
    const cleared = await cache.update("u1", { skinType: null });

    expect(cleared.skinType).toBeNull();
    expect(cleared.age).toBe(41);
  });

  it("should reject an out-of-range age", async () => {
    const { documents, cache } = createCache();

    await expect(cache.update("u1", { age: 200 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(cache.update("u1", { age: 2.5 })).rejects.toBeInstanceOf(InvalidInputError);
    expect(documents.count("profiles")).toBe(0);
  });

  it("should serve an update from the cache on the next read", async () => {
    const { cache } = createCache();

    await cache.get("u1");
    await cache.update("u1", { preferences: { texture: "gel" } });
    const profile = await cache.get("u1");

    expect(profile.preferences).toEqual({ texture: "gel" });
    expect(cache.stats().hits).toBe(1);
  });

  it("should evict the least recently used entry at capacity", async () => {
    const { cache } = createCache({ capacity: 2 });

    await cache.get("u1");
    await cache.get("u2");
    await cache.get("u1");
    await cache.get("u3");

    expect(cache.stats()).toEqual({
      size: 2,
      capacity: 2,
      hits: 1,
      misses: 3,
      evictions: 1,
    });

    await cache.get("u1");
    expect(cache.stats().hits).toBe(2);
    await cache.get("u2");
    expect(cache.stats().misses).toBe(4);
  });

  it("should reload entries older than the ttl", async () => {
    let clock = 0;
    const { cache } = createCache({ ttlMs: 1000, now: () => clock });

    await cache.get("u1");
    clock = 999;
    await cache.get("u1");
    clock = 1000;
    await cache.get("u1");

    expect(cache.stats().hits).toBe(1);
    expect(cache.stats().misses).toBe(2);
  });

  it("should pick up changes written by another instance after expiry", async () => {
    let clock = 0;
    const documents = new InMemoryDocumentStore();
    const reader = new ProfileCache(documents, { capacity: 10, ttlMs: 1000, now: () => clock });
    const writer = new ProfileCache(documents, { capacity: 10, ttlMs: 1000, now: () => clock });

    await reader.get("u1");
    await writer.update("u1", { skinType: "sensitive" });

    expect((await reader.get("u1")).skinType).toBeNull();
    clock = 1000;
    expect((await reader.get("u1")).skinType).toBe("sensitive");
  });

  it("should hand out copies that cannot change the cached profile", async () => {
    const { cache } = createCache();

    const profile = await cache.get("u1");
    profile.concerns.push("acne");
    profile.preferences.brand = "any";

    const again = await cache.get("u1");
    expect(again.concerns).toEqual([]);
    expect(again.preferences).toEqual({});
  });

  it("should reject malformed user ids", async () => {
    const { cache } = createCache();

    await expect(cache.get("bad id")).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe("applyProfilePatch", () => {
  it("should leave the input profile untouched", () => {
    const current = { ...defaultProfile("u1"), concerns: ["acne"] };

    const next = applyProfilePatch(current, { concerns: ["redness"] }, new Date(0));

    expect(current.concerns).toEqual(["acne"]);
    expect(next.concerns).toEqual(["redness"]);
    expect(next.updatedAt).toBe("1970-01-01T00:00:00.000Z");
  });

  it("should treat a blank skin type as cleared", () => {
    const next = applyProfilePatch(
      { ...defaultProfile("u1"), skinType: "oily" },
      { skinType: "  " },
      new Date(0)
    );

    expect(next.skinType).toBeNull();
  });
});

describe("isEmptyPatch", () => {
  it("should only count fields that are present", () => {
    expect(isEmptyPatch({})).toBe(true);
    expect(isEmptyPatch({ age: null })).toBe(false);
  });
});
