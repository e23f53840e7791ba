import path from "path";

import { describe, it, expect } from "vitest";

import { createEngine, type Engine, type EngineSettings } from "@app/engine";
import { renderContext } from "@domain/context/ContextAssembler";
import type { Context } from "@domain/context/types";
import type { ConversationKey } from "@domain/conversation/types";
import { GenerationUnavailableError, InvalidInputError } from "@domain/errors";
import type { GenerationPort } from "@domain/llm/ports";
import { InMemoryDocumentStore } from "@infrastructure/store/InMemoryDocumentStore";

import {
  GatedDocumentStore,
  noSleep,
  SKINCARE_VOCABULARY,
  testSettings,
  VocabularyEmbedder,
} from "./helpers";

const CATALOG = [
  { productId: "p1", textDescription: "ضد آفتاب SPF50 برای پوست چرب" },
  { productId: "p2", textDescription: "ضد آفتاب مینرال" },
  { productId: "p3", textDescription: "کرم آبرسان پوست خشک" },
];

const REPLY = "ضد آفتاب SPF50 برای پوست چرب مناسب شماست.";
const defaultRoom: ConversationKey = { userId: "u1", chatRoomId: "default" };

class ScriptedGenerator implements GenerationPort {
  readonly model = "scripted";
  readonly contexts: Context[] = [];
  failure: Error | null = null;

  async generate(context: Context): Promise<string> {
    this.contexts.push(context);
    if (this.failure) {
      throw this.failure;
    }
    return REPLY;
  }
}

function createTestEngine(
  options: { generator?: GenerationPort | null; settings?: EngineSettings } = {}
): { engine: Engine; documents: InMemoryDocumentStore } {
  const documents = new InMemoryDocumentStore();
  const engine = createEngine({
    store: documents,
    embedder: new VocabularyEmbedder(SKINCARE_VOCABULARY),
    generator: options.generator === undefined ? new ScriptedGenerator() : options.generator,
    settings: options.settings ?? testSettings(),
    sleep: noSleep,
  });
  return { engine, documents };
}

async function withCatalog(engine: Engine): Promise<void> {
  engine.catalog.reindex(CATALOG);
  await engine.queue.onIdle();
}

describe("chat engine", () => {
  it("should answer, then commit the exchange and its memory in the background", async () => {
    const generator = new ScriptedGenerator();
    const { engine } = createTestEngine({ generator });
    await withCatalog(engine);

    const result = await engine.chat.chat({
      userId: "u1",
      message: "من پوست چرب دارم، ضد آفتاب میخوام",
      requestId: "req-1",
    });

    expect(result.requestId).toBe("req-1");
    expect(result.reply).toBe(REPLY);
    expect(result.error).toBeNull();
    expect(result.context.retrieved.map((r) => r.record.productId)).toEqual(["p1", "p2", "p3"]);
    expect(result.context.retrieved[0]?.score).toBeCloseTo(1, 10);

    await engine.queue.onIdle();

    const history = await engine.conversations.getHistory(defaultRoom);
    expect(history.map((t) => [t.sequenceNo, t.role, t.text])).toEqual([
      [1, "user", "من پوست چرب دارم، ضد آفتاب میخوام"],
      [2, "assistant", REPLY],
    ]);

    const memory = await engine.conversations.getMemory("u1");
    expect(memory.facts).toEqual({
      skin_type: "oily",
      "concern.sun_protection": "mentioned",
    });
    expect(memory.evidenceCount).toBe(1);
  });

  it("should carry earlier turns and memory into the next context", async () => {
    const generator = new ScriptedGenerator();
    const { engine } = createTestEngine({ generator });
    await withCatalog(engine);

    await engine.chat.chat({ userId: "u1", message: "من پوست چرب دارم" });
    await engine.queue.onIdle();
    const second = await engine.chat.chat({ userId: "u1", message: "ممنون" });

    expect(second.context.history.map((h) => [h.sequenceNo, h.pending])).toEqual([
      [1, false],
      [2, false],
      [3, true],
    ]);
    expect(second.context.memory.facts).toEqual({ skin_type: "oily" });
    expect(generator.contexts).toHaveLength(2);
  });

  it("should report a failed generation without persisting anything", async () => {
    const generator = new ScriptedGenerator();
    generator.failure = new GenerationUnavailableError("Reply generation failed");
    const { engine } = createTestEngine({ generator });
    await withCatalog(engine);

    const result = await engine.chat.chat({ userId: "u1", message: "ضد آفتاب میخوام" });
    await engine.queue.onIdle();

    expect(result.reply).toBeNull();
    expect(result.error).toEqual({
      code: "GENERATION_UNAVAILABLE",
      message: "Reply generation failed",
    });
    expect(result.context.retrieved.map((r) => r.record.productId)).toEqual(["p2", "p1", "p3"]);
    expect(await engine.conversations.getHistory(defaultRoom)).toEqual([]);
    expect(engine.queue.stats().completed).toBe(1);
  });

  it("should report generation as unavailable when no model is configured", async () => {
    const { engine } = createTestEngine({ generator: null });

    const result = await engine.chat.chat({ userId: "u1", message: "سلام" });

    expect(result.error).toEqual({
      code: "GENERATION_UNAVAILABLE",
      message: "Reply generation is not configured",
    });
  });

  it("should propagate errors that are not generation failures", async () => {
    const generator = new ScriptedGenerator();
    generator.failure = new Error("unexpected");
    const { engine } = createTestEngine({ generator });

    await expect(engine.chat.chat({ userId: "u1", message: "سلام" })).rejects.toThrow(
      "unexpected"
    );
  });

  it("should resolve chat_id before chat_room_id", async () => {
    const { engine } = createTestEngine();

    const result = await engine.chat.chat({
      userId: "u1",
      chatId: "c1",
      chatRoomId: "r1",
      message: "سلام",
    });
    await engine.queue.onIdle();

    expect(result.context.key).toEqual({ userId: "u1", chatRoomId: "c1" });
    const c1 = await engine.conversations.getHistory({ userId: "u1", chatRoomId: "c1" });
    const r1 = await engine.conversations.getHistory({ userId: "u1", chatRoomId: "r1" });
    expect(c1).toHaveLength(2);
    expect(r1).toEqual([]);
  });

  it("should not duplicate turns when a request is replayed", async () => {
    const { engine } = createTestEngine();

    await engine.chat.chat({ userId: "u1", message: "سلام", requestId: "req-7" });
    await engine.queue.onIdle();
    await engine.chat.chat({ userId: "u1", message: "سلام", requestId: "req-7" });
    await engine.queue.onIdle();

    expect(await engine.conversations.getHistory(defaultRoom)).toHaveLength(2);
  });

  it("should reject an empty message before touching the store", async () => {
    const generator = new ScriptedGenerator();
    const { engine, documents } = createTestEngine({ generator });

    await expect(engine.chat.chat({ userId: "u1", message: "  " })).rejects.toBeInstanceOf(
      InvalidInputError
    );
    expect(generator.contexts).toEqual([]);
    expect(documents.count()).toBe(0);
  });

  it("should assemble a context without generating through handleTurn", async () => {
    const { engine } = createTestEngine();
    await withCatalog(engine);

    const context = await engine.chat.handleTurn("u1", "r1", "ضد آفتاب");

    expect(context.key).toEqual({ userId: "u1", chatRoomId: "r1" });
    expect(context.retrieved.map((r) => r.record.productId)).toEqual(["p2", "p1", "p3"]);
  });

  it("should commit an exchange submitted directly", async () => {
    const { engine } = createTestEngine();

    const submit = () =>
      engine.chat.submitFollowup(defaultRoom, "I have acne", "Try a gentle gel.", "req-9");
    const requestId = await submit();
    await submit();
    await engine.queue.onIdle();

    expect(requestId).toBe("req-9");
    expect(await engine.conversations.getHistory(defaultRoom)).toHaveLength(2);
    expect((await engine.conversations.getMemory("u1")).facts).toEqual({
      "concern.acne": "mentioned",
    });
    await expect(engine.chat.submitFollowup(defaultRoom, "hi", " ")).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it("should show the previous exchange to the next turn while its commit is still writing", async () => {
    const documents = new GatedDocumentStore();
    const engine = createEngine({
      store: documents,
      embedder: new VocabularyEmbedder(SKINCARE_VOCABULARY),
      generator: new ScriptedGenerator(),
      settings: testSettings(),
      sleep: noSleep,
    });
    documents.holdWrites("conversations");

    const first = await engine.chat.chat({ userId: "u1", message: "first message" });
    const second = await engine.chat.chat({ userId: "u1", message: "second message" });

    expect(first.context.pending.sequenceNo).toBe(1);
    expect(second.context.pending.sequenceNo).toBe(3);
    expect(second.context.history.map((h) => [h.sequenceNo, h.text, h.pending])).toEqual([
      [1, "first message", false],
      [2, REPLY, false],
      [3, "second message", true],
    ]);
    expect(await documents.get("conversations", "u1:default")).toBeNull();

    documents.releaseWrites();
    await engine.queue.onIdle();

    const history = await engine.conversations.getHistory(defaultRoom);
    expect(history.map((t) => t.sequenceNo)).toEqual([1, 2, 3, 4]);
    expect(await documents.get("conversations", "u1:default")).toMatchObject({
      lastSequenceNo: 4,
    });
  });

  it("should keep memory when history is cleared", async () => {
    const { engine } = createTestEngine();
    await engine.chat.chat({ userId: "u1", message: "من پوست چرب دارم" });
    await engine.queue.onIdle();

    expect(await engine.conversations.clearHistory(defaultRoom)).toBe(2);
    expect(await engine.conversations.getHistory(defaultRoom)).toEqual([]);
    expect((await engine.conversations.getMemory("u1")).facts).toEqual({ skin_type: "oily" });
  });
});

describe("profiles through the engine", () => {
  it("should show a profile update in the next context and in memory", async () => {
    const generator = new ScriptedGenerator();
    const { engine } = createTestEngine({ generator });

    const updated = await engine.profiles.setProfile("u1", {
      skinType: "dry",
      concerns: ["redness"],
    });
    await engine.queue.onIdle();
    const result = await engine.chat.chat({ userId: "u1", message: "سلام" });

    expect(updated.skinType).toBe("dry");
    expect(result.context.profile.skinType).toBe("dry");
    expect(result.context.memory.facts).toEqual({
      skin_type: "dry",
      "concern.redness": "stated",
    });

    expect(generator.contexts[0]).toBe(result.context);
    expect(renderContext(result.context)).toBe(
      [
        "USER PROFILE:",
        "- skin type: dry",
        "- concerns: redness",
        "",
        "MEMORY:",
        "- concern.redness: stated",
        "- skin_type: dry",
        "",
        "PRODUCT CONTEXT:",
        "No products.",
      ].join("\n")
    );
  });

  it("should reject an update with no fields", async () => {
    const { engine } = createTestEngine();

    await expect(engine.profiles.setProfile("u1", {})).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe("catalog through the engine", () => {
  it("should load the catalog file on warm-up", async () => {
    const base = testSettings();
    const { engine } = createTestEngine({
      settings: {
        ...base,
        rag: { ...base.rag, catalogPath: path.resolve("data/products.json") },
      },
    });

    const status = await engine.warmUp();
    const search = await engine.catalog.searchProducts("ضد آفتاب", 3);

    expect(status.state).toBe("ready");
    expect(status.size).toBe(6);
    expect(search.results.map((hit) => hit.productId)).toEqual(["106", "101", "102"]);
    expect(search.results[0]?.metadata).toEqual({
      nameFa: "ضد آفتاب رنگی پوست حساس",
      nameEn: "Tinted Sunscreen for Sensitive Skin",
    });
  });

  it("should fold the configured comments and summaries into the indexed text", async () => {
    const base = testSettings();
    const { engine } = createTestEngine({
      settings: {
        ...base,
        rag: {
          ...base.rag,
          catalogPath: path.resolve("data/products.json"),
          commentsPath: path.resolve("data/comments.json"),
          summariesPath: path.resolve("data/summaries.json"),
        },
      },
    });

    const status = await engine.warmUp();

    expect(status.size).toBe(7);
    expect(engine.index.get("101")?.textDescription).toBe(
      [
        "PRODUCT: کرم ضد آفتاب SPF50 فاقد چربی | Oil-free Sunscreen SPF50",
        "DESC: ضد آفتاب سبک مناسب پوست چرب و مختلط، بدون ایجاد جوش.",
        "COMMENTS:",
        "اصلا چرب نمیکنه، زیر آرایش هم خوبه.",
        "برای پوست جوشی من عالی بود.",
        "SUMMARY:",
        "بیشتر کاربران از سبکی و مات بودن آن راضی هستند.",
        "QUOTES:",
        "- اصلا چرب نمیکنه",
        "- جوش نزدم",
      ].join("\n")
    );
    expect(engine.index.get("201")?.textDescription).toBe(
      "PRODUCT: تونر آبرسان\nSUMMARY:\nتونر ملایم که پوست خشک را نرم نگه میدارد.\nQUOTES:\n- بدون سوزش"
    );
    expect(engine.index.get("106")?.textDescription).toBe(
      "PRODUCT: ضد آفتاب رنگی پوست حساس | Tinted Sunscreen for Sensitive Skin\n" +
        "DESC: ضد آفتاب مینرال با SPF30 برای پوست حساس و قرمز."
    );
  });

  it("should restore a persisted snapshot instead of re-reading the catalog", async () => {
    const base = testSettings();
    const settings: EngineSettings = { ...base, rag: { ...base.rag, persistSnapshots: true } };
    const documents = new InMemoryDocumentStore();
    const first = createEngine({
      store: documents,
      embedder: new VocabularyEmbedder(SKINCARE_VOCABULARY),
      generator: null,
      settings,
      sleep: noSleep,
    });
    first.catalog.reindex(CATALOG);
    await first.queue.onIdle();

    const embedder = new VocabularyEmbedder(SKINCARE_VOCABULARY);
    const second = createEngine({
      store: documents,
      embedder,
      generator: null,
      settings,
      sleep: noSleep,
    });
    const status = await second.warmUp();

    expect(status.size).toBe(3);
    expect(status.version).toBe(1);
    expect(embedder.batches).toEqual([]);
  });

  it("should apply upserts and deletes in submission order", async () => {
    const { engine } = createTestEngine();
    await withCatalog(engine);

    engine.catalog.upsertProducts([{ productId: "p4", textDescription: "ضد آفتاب رنگی" }]);
    engine.catalog.deleteProduct("p2");
    engine.catalog.deleteProduct("missing");
    await engine.queue.onIdle();

    expect(engine.catalog.status()).toMatchObject({ state: "ready", version: 3, size: 3 });
    const search = await engine.catalog.searchProducts("ضد آفتاب رنگی");
    expect(search.results.map((hit) => hit.productId)).toEqual(["p4", "p1", "p3"]);
  });

  it("should keep the index and record a dead letter when a rebuild keeps failing", async () => {
    const embedder = new VocabularyEmbedder(SKINCARE_VOCABULARY);
    const engine = createEngine({
      store: new InMemoryDocumentStore(),
      embedder,
      generator: null,
      settings: testSettings(),
      sleep: noSleep,
    });
    engine.catalog.reindex(CATALOG);
    await engine.queue.onIdle();

    embedder.failBatches(new Error("provider down"));
    engine.catalog.reindex([{ productId: "p9", textDescription: "ضد آفتاب" }]);
    await engine.queue.onIdle();

    expect(engine.index.status()).toMatchObject({
      state: "ready",
      version: 1,
      size: 3,
      lastBuildError: "provider down",
    });
    expect(engine.queue.deadLetters()).toMatchObject([
      {
        key: "catalog",
        label: "index.build",
        reason: "failed",
        attempts: 3,
        error: "provider down",
      },
    ]);
  });

  it("should reject invalid products synchronously", () => {
    const { engine } = createTestEngine();

    expect(() => engine.catalog.reindex([{ productId: "", textDescription: "x" }])).toThrow(
      InvalidInputError
    );
    expect(() => engine.catalog.upsertProducts([])).toThrow(InvalidInputError);
    expect(engine.queue.stats().pending).toBe(0);
  });
});
