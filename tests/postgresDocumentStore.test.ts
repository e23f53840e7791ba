import { describe, it, expect } from "vitest";

import { StoreUnavailableError } from "@domain/errors";
import {
  PostgresDocumentStore,
  type Queryable,
  type QueryResultLike,
} from "@infrastructure/database/PostgresDocumentStore";

/**
 * In-process stand-in for a pg Pool: understands the four statements the
 * store issues and keeps rows in a map.
 */
class FakeDocumentsTable implements Queryable {
  readonly statements: string[] = [];
  private readonly rows = new Map<string, unknown>();
  private failures = 0;

  failNext(count: number): void {
    this.failures = count;
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResultLike> {
    const statement = text.trim().split(/\s+/)[0] ?? "";
    this.statements.push(statement);

    if (this.failures > 0) {
      this.failures--;
      throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    }

    const id = `${String(values[0])}/${String(values[1])}`;

    switch (statement) {
      case "SELECT": {
        const body = this.rows.get(id);
        return body === undefined ? { rows: [], rowCount: 0 } : { rows: [{ body }], rowCount: 1 };
      }
      case "INSERT": {
        const raw = values[2];
        const body: unknown = typeof raw === "string" ? JSON.parse(raw) : null;
        this.rows.set(id, body);
        return { rows: [], rowCount: 1 };
      }
      case "DELETE":
        return { rows: [], rowCount: this.rows.delete(id) ? 1 : 0 };
      default:
        return { rows: [], rowCount: null };
    }
  }
}

describe("PostgresDocumentStore", () => {
  it("should round-trip a document and create the table once", async () => {
    const db = new FakeDocumentsTable();
    const store = new PostgresDocumentStore(db);

    await store.put("profiles", "u1", { userId: "u1", skinType: "oily" });
    const document = await store.get("profiles", "u1");

    expect(document).toEqual({ userId: "u1", skinType: "oily" });
    expect(db.statements).toEqual(["CREATE", "INSERT", "SELECT"]);
  });

  it("should return null for a missing document", async () => {
    const store = new PostgresDocumentStore(new FakeDocumentsTable());

    expect(await store.get("profiles", "nobody")).toBeNull();
  });

  it("should keep namespaces apart", async () => {
    const store = new PostgresDocumentStore(new FakeDocumentsTable());

    await store.put("profiles", "u1", { kind: "profile" });

    expect(await store.get("memory-summaries", "u1")).toBeNull();
  });

  it("should report whether a delete removed a row", async () => {
    const store = new PostgresDocumentStore(new FakeDocumentsTable());
    await store.put("conversations", "u1:default", { turns: [] });

    expect(await store.delete("conversations", "u1:default")).toBe(true);
    expect(await store.delete("conversations", "u1:default")).toBe(false);
  });

  it("should wrap backend failures and retry schema creation on the next call", async () => {
    const db = new FakeDocumentsTable();
    const store = new PostgresDocumentStore(db);
    db.failNext(1);

    const error: unknown = await store.get("profiles", "u1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({
      code: "STORE_UNAVAILABLE",
      metadata: { operation: "document.get" },
    });

    expect(await store.get("profiles", "u1")).toBeNull();
    expect(db.statements).toEqual(["CREATE", "CREATE", "SELECT"]);
  });
});
