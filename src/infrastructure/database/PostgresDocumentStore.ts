/**
 * PostgreSQL implementation of the DocumentStore port.
 *
 * Every document lives in one JSONB row keyed by (namespace, key):
 * - put is an UPSERT, so a document is replaced whole in a single statement
 * - delete reports whether a row was removed
 * - the table is created on first use
 *
 * Backend failures surface as StoreUnavailable; callers decide whether to
 * retry (background writes) or propagate (read path).
 */
import { StoreUnavailableError, errorMessage } from "@domain/errors";
import type { DocumentNamespace, DocumentStore } from "@domain/storage/ports";
import { getPool } from "@infrastructure/database/db";
import { logEvent } from "@infrastructure/logging/Logger";

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS documents (
    namespace TEXT NOT NULL,
    key TEXT NOT NULL,
    body JSONB NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (namespace, key)
  );
`;

function hasBody(row: unknown): row is { body: unknown } {
  return typeof row === "object" && row !== null && "body" in row;
}

export class PostgresDocumentStore implements DocumentStore {
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly db: Queryable = getPool()) {}

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.db.query(CREATE_TABLE_SQL).then(
        () => {
          logEvent("DOCUMENT_STORE_SCHEMA_READY", { table: "documents" });
        },
        (error: unknown) => {
          // Let the next call try again instead of caching the failure.
          this.schemaReady = null;
          throw error;
        }
      );
    }
    return this.schemaReady;
  }

  private async run(
    operation: string,
    text: string,
    values: unknown[]
  ): Promise<QueryResultLike> {
    try {
      await this.ensureSchema();
      return await this.db.query(text, values);
    } catch (error: unknown) {
      const code =
        error && typeof error === "object" && "code" in error ? error.code : undefined;

      logEvent("DOCUMENT_STORE_FAILURE", {
        operation,
        message: errorMessage(error),
        code: typeof code === "string" ? code : undefined,
      });

      throw new StoreUnavailableError(operation, error);
    }
  }

  async get(namespace: DocumentNamespace, key: string): Promise<unknown | null> {
    const result = await this.run(
      "document.get",
      `
      SELECT body
      FROM documents
      WHERE namespace = $1 AND key = $2
      LIMIT 1;
      `,
      [namespace, key]
    );

    const row = result.rows[0];
    return hasBody(row) ? row.body : null;
  }

  async put(namespace: DocumentNamespace, key: string, document: object): Promise<void> {
    await this.run(
      "document.put",
      `
      INSERT INTO documents (namespace, key, body)
      VALUES ($1, $2, $3::jsonb)
      ON CONFLICT (namespace, key)
      DO UPDATE SET
        body = EXCLUDED.body,
        updated_at = NOW();
      `,
      [namespace, key, JSON.stringify(document)]
    );
  }

  async delete(namespace: DocumentNamespace, key: string): Promise<boolean> {
    const result = await this.run(
      "document.delete",
      `
      DELETE FROM documents
      WHERE namespace = $1 AND key = $2;
      `,
      [namespace, key]
    );

    return (result.rowCount ?? 0) > 0;
  }
}
