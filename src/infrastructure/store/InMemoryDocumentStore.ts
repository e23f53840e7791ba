import type { DocumentNamespace, DocumentStore } from "@domain/storage/ports";

/**
 * Process-local DocumentStore.
 *
 * Documents are kept serialized so callers never share references with the
 * stored copy; a read always reflects the last completed put, whole.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, string>();

  private static compositeKey(namespace: DocumentNamespace, key: string): string {
    return `${namespace}\u0000${key}`;
  }

  async get(namespace: DocumentNamespace, key: string): Promise<unknown | null> {
    const raw = this.documents.get(InMemoryDocumentStore.compositeKey(namespace, key));
    if (raw === undefined) {
      return null;
    }
    const document: unknown = JSON.parse(raw);
    return document;
  }

  async put(namespace: DocumentNamespace, key: string, document: object): Promise<void> {
    this.documents.set(
      InMemoryDocumentStore.compositeKey(namespace, key),
      JSON.stringify(document)
    );
  }

  async delete(namespace: DocumentNamespace, key: string): Promise<boolean> {
    return this.documents.delete(InMemoryDocumentStore.compositeKey(namespace, key));
  }

  count(namespace?: DocumentNamespace): number {
    if (!namespace) {
      return this.documents.size;
    }
    const prefix = `${namespace}\u0000`;
    let total = 0;
    for (const key of this.documents.keys()) {
      if (key.startsWith(prefix)) {
        total++;
      }
    }
    return total;
  }
}
