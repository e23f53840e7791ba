import { isAppError, StoreUnavailableError } from "@domain/errors";

/**
 * Durable key/document storage the core persists through.
 *
 * The backend is swappable (in-process map, PostgreSQL JSONB); the core relies
 * only on get/put/delete by (namespace, key). Documents come back as `unknown`
 * and are validated by the owning component before use.
 */
export type DocumentNamespace =
  | "conversations"
  | "profiles"
  | "memory-summaries"
  | "product-index";

export interface DocumentStore {
  get(namespace: DocumentNamespace, key: string): Promise<unknown | null>;
  put(namespace: DocumentNamespace, key: string, document: object): Promise<void>;
  /** Resolves true when a document was removed. */
  delete(namespace: DocumentNamespace, key: string): Promise<boolean>;
}

/**
 * Runs a store call, normalizing any backend failure into StoreUnavailable.
 * Errors that are already part of the taxonomy pass through untouched.
 */
export async function storeCall<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (isAppError(error)) {
      throw error;
    }
    throw new StoreUnavailableError(operation, error);
  }
}
