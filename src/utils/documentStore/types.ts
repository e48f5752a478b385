import type { IndexBody, StoreKind } from "../../config/types";

/**
 * A parsed message payload, stored as-is
 */
export type JsonDocument = Record<string, unknown>;

/**
 * Operations the bridge needs from a search datastore. Implementations do not
 * retry; a failure reaches the caller as a DocumentStoreError.
 */
export interface DocumentStore {
  readonly kind: StoreKind;

  indexExists(index: string): Promise<boolean>;

  createIndex(index: string, body: IndexBody): Promise<void>;

  deleteIndex(index: string): Promise<void>;

  /**
   * Writes one document and returns the store's result status, e.g. "created"
   */
  indexDocument(index: string, document: JsonDocument): Promise<string>;

  close(): Promise<void>;
}
