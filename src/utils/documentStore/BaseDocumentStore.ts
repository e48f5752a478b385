import type { Logger } from "winston";
import { loggers } from "../../config/logger";
import { DocumentStoreError, type StoreOperation } from "../../middleware/errorHandler";
import type { IndexBody, StoreKind } from "../../config/types";
import type { DocumentStore, JsonDocument } from "./types";

export abstract class BaseDocumentStore implements DocumentStore {
  abstract readonly kind: StoreKind;
  protected readonly log: Logger = loggers.store;

  abstract indexExists(index: string): Promise<boolean>;
  abstract createIndex(index: string, body: IndexBody): Promise<void>;
  abstract deleteIndex(index: string): Promise<void>;
  abstract indexDocument(index: string, document: JsonDocument): Promise<string>;
  abstract close(): Promise<void>;

  // Every client call goes through here so failures carry the operation and index
  protected async run<T>(
    operation: StoreOperation,
    index: string | undefined,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new DocumentStoreError(operation, index, error);
    }
  }
}
