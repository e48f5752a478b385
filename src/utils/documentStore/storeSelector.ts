import type { StoreSettings } from "../../config/types";
import type { DocumentStore } from "./types";
import { ElasticsearchStore } from "./elasticsearch.store";
import { OpensearchStore } from "./opensearch.store";

/**
 * Builds the one document store the process talks to
 */
export function createDocumentStore(settings: StoreSettings): DocumentStore {
  switch (settings.kind) {
    case "elasticsearch":
      return new ElasticsearchStore(settings);

    case "opensearch":
      return new OpensearchStore(settings);

    default: {
      const unknownKind: never = settings;
      throw new Error(`Unknown document store: ${JSON.stringify(unknownKind)}`);
    }
  }
}
