import { Client, type ClientOptions } from "@elastic/elasticsearch";
import { BaseDocumentStore } from "./BaseDocumentStore";
import type { ElasticsearchSettings, IndexBody } from "../../config/types";
import type { JsonDocument } from "./types";

export function buildElasticsearchOptions(settings: ElasticsearchSettings): ClientOptions {
  return {
    nodes: settings.cluster,
    ...(settings.apiKey ? { auth: { apiKey: settings.apiKey } } : {}),
  };
}

export class ElasticsearchStore extends BaseDocumentStore {
  readonly kind = "elasticsearch" as const;
  private client: Client;

  constructor(settings: ElasticsearchSettings) {
    super();
    this.client = new Client(buildElasticsearchOptions(settings));
    this.log.info(`Elasticsearch client initialized with ${settings.cluster.length} node(s)`, {
      nodes: settings.cluster,
      apiKey: settings.apiKey ? "[REDACTED]" : undefined,
    });
  }

  async indexExists(index: string): Promise<boolean> {
    return this.run("indexExists", index, () => this.client.indices.exists({ index }));
  }

  async createIndex(index: string, body: IndexBody): Promise<void> {
    this.log.debug(`Creating index: ${index}`, { body });
    // Index bodies come verbatim from the mapping file, so they go through the
    // transport rather than the typed settings/mappings parameters
    await this.run("createIndex", index, () =>
      this.client.transport.request({
        method: "PUT",
        path: `/${encodeURIComponent(index)}`,
        body,
      })
    );
  }

  async deleteIndex(index: string): Promise<void> {
    await this.run("deleteIndex", index, () => this.client.indices.delete({ index }));
  }

  async indexDocument(index: string, document: JsonDocument): Promise<string> {
    const response = await this.run("indexDocument", index, () =>
      this.client.index({ index, document })
    );
    return response.result;
  }

  async close(): Promise<void> {
    await this.run("close", undefined, () => this.client.close());
    this.log.info("Elasticsearch client closed");
  }
}
