import * as fs from "fs";
import { Client, type ClientOptions } from "@opensearch-project/opensearch";
import { BaseDocumentStore } from "./BaseDocumentStore";
import { ConfigError } from "../../middleware/errorHandler";
import type { IndexBody, OpensearchSettings } from "../../config/types";
import type { JsonDocument } from "./types";

export const opensearchNodeUrls = (settings: OpensearchSettings): string[] =>
  settings.hosts.map(
    ({ host, port }) => `${settings.tls ? "https" : "http"}://${host}:${port}`
  );

function readCaBundle(caCertsPath: string): Buffer {
  try {
    return fs.readFileSync(caCertsPath);
  } catch (error) {
    throw new ConfigError(
      `Cannot read CA bundle ${caCertsPath}`,
      "opensearch.ca_certs_path",
      error
    );
  }
}

export function buildOpensearchOptions(settings: OpensearchSettings): ClientOptions {
  const options: ClientOptions = {
    nodes: opensearchNodeUrls(settings),
    compression: "gzip",
  };

  if (settings.username !== undefined && settings.password !== undefined) {
    options.auth = { username: settings.username, password: settings.password };
  }

  if (settings.tls) {
    options.ssl = settings.verifyCerts
      ? { rejectUnauthorized: true, ca: readCaBundle(settings.caCertsPath) }
      : { rejectUnauthorized: false };
  }

  return options;
}

export class OpensearchStore extends BaseDocumentStore {
  readonly kind = "opensearch" as const;
  private client: Client;

  constructor(settings: OpensearchSettings) {
    super();
    this.client = new Client(buildOpensearchOptions(settings));
    this.log.info(`OpenSearch client initialized with ${settings.hosts.length} node(s)`, {
      nodes: opensearchNodeUrls(settings),
      tls: settings.tls,
      verifyCerts: settings.verifyCerts,
    });
  }

  async indexExists(index: string): Promise<boolean> {
    const response = await this.run("indexExists", index, () =>
      this.client.indices.exists({ index })
    );
    return Boolean(response.body);
  }

  async createIndex(index: string, body: IndexBody): Promise<void> {
    this.log.debug(`Creating index: ${index}`, { body });
    await this.run("createIndex", index, () => this.client.indices.create({ index, body }));
  }

  async deleteIndex(index: string): Promise<void> {
    await this.run("deleteIndex", index, () => this.client.indices.delete({ index }));
  }

  async indexDocument(index: string, document: JsonDocument): Promise<string> {
    const response = await this.run("indexDocument", index, () =>
      this.client.index({ index, body: document })
    );
    const result: unknown = response.body.result;
    return typeof result === "string" ? result : "unknown";
  }

  async close(): Promise<void> {
    await this.run("close", undefined, () => this.client.close());
    this.log.info("OpenSearch client closed");
  }
}
