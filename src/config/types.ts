/**
 * MQTT broker connection settings (the `mqtt` block of the configuration file)
 */
export interface MqttSettings {
  /** Broker hostname or IP address */
  server: string;

  /** Broker TCP port */
  port: number;

  /** Explicit client identifier; the broker assigns one when absent */
  clientId?: string;

  /** Username, only sent together with a non-empty password */
  user?: string;

  password?: string;

  /** Connect over TLS with a verified certificate chain */
  tls: boolean;

  /** When false, the server certificate's hostname is not checked */
  hostnameValidation: boolean;

  /** MQTT protocol version as configured: 3 (3.1.1) or 5 */
  protocolVersion: 3 | 5;
}

export interface ElasticsearchSettings {
  kind: "elasticsearch";

  /** Cluster endpoint URLs, e.g. "http://localhost:9200" */
  cluster: string[];

  apiKey?: string;
}

export interface OpensearchHost {
  host: string;
  port: number;
}

export interface OpensearchSettings {
  kind: "opensearch";
  hosts: OpensearchHost[];
  username?: string;
  password?: string;
  tls: boolean;

  /** Verify the server certificate against the CA bundle */
  verifyCerts: boolean;

  caCertsPath: string;
}

/**
 * The document store backend, chosen once from whichever configuration block
 * is present
 */
export type StoreSettings = ElasticsearchSettings | OpensearchSettings;

export type StoreKind = StoreSettings["kind"];

export interface BridgeSettings {
  debug: boolean;

  /** Delete every mapped index at startup */
  removeIndex: boolean;

  /** Stop after the removal pass instead of recreating the indices */
  exitAfterRemoval: boolean;

  mqtt: MqttSettings;
  store: StoreSettings;
}

/**
 * Index creation body (settings, mappings, aliases) as found in the mapping file
 */
export type IndexBody = Record<string, unknown>;

export interface TopicMappingEntry {
  /** Subscription pattern, may contain "+" and "#" wildcards */
  topic: string;

  /** Index name with optional {Y}, {m} and {d} placeholders */
  indexNameTemplate: string;

  indexBody: IndexBody;
}

export interface ConfigPaths {
  configFile: string;
  mappingFile: string;
}
