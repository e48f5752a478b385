import * as fs from "fs";
import { loggers } from "./logger";
import { isRecord } from "../utils/guards";
import {
  ConfigError,
  validateEnum,
  validateRange,
  validateRequired,
  validateType,
} from "../middleware/errorHandler";
import type {
  BridgeSettings,
  ConfigPaths,
  ElasticsearchSettings,
  MqttSettings,
  OpensearchHost,
  OpensearchSettings,
  StoreSettings,
} from "./types";

export const DEFAULT_CONFIG_FILE = "/app/etc/mqtt-docstore-bridge.json";
export const DEFAULT_MAPPING_FILE = "/app/etc/mqtt-docstore-bridge-mappings.json";
export const DEFAULT_OPENSEARCH_PORT = 9200;
export const DEFAULT_CA_CERTS_PATH = "/etc/ssl/certs/ca-certificates.crt";

const log = loggers.config;

export function resolveConfigPaths(env: NodeJS.ProcessEnv = process.env): ConfigPaths {
  return {
    configFile: env.CONFIG_FILE || DEFAULT_CONFIG_FILE,
    mappingFile:
      env.MAPPING_FILE || env.ELASTICSEARCH_MAPPING_FILE || DEFAULT_MAPPING_FILE,
  };
}

export function statusPortFromEnv(env: NodeJS.ProcessEnv = process.env): number | undefined {
  if (!env.STATUS_PORT) return undefined;
  const statusPort = Number(env.STATUS_PORT);
  if (!Number.isInteger(statusPort) || statusPort < 0 || statusPort > 65535) {
    throw new ConfigError(`STATUS_PORT must be a port number, got '${env.STATUS_PORT}'`, "STATUS_PORT");
  }
  return statusPort;
}

/**
 * Reads a JSON file, turning I/O and syntax failures into a ConfigError that
 * names the file.
 */
export function readJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}`, undefined, error);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON`, undefined, error);
  }
}

const optionalBoolean = (
  block: Record<string, unknown>,
  key: string,
  fieldName: string,
  fallback: boolean
): boolean => {
  const value = block[key];
  if (value === undefined || value === null) return fallback;
  validateType(value, "boolean", fieldName);
  return value === true;
};

const optionalString = (
  block: Record<string, unknown>,
  key: string,
  fieldName: string
): string | undefined => {
  const value = block[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    validateType(value, "string", fieldName);
    return undefined;
  }
  return value === "" ? undefined : value;
};

const requiredString = (
  block: Record<string, unknown>,
  key: string,
  fieldName: string
): string => {
  const value = block[key];
  if (typeof value !== "string" || value === "") {
    validateType(value, "string", fieldName);
    throw new ConfigError(`Field '${fieldName}' must not be empty`, fieldName);
  }
  return value;
};

const port = (value: unknown, fieldName: string): number => {
  if (typeof value !== "number") {
    validateType(value, "number", fieldName);
    return NaN;
  }
  validateRange(value, 1, 65535, fieldName);
  return value;
};

const requiredBlock = (
  raw: Record<string, unknown>,
  key: string
): Record<string, unknown> => {
  const block = raw[key];
  if (!isRecord(block)) {
    throw new ConfigError(`Configuration block '${key}' is missing or not an object`, key);
  }
  return block;
};

export function parseMqttSettings(raw: Record<string, unknown>): MqttSettings {
  const mqtt = requiredBlock(raw, "mqtt");
  validateRequired(mqtt, ["server", "port"], "mqtt.");

  const protocolVersion = mqtt.protocol_version ?? 3;
  validateEnum(protocolVersion, [3, 5], "mqtt.protocol_version");

  return {
    server: requiredString(mqtt, "server", "mqtt.server"),
    port: port(mqtt.port, "mqtt.port"),
    clientId: optionalString(mqtt, "client_id", "mqtt.client_id"),
    user: optionalString(mqtt, "user", "mqtt.user"),
    password: optionalString(mqtt, "password", "mqtt.password"),
    tls: optionalBoolean(mqtt, "tls", "mqtt.tls", false),
    hostnameValidation: optionalBoolean(
      mqtt,
      "hostname_validation",
      "mqtt.hostname_validation",
      true
    ),
    protocolVersion: protocolVersion === 5 ? 5 : 3,
  };
}

function parseElasticsearchSettings(block: Record<string, unknown>): ElasticsearchSettings {
  const cluster = block.cluster;
  if (!Array.isArray(cluster) || cluster.length === 0) {
    throw new ConfigError(
      "Field 'elasticsearch.cluster' must be a non-empty list of URLs",
      "elasticsearch.cluster"
    );
  }

  const urls = cluster.map((url: unknown, position) => {
    if (typeof url !== "string" || url === "") {
      throw new ConfigError(
        `Field 'elasticsearch.cluster[${position}]' must be a non-empty string`,
        `elasticsearch.cluster[${position}]`
      );
    }
    return url;
  });

  return {
    kind: "elasticsearch",
    cluster: urls,
    apiKey: optionalString(block, "api_key", "elasticsearch.api_key"),
  };
}

function parseOpensearchSettings(block: Record<string, unknown>): OpensearchSettings {
  const hosts = block.hosts;
  if (!Array.isArray(hosts) || hosts.length === 0) {
    throw new ConfigError(
      "Field 'opensearch.hosts' must be a non-empty list of {host, port}",
      "opensearch.hosts"
    );
  }

  const parsedHosts = hosts.map((entry: unknown, position): OpensearchHost => {
    const fieldName = `opensearch.hosts[${position}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`Field '${fieldName}' must be an object`, fieldName);
    }
    return {
      host: requiredString(entry, "host", `${fieldName}.host`),
      port:
        entry.port === undefined || entry.port === null
          ? DEFAULT_OPENSEARCH_PORT
          : port(entry.port, `${fieldName}.port`),
    };
  });

  const username = optionalString(block, "username", "opensearch.username");
  const password = optionalString(block, "password", "opensearch.password");
  if ((username === undefined) !== (password === undefined)) {
    throw new ConfigError(
      "Fields 'opensearch.username' and 'opensearch.password' must be set together",
      username === undefined ? "opensearch.username" : "opensearch.password"
    );
  }

  return {
    kind: "opensearch",
    hosts: parsedHosts,
    username,
    password,
    tls: optionalBoolean(block, "tls", "opensearch.tls", false),
    verifyCerts: optionalBoolean(block, "verify_certs", "opensearch.verify_certs", false),
    caCertsPath:
      optionalString(block, "ca_certs_path", "opensearch.ca_certs_path") ??
      DEFAULT_CA_CERTS_PATH,
  };
}

/**
 * Picks the store backend. Exactly one of `elasticsearch` and `opensearch`
 * may be configured.
 */
export function parseStoreSettings(raw: Record<string, unknown>): StoreSettings {
  const hasElasticsearch = raw.elasticsearch !== undefined && raw.elasticsearch !== null;
  const hasOpensearch = raw.opensearch !== undefined && raw.opensearch !== null;

  if (hasElasticsearch && hasOpensearch) {
    throw new ConfigError(
      "Both 'elasticsearch' and 'opensearch' are configured, choose exactly one",
      "elasticsearch"
    );
  }
  if (!hasElasticsearch && !hasOpensearch) {
    throw new ConfigError(
      "Neither 'elasticsearch' nor 'opensearch' is configured",
      "elasticsearch"
    );
  }

  return hasElasticsearch
    ? parseElasticsearchSettings(requiredBlock(raw, "elasticsearch"))
    : parseOpensearchSettings(requiredBlock(raw, "opensearch"));
}

export function parseSettings(raw: unknown): BridgeSettings {
  if (!isRecord(raw)) {
    throw new ConfigError("Configuration must be a JSON object");
  }

  return {
    debug: optionalBoolean(raw, "DEBUG", "DEBUG", false),
    removeIndex: optionalBoolean(raw, "removeIndex", "removeIndex", false),
    exitAfterRemoval: optionalBoolean(raw, "exitAfterRemoval", "exitAfterRemoval", true),
    mqtt: parseMqttSettings(raw),
    store: parseStoreSettings(raw),
  };
}

export function loadSettings(filePath: string): BridgeSettings {
  const settings = parseSettings(readJsonFile(filePath));

  log.info("Configuration loaded", {
    file: filePath,
    broker: `${settings.mqtt.server}:${settings.mqtt.port}`,
    tls: settings.mqtt.tls,
    protocolVersion: settings.mqtt.protocolVersion,
    store: settings.store.kind,
    removeIndex: settings.removeIndex,
  });

  return settings;
}
