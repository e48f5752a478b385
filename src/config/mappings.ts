import { loggers } from "./logger";
import { readJsonFile } from "./settings";
import { isRecord } from "../utils/guards";
import { isValidTopicFilter, isWildcardPattern, matchTopic } from "../utils/topicMatcher";
import { ConfigError } from "../middleware/errorHandler";
import type { TopicMappingEntry } from "./types";

const log = loggers.config;

/**
 * Read-only topic → index table, loaded once at startup. Lookups try the
 * exact topic first, then the wildcard patterns in file order.
 */
export class TopicMappingTable {
  private readonly exact: ReadonlyMap<string, TopicMappingEntry>;
  private readonly wildcards: readonly TopicMappingEntry[];

  constructor(public readonly entries: readonly TopicMappingEntry[]) {
    this.exact = new Map(entries.map((entry) => [entry.topic, entry]));
    this.wildcards = entries.filter((entry) => isWildcardPattern(entry.topic));
  }

  /** Subscription patterns, in file order */
  topics(): string[] {
    return this.entries.map((entry) => entry.topic);
  }

  lookup(topic: string): TopicMappingEntry | undefined {
    return (
      this.exact.get(topic) ??
      this.wildcards.find((entry) => matchTopic(entry.topic, topic))
    );
  }
}

export function parseMappings(raw: unknown): TopicMappingTable {
  if (!isRecord(raw) || Object.keys(raw).length === 0) {
    throw new ConfigError("Mapping file must be a non-empty JSON object keyed by topic");
  }

  const entries = Object.entries(raw).map(([topic, value]): TopicMappingEntry => {
    if (topic === "") {
      throw new ConfigError("Mapping topics must not be empty");
    }
    if (!isValidTopicFilter(topic)) {
      throw new ConfigError(`Mapping topic '${topic}' is not a valid MQTT topic filter`, topic);
    }
    if (!isRecord(value)) {
      throw new ConfigError(`Mapping for '${topic}' must be an object`, topic);
    }

    const { elasticIndex, elasticBody } = value;
    if (typeof elasticIndex !== "string" || elasticIndex === "") {
      throw new ConfigError(
        `Mapping for '${topic}' needs a non-empty 'elasticIndex'`,
        `${topic}.elasticIndex`
      );
    }
    if (!isRecord(elasticBody)) {
      throw new ConfigError(
        `Mapping for '${topic}' needs an 'elasticBody' object`,
        `${topic}.elasticBody`
      );
    }

    return Object.freeze({
      topic,
      indexNameTemplate: elasticIndex,
      indexBody: elasticBody,
    });
  });

  return new TopicMappingTable(Object.freeze(entries));
}

export function loadMappings(filePath: string): TopicMappingTable {
  const table = parseMappings(readJsonFile(filePath));
  log.info("Topic mappings loaded", { file: filePath, topics: table.topics() });
  return table;
}
