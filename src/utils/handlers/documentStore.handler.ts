import { BaseMessageHandler } from "./BaseMessageHandler";
import { MessageProcessingError, UnmappedTopicError } from "../../middleware/errorHandler";
import { isRecord } from "../guards";
import type { TopicMappingTable } from "../../config/mappings";
import type { DocumentStore, JsonDocument } from "../documentStore/types";
import type { IndexProvisioner } from "../provisioner/IndexProvisioner";
import type { HandlerStatus, InboundMessage } from "./types";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes a payload as UTF-8 and parses it as a JSON object
 */
export function parsePayload(message: InboundMessage): JsonDocument {
  let text: string;
  try {
    text = utf8.decode(message.payload);
  } catch (error) {
    throw new MessageProcessingError("Payload is not valid UTF-8", message.topic, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MessageProcessingError("Payload is not valid JSON", message.topic, error);
  }

  if (!isRecord(parsed)) {
    throw new MessageProcessingError("Payload must be a JSON object", message.topic);
  }
  return parsed;
}

export class DocumentStoreHandler extends BaseMessageHandler {
  constructor(
    private readonly mappings: TopicMappingTable,
    private readonly store: DocumentStore,
    private readonly provisioner: IndexProvisioner
  ) {
    super(`${store.kind}Handler`);
  }

  async handle(message: InboundMessage): Promise<void> {
    this.log.debug("MQTT message received", {
      topic: message.topic,
      payloadBytes: message.payload.length,
    });

    const entry = this.mappings.lookup(message.topic);
    if (!entry) {
      throw new UnmappedTopicError(message.topic);
    }

    // The index may have been deleted since startup
    const { index } = await this.provisioner.ensureIndex(
      entry.indexNameTemplate,
      entry.indexBody
    );

    const document = parsePayload(message);

    this.log.info(`Add data to index: ${index}`);
    const result = await this.store.indexDocument(index, document);
    this.log.debug(`Index result: ${result}`, { index, topic: message.topic });
  }

  getStatus(): HandlerStatus {
    const baseStatus = super.getStatus();
    return {
      ...baseStatus,
      details: {
        ...baseStatus.details,
        store: this.store.kind,
        mappedTopics: this.mappings.topics(),
      },
    };
  }
}
