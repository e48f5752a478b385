/**
 * A message as delivered by the broker
 */
export interface InboundMessage {
  /** Concrete topic the message was published to */
  topic: string;

  /** Raw payload bytes, expected to be UTF-8 encoded JSON */
  payload: Buffer;
}

/**
 * Health and throughput information for a message handler
 */
export interface HandlerStatus {
  /** Name/identifier of the handler */
  name: string;

  /** Whether the handler is processing messages without failing most of them */
  healthy: boolean;

  /** Timestamp of the last successfully processed message */
  lastProcessed: string | null;

  /** Total number of messages successfully processed by this handler */
  totalProcessed: number;

  /** Total number of messages that failed */
  errors: number;

  /** Handler-specific details (store kind, last error, ...) */
  details?: Record<string, unknown>;
}
