import type { IClientOptions } from "mqtt";
import type { InboundMessage } from "../handlers/types";

/**
 * The part of the mqtt.js client the subscriber relies on
 */
export interface BrokerClient {
  readonly connected: boolean;

  on(event: "connect", listener: () => void): unknown;
  on(event: "message", listener: (topic: string, payload: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close" | "offline" | "reconnect", listener: () => void): unknown;

  subscribeAsync(topic: string, opts: { qos: 0 | 1 | 2 }): Promise<unknown>;

  endAsync(force?: boolean): Promise<void>;
}

export type BrokerClientFactory = (options: IClientOptions) => BrokerClient;

export type MessageListener = (message: InboundMessage) => Promise<unknown>;

/**
 * disconnected → connecting → connected ⇄ reconnecting → disconnected
 */
export type SubscriberState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting";

export interface SubscriberStatus {
  state: SubscriberState;
  connected: boolean;
  broker: string;
  clientId: string | null;
  subscribedTopics: string[];
  messagesReceived: number;
  connects: number;
}
