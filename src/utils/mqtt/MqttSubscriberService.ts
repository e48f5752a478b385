import { connect } from "mqtt";
import { loggers, logError } from "../../config/logger";
import { BrokerConnectionError } from "../../middleware/errorHandler";
import { mqttClientOptions } from "./configCommon";
import type { MqttSettings } from "../../config/types";
import type { InboundMessage } from "../handlers/types";
import type {
  BrokerClient,
  BrokerClientFactory,
  MessageListener,
  SubscriberState,
  SubscriberStatus,
} from "./types";

const log = loggers.mqtt;

const defaultFactory: BrokerClientFactory = (options) => connect(options);

// mqtt.js reports a refused CONNACK as an error carrying the numeric return code
export const connackReturnCode = (error: Error): number | undefined =>
  "code" in error && typeof error.code === "number" ? error.code : undefined;

export class MqttSubscriberService {
  private client: BrokerClient | null = null;
  private state: SubscriberState = "disconnected";
  private queue: Promise<void> = Promise.resolve();
  private messagesReceived = 0;
  private connects = 0;
  private stopRequested = false;
  private settle: { resolve: () => void; reject: (error: Error) => void } | null = null;

  constructor(
    private readonly settings: MqttSettings,
    private readonly topics: readonly string[],
    private readonly createClient: BrokerClientFactory = defaultFactory
  ) {
    if (topics.length === 0) {
      throw new Error("No MQTT topics to subscribe to");
    }
  }

  /**
   * Connects and dispatches every message to the listener, one at a time in
   * arrival order. Resolves once stop() has closed the connection; rejects
   * with a BrokerConnectionError when the broker refuses the handshake.
   * Resolves at once, without connecting, when stop() came first.
   */
  run(listener: MessageListener): Promise<void> {
    if (this.client) {
      throw new Error("Subscriber is already running");
    }
    if (this.stopRequested) {
      log.info("Stop requested before connecting, not starting the MQTT client");
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.settle = { resolve, reject };
      this.state = "connecting";
      log.info(`Connecting to MQTT broker ${this.brokerAddress()}`, {
        tls: this.settings.tls,
        protocolVersion: this.settings.protocolVersion,
      });

      const client = this.createClient(mqttClientOptions(this.settings));
      this.client = client;

      client.on("connect", () => this.onConnect(client));
      client.on("message", (topic, payload) => this.enqueue({ topic, payload }, listener));
      client.on("error", (error) => this.onError(error));
      client.on("close", () => this.onClose());
      client.on("reconnect", () => log.info("Reconnecting to MQTT broker"));
      client.on("offline", () => log.warn("MQTT client is offline"));
    });
  }

  /** Resolves once every message received so far has been handled */
  whenIdle(): Promise<void> {
    return this.queue;
  }

  async stop(): Promise<void> {
    this.stopRequested = true;
    const client = this.client;
    if (!client || this.state === "disconnected") {
      return;
    }

    this.state = "disconnected";
    log.info("Disconnecting from MQTT broker");
    await client.endAsync();
    await this.queue;
    this.settle?.resolve();
    this.settle = null;
  }

  getStatus(): SubscriberStatus {
    return {
      state: this.state,
      connected: this.state === "connected",
      broker: this.brokerAddress(),
      clientId: this.settings.clientId ?? null,
      subscribedTopics: [...this.topics],
      messagesReceived: this.messagesReceived,
      connects: this.connects,
    };
  }

  private brokerAddress(): string {
    return `${this.settings.tls ? "mqtts" : "mqtt"}://${this.settings.server}:${this.settings.port}`;
  }

  // Subscriptions are renewed on every (re)connect
  private onConnect(client: BrokerClient): void {
    if (this.state === "disconnected") return;

    this.state = "connected";
    this.connects++;
    log.info("Connected to MQTT broker", { connects: this.connects });

    this.subscribeAll(client).catch((error: unknown) =>
      logError(error, {}, log, "MQTT subscription failed")
    );
  }

  private async subscribeAll(client: BrokerClient): Promise<void> {
    for (const topic of this.topics) {
      log.debug(`Subscribe to MQTT topic: ${topic}`);
      try {
        await client.subscribeAsync(topic, { qos: 0 });
      } catch (error) {
        logError(error, { topic }, log, "MQTT subscription failed");
      }
    }
  }

  private enqueue(message: InboundMessage, listener: MessageListener): void {
    this.messagesReceived++;
    this.queue = this.queue
      .then(async () => {
        await listener(message);
      })
      .catch((error: unknown) =>
        logError(error, { topic: message.topic }, log, "Message listener failed")
      );
  }

  private onError(error: Error): void {
    const returnCode = connackReturnCode(error);
    if (returnCode === undefined) {
      log.warn(`MQTT transport error: ${error.message}`);
      return;
    }

    // The handshake is not retried here
    this.fail(new BrokerConnectionError(`broker refused connection, RC=${returnCode}`, returnCode, error));
  }

  private onClose(): void {
    if (this.state === "disconnected") return;
    this.state = "reconnecting";
    log.warn("MQTT connection closed, waiting for reconnect");
  }

  private fail(error: BrokerConnectionError): void {
    const client = this.client;
    this.state = "disconnected";
    log.error(error.message, { broker: this.brokerAddress() });

    client?.endAsync(true).catch((endError: unknown) =>
      logError(endError, {}, log, "MQTT client did not close cleanly")
    );
    this.settle?.reject(error);
    this.settle = null;
  }
}
