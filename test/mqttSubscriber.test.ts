import { describe, it, expect, vi } from "vitest";
import { MqttSubscriberService, connackReturnCode } from "../src/utils/mqtt/MqttSubscriberService";
import { KEEPALIVE_SECONDS, mqttClientOptions } from "../src/utils/mqtt/configCommon";
import { BrokerConnectionError } from "../src/middleware/errorHandler";
import type { MqttSettings } from "../src/config/types";
import type { InboundMessage } from "../src/utils/handlers/types";
import { fakeBrokerFactory } from "./support/fakes";

const settings: MqttSettings = {
  server: "broker.local",
  port: 1883,
  tls: false,
  hostnameValidation: true,
  protocolVersion: 3,
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("mqttClientOptions", () => {
  it("builds plain 3.1.1 options with a broker assigned client id", () => {
    expect(mqttClientOptions(settings)).toEqual({
      host: "broker.local",
      port: 1883,
      protocol: "mqtt",
      protocolVersion: 4,
      clean: true,
      keepalive: KEEPALIVE_SECONDS,
      resubscribe: false,
      clientId: "",
    });
  });

  it("sends credentials only when both are set", () => {
    expect(mqttClientOptions({ ...settings, user: "bridge" }).username).toBeUndefined();

    const options = mqttClientOptions({ ...settings, user: "bridge", password: "test-secret" });
    expect(options.username).toBe("bridge");
    expect(options.password).toBe("test-secret");
  });

  it("verifies the certificate chain over TLS", () => {
    const options = mqttClientOptions({ ...settings, tls: true, protocolVersion: 5, clientId: "bridge-1" });

    expect(options.protocol).toBe("mqtts");
    expect(options.protocolVersion).toBe(5);
    expect(options.clientId).toBe("bridge-1");
    expect(options.rejectUnauthorized).toBe(true);
    expect(options.checkServerIdentity).toBeUndefined();
  });

  it("skips only the hostname check when validation is off", () => {
    const options = mqttClientOptions({ ...settings, tls: true, hostnameValidation: false });

    expect(options.rejectUnauthorized).toBe(true);
    expect(typeof options.checkServerIdentity).toBe("function");
  });
});

describe("connackReturnCode", () => {
  it("reads a numeric code", () => {
    expect(connackReturnCode(Object.assign(new Error("refused"), { code: 5 }))).toBe(5);
  });

  it("ignores transport error codes", () => {
    expect(connackReturnCode(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBeUndefined();
  });
});

describe("MqttSubscriberService", () => {
  it("refuses an empty topic list", () => {
    expect(() => new MqttSubscriberService(settings, [])).toThrow("No MQTT topics to subscribe to");
  });

  it("subscribes to every topic on connect and again after a reconnect", async () => {
    const broker = fakeBrokerFactory();
    const service = new MqttSubscriberService(settings, ["sensors/+/temp", "plant/status"], broker.create);
    const running = service.run(async () => undefined);
    const client = broker.clients[0];

    expect(service.getStatus().state).toBe("connecting");

    client.simulateConnect();
    await vi.waitFor(() => expect(client.subscriptions).toEqual(["sensors/+/temp", "plant/status"]));
    expect(service.getStatus().connected).toBe(true);

    client.simulateDrop();
    expect(service.getStatus().state).toBe("reconnecting");

    client.simulateConnect();
    await vi.waitFor(() => expect(client.subscriptions).toHaveLength(4));
    expect(client.subscriptions.slice(2)).toEqual(["sensors/+/temp", "plant/status"]);
    expect(service.getStatus().connects).toBe(2);

    await service.stop();
    await expect(running).resolves.toBeUndefined();
    expect(service.getStatus().state).toBe("disconnected");
    expect(client.endCalls).toEqual([false]);
  });

  it("hands messages to the listener one at a time in arrival order", async () => {
    const broker = fakeBrokerFactory();
    const service = new MqttSubscriberService(settings, ["a/#"], broker.create);
    const events: string[] = [];
    const running = service.run(async (message: InboundMessage) => {
      events.push(`start:${message.topic}`);
      await delay(message.topic === "a/1" ? 20 : 1);
      events.push(`end:${message.topic}:${message.payload.toString()}`);
    });
    const client = broker.clients[0];

    client.simulateConnect();
    client.deliver("a/1", "first");
    client.deliver("a/2", "second");
    client.deliver("a/3", "third");
    await service.whenIdle();

    expect(events).toEqual([
      "start:a/1",
      "end:a/1:first",
      "start:a/2",
      "end:a/2:second",
      "start:a/3",
      "end:a/3:third",
    ]);
    expect(service.getStatus().messagesReceived).toBe(3);

    await service.stop();
    await running;
  });

  it("keeps the queue going when the listener throws", async () => {
    const broker = fakeBrokerFactory();
    const service = new MqttSubscriberService(settings, ["a/#"], broker.create);
    const seen: string[] = [];
    const running = service.run(async (message: InboundMessage) => {
      if (message.topic === "a/bad") throw new Error("listener failed");
      seen.push(message.topic);
    });
    const client = broker.clients[0];

    client.simulateConnect();
    client.deliver("a/bad", "{}");
    client.deliver("a/good", "{}");
    await service.whenIdle();

    expect(seen).toEqual(["a/good"]);
    await service.stop();
    await running;
  });

  it("does not connect when stopped before run()", async () => {
    const broker = fakeBrokerFactory();
    const service = new MqttSubscriberService(settings, ["a/#"], broker.create);

    await service.stop();

    await expect(service.run(async () => undefined)).resolves.toBeUndefined();
    expect(broker.clients).toHaveLength(0);
    expect(service.getStatus().state).toBe("disconnected");
  });

  it("fails run() when the broker refuses the connection", async () => {
    const broker = fakeBrokerFactory();
    const service = new MqttSubscriberService(settings, ["a/#"], broker.create);
    const running = service.run(async () => undefined);
    const client = broker.clients[0];

    client.simulateRefusal(5);

    const error = await running.catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(BrokerConnectionError);
    expect(error instanceof BrokerConnectionError && error.returnCode).toBe(5);
    expect(error instanceof Error && error.message).toBe(
      "MQTT connection failed: broker refused connection, RC=5"
    );
    expect(client.endCalls).toEqual([true]);
    expect(service.getStatus().state).toBe("disconnected");
  });

  it("logs transport errors without failing", async () => {
    const broker = fakeBrokerFactory();
    const service = new MqttSubscriberService(settings, ["a/#"], broker.create);
    const running = service.run(async () => undefined);
    const client = broker.clients[0];

    client.simulateConnect();
    client.emit("error", Object.assign(new Error("socket reset"), { code: "ECONNRESET" }));
    expect(service.getStatus().state).toBe("connected");

    await service.stop();
    await expect(running).resolves.toBeUndefined();
  });
});
