import type { ConnectionOptions } from "node:tls";
import type { IClientOptions } from "mqtt";
import type { MqttSettings } from "../../config/types";

export const KEEPALIVE_SECONDS = 60;

// Hostname check disabled on operator request; the chain is still verified
const skipHostnameCheck = (): undefined => undefined;

export const mqttClientOptions = (
  settings: MqttSettings,
): IClientOptions & Pick<ConnectionOptions, "checkServerIdentity"> => {
  const hasCredentials = Boolean(settings.user) && Boolean(settings.password);

  return {
    host: settings.server,
    port: settings.port,
    protocol: settings.tls ? "mqtts" : "mqtt",
    // 3.1.1 is protocol level 4 on the wire
    protocolVersion: settings.protocolVersion === 5 ? 5 : 4,
    clean: true,
    keepalive: KEEPALIVE_SECONDS,
    // Subscriptions are renewed by the subscriber on every connect
    resubscribe: false,
    // An empty client id lets the broker assign one (clean sessions only)
    clientId: settings.clientId ?? "",
    ...(hasCredentials
      ? { username: settings.user, password: settings.password }
      : {}),
    ...(settings.tls ? { rejectUnauthorized: true } : {}),
    ...(settings.tls && !settings.hostnameValidation
      ? { checkServerIdentity: skipHostnameCheck }
      : {}),
  };
};
