import type { Server } from "http";
import { loggers, logError, setLogLevel } from "./config/logger";
import { loadSettings } from "./config/settings";
import { loadMappings, type TopicMappingTable } from "./config/mappings";
import { createStatusApp, type BridgeStatus, type StatusSource } from "./app";
import { createDocumentStore } from "./utils/documentStore/storeSelector";
import { IndexProvisioner } from "./utils/provisioner/IndexProvisioner";
import { DocumentStoreHandler } from "./utils/handlers/documentStore.handler";
import { MqttSubscriberService } from "./utils/mqtt/MqttSubscriberService";
import type { BridgeSettings, ConfigPaths, StoreSettings } from "./config/types";
import type { DocumentStore } from "./utils/documentStore/types";
import type { BrokerClientFactory } from "./utils/mqtt/types";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

const VERSION = process.env.npm_package_version || "1.0.0";

const log = loggers.system;

export interface BridgeDependencies {
  createStore: (settings: StoreSettings) => DocumentStore;
  createBrokerClient?: BrokerClientFactory;
  clock: () => Date;
}

export interface BridgeOptions {
  /** Serve /health and /stats on this port */
  statusPort?: number;
}

interface Startup {
  settings: BridgeSettings;
  mappings: TopicMappingTable;
  store: DocumentStore;
}

/**
 * Startup sequence and lifetime of the connector: configuration, index
 * provisioning (and the optional removal pass), then the MQTT receive loop.
 */
export class Bridge implements StatusSource {
  private readonly deps: BridgeDependencies;
  private store: DocumentStore | null = null;
  private subscriber: MqttSubscriberService | null = null;
  private handler: DocumentStoreHandler | null = null;
  private server: Server | null = null;
  private stopping = false;

  constructor(
    private readonly paths: ConfigPaths,
    deps: Partial<BridgeDependencies> = {},
    private readonly options: BridgeOptions = {}
  ) {
    this.deps = {
      createStore: createDocumentStore,
      clock: () => new Date(),
      ...deps,
    };
  }

  /**
   * Runs until the broker loop ends and returns the process exit code
   */
  async run(): Promise<number> {
    log.info(`MQTT to document store bridge v${VERSION} started`);

    const startup = this.startup();
    if (!startup) {
      return EXIT_FATAL;
    }
    const { settings, mappings, store } = startup;
    this.store = store;

    try {
      const provisioner = new IndexProvisioner(store, this.deps.clock);

      if (settings.removeIndex) {
        const report = await provisioner.removeAll(mappings.entries);
        if (settings.exitAfterRemoval) {
          log.info("End program after removing indices");
          await this.closeStore();
          return report.failed.length === 0 ? EXIT_OK : EXIT_FATAL;
        }
      }

      await provisioner.provisionAll(mappings.entries);

      if (this.stopping) {
        await this.closeStore();
        return EXIT_OK;
      }

      const handler = new DocumentStoreHandler(mappings, store, provisioner);
      this.handler = handler;
      this.subscriber = new MqttSubscriberService(
        settings.mqtt,
        mappings.topics(),
        this.deps.createBrokerClient
      );

      if (this.options.statusPort !== undefined) {
        await this.startStatusServer(this.options.statusPort);
      }

      // A stop() while the status server starts is held by the subscriber

      await this.subscriber.run((message) => handler.safeProcessSingle(message));
      return EXIT_OK;
    } catch (error) {
      logError(error, {}, log, "Bridge stopped on a fatal error");
      return EXIT_FATAL;
    } finally {
      await this.stopStatusServer();
      await this.closeStore();
      log.info(`MQTT to document store bridge v${VERSION} stopped`);
    }
  }

  async stop(): Promise<void> {
    this.stopping = true;
    await this.subscriber?.stop();
  }

  getStatus(): BridgeStatus {
    return {
      broker: this.subscriber?.getStatus() ?? null,
      handler: this.handler?.getStatus() ?? null,
    };
  }

  // Configuration errors end the process before any connection is attempted
  private startup(): Startup | null {
    try {
      const settings = loadSettings(this.paths.configFile);
      const mappings = loadMappings(this.paths.mappingFile);
      setLogLevel(settings.debug);
      const store = this.deps.createStore(settings.store);
      return { settings, mappings, store };
    } catch (error) {
      logError(error, { ...this.paths }, loggers.config, "Invalid configuration");
      return null;
    }
  }

  private startStatusServer(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createStatusApp(this).listen(port, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        log.info(`Status endpoint listening on port ${port}`);
        resolve();
      });
    });
  }

  private async stopStatusServer(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logError(error, {}, log, "Status endpoint did not close cleanly");
        }
        resolve();
      });
    });
  }

  private async closeStore(): Promise<void> {
    const store = this.store;
    if (!store) return;
    this.store = null;

    try {
      await store.close();
    } catch (error) {
      logError(error, {}, log, "Document store did not close cleanly");
    }
  }
}
