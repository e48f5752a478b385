import express, { type Express, type Request, type Response } from "express";
import morgan from "morgan";
import { loggers } from "./config/logger";
import { errorHandler } from "./middleware/errorHandler";
import type { HandlerStatus } from "./utils/handlers/types";
import type { SubscriberStatus } from "./utils/mqtt/types";

export interface BridgeStatus {
  broker: SubscriberStatus | null;
  handler: HandlerStatus | null;
}

export interface StatusSource {
  getStatus(): BridgeStatus;
}

// morgan writes finished lines; route them into winston at "http" level
const httpLogStream = {
  write: (line: string) => {
    loggers.http.http(line.trim());
  },
};

export function createStatusApp(source: StatusSource): Express {
  const app = express();

  app.use(
    morgan(":method :url :status :res[content-length] - :response-time ms", {
      stream: httpLogStream,
    })
  );

  app.get("/health", (_req: Request, res: Response) => {
    const status = source.getStatus();
    const healthy = status.broker?.connected === true;

    res.status(healthy ? 200 : 503).json({
      status: healthy ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      broker: status.broker,
      handler: status.handler,
    });
  });

  app.get("/stats", (_req: Request, res: Response) => {
    const { broker, handler } = source.getStatus();
    res.json({
      messagesReceived: broker?.messagesReceived ?? 0,
      totalProcessed: handler?.totalProcessed ?? 0,
      errors: handler?.errors ?? 0,
      lastProcessed: handler?.lastProcessed ?? null,
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(errorHandler);

  return app;
}
