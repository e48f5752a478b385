import type { Logger } from "winston";
import { loggers, logError } from "../../config/logger";
import { AppError } from "../../middleware/errorHandler";
import type { InboundMessage, HandlerStatus } from "./types";

export abstract class BaseMessageHandler {
  protected lastProcessed: Date | null = null;
  protected lastError: string | null = null;
  protected totalProcessed = 0;
  protected errors = 0;
  protected readonly log: Logger = loggers.handler;

  constructor(protected readonly name: string) {}

  abstract handle(message: InboundMessage): Promise<void>;

  protected updateStats(success: boolean, count: number = 1): void {
    if (success) {
      this.totalProcessed += count;
      this.lastProcessed = new Date();
    } else {
      this.errors += count;
    }
  }

  getStatus(): HandlerStatus {
    return {
      name: this.name,
      healthy:
        this.errors === 0 ||
        this.totalProcessed / Math.max(this.errors, 1) > 10,
      lastProcessed: this.lastProcessed?.toISOString() ?? null,
      totalProcessed: this.totalProcessed,
      errors: this.errors,
      ...(this.lastError !== null && { details: { lastError: this.lastError } }),
    };
  }

  /**
   * Entry point used by the subscriber. A failing message is logged with its
   * topic and counted; it never stops the receive loop.
   */
  async safeProcessSingle(message: InboundMessage): Promise<boolean> {
    try {
      await this.handle(message);
      this.updateStats(true);
      return true;
    } catch (error) {
      this.updateStats(false);
      this.lastError = error instanceof Error ? error.message : String(error);
      logError(
        error,
        {
          handler: this.name,
          topic: message.topic,
          payloadBytes: message.payload.length,
          ...(error instanceof AppError ? error.context : {}),
        },
        this.log,
        "Message processing failed"
      );
      return false;
    }
  }
}
