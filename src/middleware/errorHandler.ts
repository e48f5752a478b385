import type { Request, Response, NextFunction } from "express";
import { loggers, logError } from "../config/logger";

// Base application error
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly timestamp: string;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, originalError === undefined ? undefined : { cause: originalError });

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    this.name = "AppError";
    this.statusCode = statusCode;
    this.timestamp = new Date().toISOString();
    this.context = context || {};

    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        message: this.message,
        status: this.statusCode,
        timestamp: this.timestamp,
        ...(Object.keys(this.context).length > 0 && { context: this.context }),
      },
    };
  }
}

const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Configuration or mapping file is missing, unreadable or invalid
export class ConfigError extends AppError {
  constructor(message: string, field?: string, originalError?: unknown) {
    super(message, 500, originalError, field ? { field } : {});
    this.name = "ConfigError";
  }
}

// Broker refused the handshake (non-zero CONNACK return code)
export class BrokerConnectionError extends AppError {
  public readonly returnCode?: number;

  constructor(message: string, returnCode?: number, originalError?: unknown) {
    super(
      `MQTT connection failed: ${message}`,
      503,
      originalError,
      returnCode === undefined ? {} : { returnCode }
    );
    this.name = "BrokerConnectionError";
    this.returnCode = returnCode;
  }
}

export type StoreOperation =
  | "indexExists"
  | "createIndex"
  | "deleteIndex"
  | "indexDocument"
  | "close";

export class DocumentStoreError extends AppError {
  public readonly operation: StoreOperation;
  public readonly index?: string;

  constructor(operation: StoreOperation, index: string | undefined, originalError: unknown) {
    super(
      `Document store ${operation} failed${index ? ` for index '${index}'` : ""}: ${describeCause(originalError)}`,
      503,
      originalError,
      { operation, index }
    );
    this.name = "DocumentStoreError";
    this.operation = operation;
    this.index = index;
  }
}

// A message arrived on a topic that no mapping entry covers
export class UnmappedTopicError extends AppError {
  constructor(topic: string) {
    super(`No index mapping matches topic '${topic}'`, 404, undefined, {
      topic,
    });
    this.name = "UnmappedTopicError";
  }
}

// Payload could not be decoded or parsed
export class MessageProcessingError extends AppError {
  constructor(message: string, topic: string, originalError?: unknown) {
    super(message, 400, originalError, { topic });
    this.name = "MessageProcessingError";
  }
}

// Validation helpers for configuration values
export const validateRequired = (
  fields: Record<string, unknown>,
  requiredFields: string[],
  prefix = ""
): void => {
  const missingFields = requiredFields.filter(
    (field) =>
      fields[field] === undefined ||
      fields[field] === null ||
      fields[field] === ""
  );

  if (missingFields.length > 0) {
    throw new ConfigError(
      `Missing required fields: ${missingFields.map((field) => `${prefix}${field}`).join(", ")}`,
      `${prefix}${missingFields[0]}`
    );
  }
};

export const validateType = (
  value: unknown,
  expectedType: "string" | "number" | "boolean" | "object",
  fieldName: string
): void => {
  const actualType = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  if (actualType !== expectedType) {
    throw new ConfigError(
      `Field '${fieldName}' must be of type ${expectedType}, got ${actualType}`,
      fieldName
    );
  }
};

export const validateEnum = <T>(
  value: T,
  allowedValues: readonly T[],
  fieldName: string
): void => {
  if (!allowedValues.includes(value)) {
    throw new ConfigError(
      `Field '${fieldName}' must be one of: ${allowedValues.join(", ")}`,
      fieldName
    );
  }
};

export const validateRange = (
  value: number,
  min: number,
  max: number,
  fieldName: string
): void => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(
      `Field '${fieldName}' must be an integer between ${min} and ${max}`,
      fieldName
    );
  }
};

// Error middleware for the status endpoint
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const statusCode = error instanceof AppError ? error.statusCode : 500;

  logError(error, { method: req.method, url: req.originalUrl || req.url }, loggers.http);

  res
    .status(statusCode)
    .json(
      error instanceof AppError
        ? error.toJSON()
        : { error: { message: "Internal server error", status: statusCode } }
    );
};

// Unhandled error handlers for process-level errors
export const setupGlobalErrorHandlers = (
  shutdown: (signal: NodeJS.Signals) => Promise<void>
): void => {
  process.on("unhandledRejection", (reason: unknown) => {
    logError(reason, { kind: "unhandledRejection" }, loggers.system, "Unhandled Promise Rejection");
    process.exit(1);
  });

  process.on("uncaughtException", (error: Error) => {
    logError(error, { kind: "uncaughtException" }, loggers.system, "Uncaught Exception");
    process.exit(1);
  });

  const onSignal = (signal: NodeJS.Signals) => {
    loggers.system.info(`${signal} received, shutting down gracefully`);
    shutdown(signal).catch((error: unknown) => {
      logError(error, { signal }, loggers.system, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};
