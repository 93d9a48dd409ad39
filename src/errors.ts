import { inspect } from "node:util";

export interface ErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  originalError?: ErrorDetails;
}

/**
 * Base class of every error thrown by blogmark.
 */
export class BlogmarkError extends Error {
  /** A specific error code (e.g., ERR_CONTENT_NOT_FOUND, ERR_HTTP_ERROR). */
  public readonly code: string;
  /** The original error object, if available. */
  public readonly originalError?: Error;

  constructor(message: string, code: string, originalError?: Error) {
    super(message);
    this.name = "BlogmarkError";
    this.code = code;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a plain object representation with only useful metadata for responses/logging.
   */
  toObject(): ErrorDetails {
    const descriptor: ErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): ErrorDetails {
    return this.toObject();
  }

  /**
   * Makes console output (`console.error`) display the cleaned error payload without stack noise.
   */
  [inspect.custom](): ErrorDetails {
    return this.toObject();
  }
}

/**
 * Neither a registered selector nor the heuristic fallback found the article body.
 */
export class ContentNotFoundError extends BlogmarkError {
  constructor(message = "Could not locate the main content; try another page or retry later.") {
    super(message, "ERR_CONTENT_NOT_FOUND");
    this.name = "ContentNotFoundError";
  }
}

/**
 * Custom error class for fetch-related errors.
 */
export class FetchError extends BlogmarkError {
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;

  /**
   * @param message The error message.
   * @param code Error code string. Default: ERR_FETCH_FAILED
   * @param originalError Optional original error.
   * @param statusCode Optional HTTP status code.
   */
  constructor(message: string, code = "ERR_FETCH_FAILED", originalError?: Error, statusCode?: number) {
    super(message, code, originalError);
    this.name = "FetchError";
    this.statusCode = statusCode;
  }

  override toObject(): ErrorDetails {
    const descriptor = super.toObject();
    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }
    return descriptor;
  }
}

/**
 * Non-2xx response from the FetchEngine.
 */
export class FetchEngineHttpError extends FetchError {
  constructor(message: string, statusCode: number) {
    super(message, "ERR_HTTP_ERROR", undefined, statusCode);
    this.name = "FetchEngineHttpError";
  }
}

function readCode(value: unknown): string | number | undefined {
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}

function serializeUnknownError(error: unknown): ErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof BlogmarkError) {
    return error.toObject();
  }

  if (error instanceof Error) {
    const descriptor: ErrorDetails = {
      name: error.name || "Error",
      message: error.message,
    };

    const code = "code" in error ? readCode(error.code) : undefined;
    if (code !== undefined) {
      descriptor.code = code;
    }

    const nested = serializeUnknownError(error.cause);
    if (nested) {
      descriptor.originalError = nested;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}

/**
 * One-line message for any thrown value, as shown to CLI users.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Invalid command-line arguments.
 */
export class UsageError extends BlogmarkError {
  constructor(message: string) {
    super(message, "ERR_USAGE");
    this.name = "UsageError";
  }
}
