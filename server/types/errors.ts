/**
 * Custom Error Classes and Types for the Calendar Feed
 *
 * Every failure the refresh cycle can hit is a subclass of CalendarFeedError,
 * so callers can log a stable code plus context and move on to the next source.
 * Date parsing is the exception: it reports failures as values (ParseError
 * inside a ParseResult) and never throws.
 */

import type { Logger } from "../logger";

export const ERROR_CODES = {
  FETCH_ERROR: "FETCH_ERROR",
  EXTRACTION_ERROR: "EXTRACTION_ERROR",
  SOURCE_DATA_ERROR: "SOURCE_DATA_ERROR",
  PUBLISH_ERROR: "PUBLISH_ERROR",
  PARSE_ERROR: "PARSE_ERROR",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
  NOT_FOUND: "NOT_FOUND",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export class CalendarFeedError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, statusCode: number, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Network failure, timeout, non-2xx status or a bot-block page.
 */
export class FetchError extends CalendarFeedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ERROR_CODES.FETCH_ERROR, 502, context);
  }
}

/**
 * The document was fetched but no extraction strategy found game records in it.
 */
export class ExtractionError extends CalendarFeedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ERROR_CODES.EXTRACTION_ERROR, 502, context);
  }
}

/**
 * The static fallback schedule asset is missing, unreadable or malformed.
 */
export class SourceDataError extends CalendarFeedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ERROR_CODES.SOURCE_DATA_ERROR, 500, context);
  }
}

/**
 * Rendering or writing the calendar file failed.
 */
export class PublishError extends CalendarFeedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ERROR_CODES.PUBLISH_ERROR, 500, context);
  }
}

export class ServiceUnavailableError extends CalendarFeedError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ERROR_CODES.SERVICE_UNAVAILABLE, 503, context);
  }
}

/**
 * Typed failure of the game normalizer. Returned, not thrown.
 */
export class ParseError extends Error {
  public readonly code = ERROR_CODES.PARSE_ERROR;

  constructor(
    public readonly reason: string,
    public readonly dateText: string,
    public readonly timeText: string,
  ) {
    super(`Cannot parse game record "${dateText}" / "${timeText}": ${reason}`);
    this.name = "ParseError";
  }
}

/**
 * Standard error response format for API endpoints
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId?: string;
    details?: Record<string, unknown>;
  };
}

export interface ErrorContext {
  operation?: string;
  source?: string;
  url?: string;
  requestId?: string;
  [key: string]: unknown;
}

export function isCalendarFeedError(error: unknown): error is CalendarFeedError {
  return error instanceof CalendarFeedError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Utility function to extract safe error information for logging
 */
export function extractErrorInfo(error: Error): {
  message: string;
  code?: string;
  statusCode?: number;
  context?: Record<string, unknown>;
} {
  if (isCalendarFeedError(error)) {
    return {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      context: error.context,
    };
  }

  return { message: error.message };
}

export function createErrorResponse(error: Error, requestId?: string): ErrorResponse {
  if (isCalendarFeedError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        timestamp: new Date().toISOString(),
        requestId,
        details: error.context,
      },
    };
  }

  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: "An unexpected error occurred",
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

export function logError(logger: Logger, error: Error, context?: ErrorContext): void {
  logger.error(
    {
      error: extractErrorInfo(error),
      context,
    },
    `Error occurred: ${error.message}`,
  );
}
