/**
 * Base class for every error thrown by the SDK.
 */
export class SdkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SdkError";
  }
}

export class ApiError extends SdkError {
  readonly statusCode?: number;
  readonly requestId?: string;
  readonly details?: unknown;

  constructor(
    message: string,
    statusCode?: number,
    requestId?: string,
    details?: unknown,
  ) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.requestId = requestId;
    this.details = details;
  }
}

/** 401: invalid or revoked API key. */
export class AuthenticationError extends ApiError {
  constructor(message = "Invalid or revoked API key", requestId?: string) {
    super(message, 401, requestId);
    this.name = "AuthenticationError";
  }
}

/** 402: not enough credits to create or keep a stream. */
export class InsufficientCreditsError extends ApiError {
  constructor(message: string, requestId?: string, details?: unknown) {
    super(message, 402, requestId, details);
    this.name = "InsufficientCreditsError";
  }
}

export class ValidationError extends ApiError {
  constructor(
    message: string,
    requestId?: string,
    details?: unknown,
    statusCode = 422,
  ) {
    super(message, statusCode, requestId, details);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, requestId?: string) {
    super(message, 404, requestId);
    this.name = "NotFoundError";
  }
}

export class RateLimitError extends ApiError {
  constructor(message: string, requestId?: string, details?: unknown) {
    super(message, 429, requestId, details);
    this.name = "RateLimitError";
  }
}

export class ServerError extends ApiError {
  constructor(
    message: string,
    requestId?: string,
    details?: unknown,
    statusCode = 500,
  ) {
    super(message, statusCode, requestId, details);
    this.name = "ServerError";
  }
}

/**
 * Connection or transport-level failure (DNS, timeout, socket reset).
 */
export class NetworkError extends SdkError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "NetworkError";
  }
}

/** Operation attempted on a stream that is already closed. */
export class StreamClosedError extends SdkError {
  constructor(message = "Stream is closed") {
    super(message);
    this.name = "StreamClosedError";
  }
}

export class WebSocketError extends SdkError {
  readonly code?: number;

  constructor(message: string, code?: number) {
    super(message);
    this.name = "WebSocketError";
    this.code = code;
  }
}

/** Invalid client-side options, raised before any request is made. */
export class ConfigError extends SdkError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A video source could not be turned into something the API accepts. */
export class SourceError extends SdkError {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SourceError";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function abortError(): Error {
  const error = new Error("The operation was aborted");
  error.name = "AbortError";
  return error;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
