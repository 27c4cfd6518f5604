import { DEFAULTS } from "./constants";
import { WebSocketDuplex, type DuplexConnection } from "./duplex";
import {
  ApiError,
  AuthenticationError,
  ConfigError,
  InsufficientCreditsError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
  abortError,
  isAbortError,
} from "./errors";
import { ErrorResponseSchema } from "./schemas";
import type { ErrorResponse, HttpMethod } from "./types";

export type HttpClientConfig = {
  apiKey: string;
  baseUrl: string;
  /**
   * Per-request timeout in milliseconds
   * @default 30000
   */
  timeoutMs?: number;
};

export type RequestOptions = {
  body?: unknown;
  /** Caller cancellation. An aborted request rejects with an AbortError. */
  signal?: AbortSignal;
};

/**
 * What a stream session needs from the network: authenticated JSON calls and
 * a result connection per stream.
 */
export interface Transport {
  readonly apiKey: string;
  request(
    method: HttpMethod,
    path: string,
    options?: RequestOptions,
  ): Promise<unknown>;
  openDuplex(streamId: string, signal?: AbortSignal): Promise<DuplexConnection>;
}

/**
 * HTTP helper shared by the low-level and high-level clients.
 *
 * Adds auth headers and maps HTTP status codes to SDK errors.
 */
export class HttpClient implements Transport {
  readonly apiKey: string;
  readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(config: HttpClientConfig) {
    if (!config.apiKey) {
      throw new ConfigError("apiKey is required");
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULTS.TIMEOUT_MS;
  }

  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method,
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body:
          options.body === undefined ? undefined : JSON.stringify(options.body),
      });

      if (response.status === 204) {
        return { status: "ok" };
      }

      if (!response.ok) {
        const body: unknown = await response.json().catch(() => ({
          error: "unknown_error",
          message: response.statusText,
        }));
        const parsed = ErrorResponseSchema.safeParse(body);
        throw toApiError(
          response.status,
          parsed.success ? parsed.data : {},
          response.statusText,
        );
      }

      return await response.json();
    } catch (error) {
      if (options.signal?.aborted) {
        throw isAbortError(error) ? error : abortError();
      }

      if (error instanceof ApiError) {
        throw error;
      }

      if (controller.signal.aborted) {
        throw new NetworkError("Request timed out", error);
      }

      if (error instanceof Error) {
        throw new NetworkError(`Network error: ${error.message}`, error);
      }

      throw new NetworkError("Unknown network error");
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Build the WebSocket URL for a given stream.
   */
  wsUrl(streamId: string): string {
    const wsBase = this.baseUrl
      .replace(/^http:\/\//, "ws://")
      .replace(/^https:\/\//, "wss://");
    return `${wsBase}/ws/streams/${streamId}`;
  }

  openDuplex(streamId: string, signal?: AbortSignal): Promise<DuplexConnection> {
    return WebSocketDuplex.connect(this.wsUrl(streamId), signal);
  }
}

export function toApiError(
  status: number,
  body: ErrorResponse,
  statusText = "",
): ApiError {
  const message =
    body.message || body.error || statusText || "Unknown error";
  const requestId = body.request_id;
  const details = body.details;

  if (status === 401) {
    return new AuthenticationError(message, requestId);
  }
  if (status === 402) {
    return new InsufficientCreditsError(message, requestId, details);
  }
  if (status === 400 || status === 422) {
    return new ValidationError(message, requestId, details, status);
  }
  if (status === 404) {
    return new NotFoundError(message, requestId);
  }
  if (status === 429) {
    return new RateLimitError(message, requestId, details);
  }
  if (status >= 500) {
    return new ServerError(message, requestId, details, status);
  }
  return new ApiError(message, status, requestId, details);
}
