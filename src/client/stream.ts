import { WS_AUTH_FAILURE_CODE } from "./constants";
import type { DuplexConnection } from "./duplex";
import {
  ConfigError,
  StreamClosedError,
  WebSocketError,
  abortError,
  isAbortError,
  toError,
} from "./errors";
import type { Transport } from "./http";
import type { Logger } from "./logger";
import {
  StatusResponseSchema,
  StreamConfigResponseSchema,
  decodeInferenceResult,
  parseResponse,
} from "./schemas";
import type { ResolvedSource } from "./sources";
import type {
  FeedbackCreateRequest,
  StatusResponse,
  StreamConfigResponse,
  StreamInferenceResult,
} from "./types";
import { validateFeedback } from "./validation";

export type ResultHandler = (result: StreamInferenceResult) => void;
export type ErrorHandler = (error: Error) => void;

export type StreamSessionOptions = {
  streamId: string;
  transport: Transport;
  source: ResolvedSource;
  /** Lease time-to-live; 0 disables renewal. */
  ttlSeconds: number;
  onResult: ResultHandler;
  onError?: ErrorHandler;
  logger: Logger;
};

/**
 * A running analysis stream.
 *
 * Created by `client.streams.create()`, not usually constructed directly.
 * Two background loops run while the session is active: one reads inference
 * results from the stream's WebSocket, the other renews the lease every half
 * ttl. `close()` stops both, releases the local source and tells the server
 * the stream is done.
 */
export class StreamSession {
  private readonly id: string;
  private readonly transport: Transport;
  private readonly source: ResolvedSource;
  private readonly ttlSeconds: number;
  private readonly onResult: ResultHandler;
  private readonly onError?: ErrorHandler;
  private readonly logger: Logger;

  private readonly abortController = new AbortController();
  private duplex: DuplexConnection | null = null;
  private resultLoop: Promise<void> | null = null;
  private keepaliveLoop: Promise<void> | null = null;
  private started = false;
  private closed = false;
  private closing: Promise<void> | null = null;
  private selfClose: Promise<void> | null = null;

  constructor(options: StreamSessionOptions) {
    this.id = options.streamId;
    this.transport = options.transport;
    this.source = options.source;
    this.ttlSeconds = options.ttlSeconds;
    this.onResult = options.onResult;
    this.onError = options.onError;
    this.logger = options.logger;
  }

  /** The server-assigned stream id. */
  get streamId(): string {
    return this.id;
  }

  /** True until `close()` is first called. */
  get isActive(): boolean {
    return !this.closed;
  }

  /**
   * Launch the result and keepalive loops. Called once, right after
   * construction.
   */
  start(): void {
    if (this.started) {
      throw new Error("Stream already started");
    }
    if (this.closed) {
      throw new StreamClosedError();
    }
    this.started = true;

    const signal = this.abortController.signal;
    this.resultLoop = this.runResultLoop(signal);
    if (this.ttlSeconds > 0) {
      this.keepaliveLoop = this.runKeepaliveLoop(signal);
    }
  }

  /**
   * Stop all background work and release resources.
   *
   * Safe to call any number of times, concurrently or not: every call returns
   * the same teardown, which runs once.
   */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    this.closed = true;
    this.closing = this.teardown();
    return this.closing;
  }

  /**
   * Update the inference prompt while the stream is running.
   */
  async updatePrompt(prompt: string): Promise<StreamConfigResponse> {
    if (this.closed) {
      throw new StreamClosedError();
    }
    if (!prompt || typeof prompt !== "string") {
      throw new ConfigError("prompt must be a non-empty string");
    }

    this.logger.debug("Updating prompt");
    const data = await this.transport.request(
      "PATCH",
      `/streams/${this.id}/config/prompt`,
      { body: { prompt } },
    );
    const config = parseResponse(StreamConfigResponseSchema, data);
    this.logger.info("Prompt updated");
    return config;
  }

  /**
   * Submit feedback for the stream. Allowed after close.
   */
  async submitFeedback(
    feedback: FeedbackCreateRequest,
  ): Promise<StatusResponse> {
    validateFeedback(feedback);

    this.logger.debug("Submitting feedback");
    const data = await this.transport.request(
      "POST",
      `/streams/${this.id}/feedback`,
      {
        body: {
          rating: feedback.rating,
          category: feedback.category,
          feedback: feedback.feedback ?? "",
        },
      },
    );
    this.logger.info("Feedback submitted");
    return parseResponse(StatusResponseSchema, data);
  }

  private async teardown(): Promise<void> {
    this.logger.info("Closing stream:", this.id);

    try {
      this.abortController.abort(abortError());
      await Promise.all([
        joinLoop(this.keepaliveLoop),
        joinLoop(this.resultLoop),
      ]);
      this.keepaliveLoop = null;
      this.resultLoop = null;

      const duplex = this.duplex;
      this.duplex = null;
      if (duplex && !duplex.closed) {
        await duplex.close();
      }
    } finally {
      try {
        await this.source.release();
      } finally {
        await this.notifyServerClosed();
      }
    }
  }

  private async notifyServerClosed(): Promise<void> {
    try {
      await this.transport.request("DELETE", `/streams/${this.id}`);
    } catch (error) {
      this.logger.warn(
        "Failed to close stream on server:",
        toError(error).message,
      );
    }
  }

  private async runResultLoop(signal: AbortSignal): Promise<void> {
    try {
      const duplex = await this.transport.openDuplex(this.id, signal);
      this.duplex = duplex;
      await duplex.send(JSON.stringify({ api_key: this.transport.apiKey }));
      this.logger.debug("WebSocket connected for stream:", this.id);

      for (;;) {
        const frame = await duplex.receive(signal);

        if (frame.type === "text") {
          this.handleMessage(frame.data);
          continue;
        }

        if (frame.type === "error") {
          this.emitError(
            new WebSocketError(`WebSocket error: ${frame.error.message}`),
          );
          return;
        }

        if (frame.code === WS_AUTH_FAILURE_CODE) {
          this.emitError(
            new WebSocketError(
              "WebSocket auth failed: invalid API key",
              WS_AUTH_FAILURE_CODE,
            ),
          );
        } else {
          this.logger.debug("WebSocket closed:", frame.code);
        }
        return;
      }
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.emitError(
        new WebSocketError(
          `WebSocket connection failed: ${toError(error).message}`,
        ),
      );
    }
  }

  private handleMessage(raw: string): void {
    const decoded = decodeInferenceResult(raw);
    if (!decoded.ok) {
      this.logger.warn("Malformed WebSocket message:", decoded.reason);
      return;
    }

    try {
      this.onResult(decoded.value);
    } catch (error) {
      this.logger.error("onResult handler threw:", error);
    }
  }

  private async runKeepaliveLoop(signal: AbortSignal): Promise<void> {
    const intervalMs = (this.ttlSeconds / 2) * 1000;

    while (!this.closed) {
      await sleep(intervalMs, signal);
      if (this.closed) {
        return;
      }

      try {
        await this.transport.request(
          "POST",
          `/streams/${this.id}/keepalive`,
          { signal },
        );
        this.logger.debug("Lease renewed for stream:", this.id);
      } catch (error) {
        // a renewal cut short by close() can fail with any error
        if (isAbortError(error) || signal.aborted || this.closed) {
          throw isAbortError(error) ? error : abortError();
        }
        this.logger.error("Keepalive failed:", toError(error).message);
        this.emitError(toError(error));
        this.scheduleClose();
        return;
      }
    }
  }

  /**
   * Close from inside a loop without that loop awaiting its own join: the
   * teardown starts on a later tick, after the loop has returned.
   */
  private scheduleClose(): void {
    if (this.selfClose) {
      return;
    }
    this.selfClose = Promise.resolve()
      .then(() => this.close())
      .catch((error: unknown) => {
        this.logger.error(
          "Failed to close stream after keepalive failure:",
          error,
        );
      });
  }

  private emitError(error: Error): void {
    if (!this.onError) {
      this.logger.error("Stream error (no onError handler):", error.message);
      return;
    }
    try {
      this.onError(error);
    } catch (handlerError) {
      this.logger.error("onError handler threw:", handlerError);
    }
  }
}

/**
 * Await a loop that was just aborted. The abort itself is expected; any other
 * failure propagates.
 */
async function joinLoop(loop: Promise<void> | null): Promise<void> {
  if (!loop) {
    return;
  }
  try {
    await loop;
  } catch (error) {
    if (!isAbortError(error)) {
      throw error;
    }
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
