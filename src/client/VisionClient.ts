import { StreamClient } from "./client";
import { HttpClient } from "./http";
import { ConsoleLogger, type Logger } from "./logger";
import type { MediaPlayerFactory } from "./media";
import type { PeerConnectionFactory } from "./peer";
import { StreamsApi } from "./streams";
import type { ModelInfo } from "./types";
import { validateClientConfig } from "./validation";

export interface VisionClientConfig {
  /**
   * API key for authentication
   * Required for all API requests
   */
  apiKey: string;

  /**
   * Base URL for the API (e.g., "https://api.example.com")
   */
  baseUrl: string;

  /**
   * Per-request timeout in milliseconds
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * Enable debug logging
   * @default false
   */
  debug?: boolean;

  /**
   * Replaces the console logger. `debug` is ignored when set.
   */
  logger?: Logger;

  /** Peer connections for file and camera sources. Defaults to werift. */
  peerFactory?: PeerConnectionFactory;

  /** Media pipelines for file and camera sources. Defaults to ffmpeg. */
  playerFactory?: MediaPlayerFactory;
}

/**
 * High-level entry point.
 *
 * ```ts
 * const client = new VisionClient({ apiKey, baseUrl });
 * const stream = await client.streams.create({
 *   source: { type: "camera" },
 *   prompt: "Describe what you see",
 *   onResult: (result) => console.log(result.result),
 * });
 * // ...
 * await stream.close();
 * ```
 */
export class VisionClient {
  readonly streams: StreamsApi;
  private readonly api: StreamClient;

  constructor(config: VisionClientConfig) {
    validateClientConfig(config);

    const logger = config.logger ?? new ConsoleLogger(config.debug ?? false);
    const http = new HttpClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    });

    this.api = new StreamClient(http);
    this.streams = new StreamsApi({
      transport: http,
      logger,
      peerFactory: config.peerFactory,
      playerFactory: config.playerFactory,
    });
  }

  /** List available models and their current status. */
  getModels(): Promise<ModelInfo[]> {
    return this.api.getModels();
  }

  healthCheck(): Promise<string> {
    return this.api.healthCheck();
  }
}
