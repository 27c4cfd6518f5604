import { DEFAULTS } from "./constants";
import type { Transport } from "./http";
import type { Logger } from "./logger";
import type { MediaPlayerFactory } from "./media";
import type { PeerConnectionFactory } from "./peer";
import { StreamCreateResponseSchema, parseResponse } from "./schemas";
import {
  serializeInference,
  serializeProcessing,
  serializeSource,
} from "./serialize";
import { resolveSource, type ResolvedSource } from "./sources";
import {
  StreamSession,
  type ErrorHandler,
  type ResultHandler,
} from "./stream";
import type {
  IceServer,
  ModelBackend,
  ProcessingConfig,
  SourceConfig,
  StreamInferenceConfig,
  StreamMode,
} from "./types";
import { validateStreamOptions } from "./validation";

export interface CreateStreamOptions {
  /**
   * Video source: livekit room, raw SDP offer, local file or local camera
   */
  source: SourceConfig;

  /**
   * The prompt/task to run on each window of the stream.
   *
   * Examples:
   * - "Read any visible text"
   * - "Detect objects and return as JSON array"
   */
  prompt: string;

  /**
   * Called for each inference result
   */
  onResult: ResultHandler;

  /**
   * Called for background failures: keepalive errors, WebSocket errors
   */
  onError?: ErrorHandler;

  /**
   * "clip" or "frame". Inferred from the processing options when omitted.
   */
  mode?: StreamMode;

  backend?: ModelBackend;

  model?: string;

  /**
   * Optional JSON schema for structured output
   */
  outputSchema?: Record<string, unknown>;

  maxOutputTokens?: number;

  /** Clip mode: frame sampling rate (1-30). */
  targetFps?: number;

  /** Clip mode: seconds per clip (0.1-60). */
  clipLengthSeconds?: number;

  /** Clip mode: seconds between clips (0-60). */
  delaySeconds?: number;

  /** @deprecated use targetFps */
  samplingRatio?: number;

  /** @deprecated use targetFps */
  fps?: number;

  /** Frame mode: seconds between captured frames. */
  intervalSeconds?: number;

  /**
   * ICE servers for the local peer connection (file and camera sources)
   */
  iceServers?: IceServer[];
}

export type StreamsApiDeps = {
  transport: Transport;
  logger: Logger;
  peerFactory?: PeerConnectionFactory;
  playerFactory?: MediaPlayerFactory;
};

/**
 * Stream operations on the high-level client, reached as `client.streams`.
 */
export class StreamsApi {
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly peerFactory?: PeerConnectionFactory;
  private readonly playerFactory?: MediaPlayerFactory;

  constructor(deps: StreamsApiDeps) {
    this.transport = deps.transport;
    this.logger = deps.logger;
    this.peerFactory = deps.peerFactory;
    this.playerFactory = deps.playerFactory;
  }

  /**
   * Create and start a new analysis stream.
   *
   * Resolves the source (creating a peer connection for file and camera
   * sources), creates the stream, applies the SDP answer and returns a
   * running session with keepalive and result delivery already started.
   */
  async create(options: CreateStreamOptions): Promise<StreamSession> {
    validateStreamOptions(options);

    this.logger.debug("Starting stream with source type:", options.source.type);
    const resolved = await resolveSource(options.source, {
      iceServers: options.iceServers,
      logger: this.logger,
      peerFactory: this.peerFactory,
      playerFactory: this.playerFactory,
    });

    const processing = buildProcessing(options);
    const mode =
      options.mode ?? ("interval_seconds" in processing ? "frame" : "clip");
    const inference: StreamInferenceConfig = {
      prompt: options.prompt,
      backend: options.backend ?? DEFAULTS.BACKEND,
      model: options.model ?? DEFAULTS.MODEL,
      output_schema_json: options.outputSchema,
      max_output_tokens: options.maxOutputTokens,
    };

    let streamId: string | null = null;
    try {
      const data = await this.transport.request("POST", "/streams", {
        body: {
          source: serializeSource(resolved.wireSource),
          processing: serializeProcessing(processing),
          inference: serializeInference(inference),
          mode,
        },
      });
      const response = parseResponse(StreamCreateResponseSchema, data);
      streamId = response.stream_id;
      this.logger.info("Stream created:", streamId);

      if (response.webrtc && resolved.hasPeerConnection) {
        await resolved.applyAnswer(response.webrtc);
      }

      const session = new StreamSession({
        streamId,
        transport: this.transport,
        source: resolved,
        ttlSeconds: response.lease?.ttl_seconds ?? 0,
        onResult: options.onResult,
        onError: options.onError,
        logger: this.logger,
      });
      session.start();
      return session;
    } catch (error) {
      await this.abandon(resolved, streamId);
      throw error;
    }
  }

  /**
   * Undo a half-finished create: release the local source, and close the
   * remote stream if the server already made one.
   */
  private async abandon(
    resolved: ResolvedSource,
    streamId: string | null,
  ): Promise<void> {
    try {
      await resolved.release();
    } finally {
      if (streamId !== null) {
        await this.transport
          .request("DELETE", `/streams/${streamId}`)
          .catch((error: unknown) => {
            this.logger.warn("Failed to close abandoned stream:", error);
          });
      }
    }
  }
}

/**
 * Build the processing config from the flat options.
 *
 * Frame mode when asked for, or when only an interval is given. Otherwise
 * clip mode, in the legacy fps / sampling_ratio form only when one of those
 * was passed explicitly.
 */
export function buildProcessing(
  options: Pick<
    CreateStreamOptions,
    | "mode"
    | "targetFps"
    | "clipLengthSeconds"
    | "delaySeconds"
    | "samplingRatio"
    | "fps"
    | "intervalSeconds"
  >,
): ProcessingConfig {
  if (
    options.mode === "frame" ||
    (options.mode === undefined && options.intervalSeconds !== undefined)
  ) {
    return {
      interval_seconds: options.intervalSeconds ?? DEFAULTS.INTERVAL_SECONDS,
    };
  }

  const clipLengthSeconds =
    options.clipLengthSeconds ?? DEFAULTS.CLIP_LENGTH_SECONDS;
  const delaySeconds = options.delaySeconds ?? DEFAULTS.DELAY_SECONDS;

  if (options.samplingRatio !== undefined || options.fps !== undefined) {
    return {
      sampling_ratio: options.samplingRatio ?? DEFAULTS.SAMPLING_RATIO,
      fps: options.fps ?? DEFAULTS.FPS,
      clip_length_seconds: clipLengthSeconds,
      delay_seconds: delaySeconds,
    };
  }

  return {
    target_fps: options.targetFps ?? DEFAULTS.TARGET_FPS,
    clip_length_seconds: clipLengthSeconds,
    delay_seconds: delaySeconds,
  };
}
