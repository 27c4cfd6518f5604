import { CONSTRAINTS } from "./constants";
import { ConfigError } from "./errors";
import type { CreateStreamOptions } from "./streams";
import type { FeedbackCreateRequest } from "./types";

type Range = { readonly min: number; readonly max: number };

function checkRange(
  name: string,
  value: number | undefined,
  range: Range,
): void {
  if (value === undefined) {
    return;
  }
  if (
    typeof value !== "number" ||
    Number.isNaN(value) ||
    value < range.min ||
    value > range.max
  ) {
    throw new ConfigError(
      `${name} must be between ${range.min} and ${range.max}`,
    );
  }
}

export type ClientConfigInput = {
  apiKey: string;
  baseUrl: string;
  timeoutMs?: number;
};

/**
 * Validate client configuration values
 */
export function validateClientConfig(config: ClientConfigInput): void {
  if (!config.apiKey || typeof config.apiKey !== "string") {
    throw new ConfigError("apiKey is required and must be a string");
  }

  if (!config.baseUrl || typeof config.baseUrl !== "string") {
    throw new ConfigError("baseUrl is required and must be a string");
  }

  if (!/^https?:\/\//.test(config.baseUrl)) {
    throw new ConfigError("baseUrl must start with http:// or https://");
  }

  if (
    config.timeoutMs !== undefined &&
    (typeof config.timeoutMs !== "number" || !(config.timeoutMs > 0))
  ) {
    throw new ConfigError("timeoutMs must be a positive number");
  }
}

/**
 * Validate stream creation options before any source is opened
 */
export function validateStreamOptions(options: CreateStreamOptions): void {
  if (!options.prompt || typeof options.prompt !== "string") {
    throw new ConfigError("prompt is required and must be a string");
  }

  if (typeof options.onResult !== "function") {
    throw new ConfigError("onResult is required and must be a function");
  }

  const source = options.source;
  if (!source || typeof source !== "object") {
    throw new ConfigError("source is required");
  }
  switch (source.type) {
    case "livekit":
      if (!source.url || !source.token) {
        throw new ConfigError("livekit source requires url and token");
      }
      break;
    case "webrtc":
      if (!source.sdp) {
        throw new ConfigError("webrtc source requires an sdp offer");
      }
      break;
    case "file":
      if (!source.path) {
        throw new ConfigError("file source requires a path");
      }
      break;
    case "camera":
      break;
    default:
      throw new ConfigError(
        'source.type must be "livekit", "webrtc", "file" or "camera"',
      );
  }

  if (
    options.mode !== undefined &&
    options.mode !== "clip" &&
    options.mode !== "frame"
  ) {
    throw new ConfigError('mode must be "clip" or "frame"');
  }

  checkRange(
    "sampling_ratio",
    options.samplingRatio,
    CONSTRAINTS.SAMPLING_RATIO,
  );
  checkRange("fps", options.fps, CONSTRAINTS.FPS);
  checkRange("target_fps", options.targetFps, CONSTRAINTS.TARGET_FPS);
  checkRange(
    "clip_length_seconds",
    options.clipLengthSeconds,
    CONSTRAINTS.CLIP_LENGTH_SECONDS,
  );
  checkRange("delay_seconds", options.delaySeconds, CONSTRAINTS.DELAY_SECONDS);
  checkRange(
    "interval_seconds",
    options.intervalSeconds,
    CONSTRAINTS.INTERVAL_SECONDS,
  );

  if (
    options.maxOutputTokens !== undefined &&
    (!Number.isInteger(options.maxOutputTokens) || options.maxOutputTokens < 1)
  ) {
    throw new ConfigError("max_output_tokens must be a positive integer");
  }
}

export function validateFeedback(feedback: FeedbackCreateRequest): void {
  if (
    !Number.isInteger(feedback.rating) ||
    feedback.rating < CONSTRAINTS.RATING.min ||
    feedback.rating > CONSTRAINTS.RATING.max
  ) {
    throw new ConfigError(
      `rating must be an integer between ${CONSTRAINTS.RATING.min} and ${CONSTRAINTS.RATING.max}`,
    );
  }

  if (!feedback.category || typeof feedback.category !== "string") {
    throw new ConfigError("category must be a non-empty string");
  }
}
