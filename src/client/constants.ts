/**
 * Default configuration values for streams and clients
 */
export const DEFAULTS = {
  BACKEND: "overshoot" as const,
  MODEL: "Qwen/Qwen3-VL-30B-A3B-Instruct",
  TARGET_FPS: 6,
  SAMPLING_RATIO: 0.1,
  FPS: 30,
  CLIP_LENGTH_SECONDS: 1.0,
  DELAY_SECONDS: 1.0,
  INTERVAL_SECONDS: 2.0,
  TIMEOUT_MS: 30_000,
  CAMERA_DEVICE: "default",
} as const;

/**
 * Validation constraints
 */
export const CONSTRAINTS = {
  SAMPLING_RATIO: { min: 0, max: 1 },
  FPS: { min: 1, max: 120 },
  TARGET_FPS: { min: 1, max: 30 },
  CLIP_LENGTH_SECONDS: { min: 0.1, max: 60 },
  DELAY_SECONDS: { min: 0, max: 60 },
  INTERVAL_SECONDS: { min: 0.1, max: 60 },
  RATING: { min: 1, max: 5 },
} as const;

/** WebSocket close code the server uses for a rejected API key. */
export const WS_AUTH_FAILURE_CODE = 1008;
