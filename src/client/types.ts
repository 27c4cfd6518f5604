export type StreamMode = "clip" | "frame";

export type ModelBackend = "overshoot" | "gemini";

export type FinishReason = "stop" | "length" | "content_filter";

export type ModelStatus = "unavailable" | "ready" | "degraded" | "saturated";

export type StreamStopReason =
  | "client_requested"
  | "webrtc_disconnected"
  | "livekit_disconnected"
  | "lease_expired"
  | "insufficient_credits";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

// Sources

/** LiveKit room as the video source. */
export type LiveKitSource = { type: "livekit"; url: string; token: string };

/** Raw SDP offer from a peer connection the caller manages. */
export type WebRtcSource = { type: "webrtc"; sdp: string };

/** Local video file streamed over WebRTC. */
export type FileSource = { type: "file"; path: string; loop?: boolean };

/** Local capture device streamed over WebRTC. */
export type CameraSource = { type: "camera"; device?: string };

export type SourceConfig =
  | LiveKitSource
  | WebRtcSource
  | FileSource
  | CameraSource;

/** Sources the API accepts directly. */
export type WireSource = LiveKitSource | WebRtcSource;

export type IceServer = {
  urls: string;
  username?: string;
  credential?: string;
};

// Processing / inference

export type ClipProcessingConfig = {
  target_fps?: number;
  /** @deprecated use target_fps */
  sampling_ratio?: number;
  /** @deprecated use target_fps */
  fps?: number;
  clip_length_seconds?: number;
  delay_seconds?: number;
};

export type FrameProcessingConfig = {
  interval_seconds: number;
};

export type ProcessingConfig = ClipProcessingConfig | FrameProcessingConfig;

export type StreamInferenceConfig = {
  prompt: string;
  backend: ModelBackend;
  model: string;
  output_schema_json?: Record<string, unknown>;
  max_output_tokens?: number;
};

export type StreamCreateRequest = {
  source: WireSource;
  processing: ProcessingConfig;
  inference: StreamInferenceConfig;
  mode?: StreamMode;
};

// Responses

export type WebRtcAnswer = {
  type: "answer";
  sdp: string;
};

export type TurnServer = {
  urls: string;
  username: string;
  credential: string;
};

export type Lease = {
  ttl_seconds: number;
};

export type StreamCreateResponse = {
  stream_id: string;
  webrtc?: WebRtcAnswer | null;
  lease?: Lease | null;
  turn_servers?: TurnServer[] | null;
};

export type StreamInferenceResult = {
  readonly id: string;
  readonly stream_id: string;
  readonly mode: StreamMode;
  readonly model_backend: string;
  readonly model_name: string;
  readonly prompt: string;
  readonly result: string; // plain text, or a JSON string when the stream has an output schema
  readonly inference_latency_ms: number;
  readonly total_latency_ms: number;
  readonly ok: boolean;
  readonly error?: string | null;
  readonly finish_reason?: string | null;
};

export type StreamConfigResponse = {
  id: string;
  stream_id: string;
  prompt: string;
  backend: string;
  model: string;
  output_schema_json?: Record<string, unknown> | null;
  created_at?: string | null;
  updated_at?: string | null;
};

export type KeepaliveResponse = {
  status: string;
  stream_id: string;
  ttl_seconds: number;
  credits_remaining_cents?: number | null;
  cost_cents?: number | null;
  seconds_charged?: number | null;
};

export type StatusResponse = {
  status: string;
};

export type ModelInfo = {
  model: string;
  ready: boolean;
  status: ModelStatus;
};

export type FeedbackCreateRequest = {
  rating: number;
  category: string;
  feedback?: string;
};

export type FeedbackResponse = {
  id: string;
  stream_id: string;
  rating: number;
  category: string;
  feedback: string;
  created_at?: string | null;
};

export type ErrorResponse = {
  error?: string;
  message?: string;
  request_id?: string;
  details?: unknown;
};
