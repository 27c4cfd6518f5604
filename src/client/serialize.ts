import type {
  ProcessingConfig,
  StreamInferenceConfig,
  WireSource,
} from "./types";

type Payload = Record<string, unknown>;

function stripUndefined(value: object): Payload {
  return Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined),
  );
}

export function serializeSource(source: WireSource): Payload {
  switch (source.type) {
    case "livekit":
      return { type: "livekit", url: source.url, token: source.token };
    case "webrtc":
      return { type: "webrtc", sdp: source.sdp };
  }
}

/**
 * Only the fields that were set are sent, so a clip config carries either
 * target_fps or the legacy fps / sampling_ratio pair.
 */
export function serializeProcessing(processing: ProcessingConfig): Payload {
  return stripUndefined(processing);
}

export function serializeInference(inference: StreamInferenceConfig): Payload {
  return stripUndefined(inference);
}
