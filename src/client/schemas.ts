/**
 * Runtime validation for payloads coming back from the API.
 *
 * Each schema is pinned to the matching type in ./types.
 */

import { z } from "zod";
import type {
  ErrorResponse,
  FeedbackResponse,
  KeepaliveResponse,
  ModelInfo,
  StatusResponse,
  StreamConfigResponse,
  StreamCreateResponse,
  StreamInferenceResult,
} from "./types";
import { ApiError } from "./errors";

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const WebRtcAnswerSchema = z.object({
  type: z.literal("answer"),
  sdp: z.string(),
});

export const StreamCreateResponseSchema: Schema<StreamCreateResponse> =
  z.object({
    stream_id: z.string(),
    webrtc: WebRtcAnswerSchema.nullish(),
    lease: z.object({ ttl_seconds: z.number().int().nonnegative() }).nullish(),
    turn_servers: z
      .array(
        z.object({
          urls: z.string(),
          username: z.string(),
          credential: z.string(),
        }),
      )
      .nullish(),
  });

export const KeepaliveResponseSchema: Schema<KeepaliveResponse> = z.object({
  status: z.string().default("ok"),
  stream_id: z.string().default(""),
  ttl_seconds: z.number().default(0),
  credits_remaining_cents: z.number().nullish(),
  cost_cents: z.number().nullish(),
  seconds_charged: z.number().nullish(),
});

export const StreamConfigResponseSchema: Schema<StreamConfigResponse> =
  z.object({
    id: z.string(),
    stream_id: z.string(),
    prompt: z.string(),
    backend: z.string(),
    model: z.string(),
    output_schema_json: z.record(z.unknown()).nullish(),
    created_at: z.string().nullish(),
    updated_at: z.string().nullish(),
  });

export const StatusResponseSchema: Schema<StatusResponse> = z.object({
  status: z.string().default("ok"),
});

export const ModelInfoSchema: Schema<ModelInfo> = z.object({
  model: z.string(),
  ready: z.boolean(),
  status: z.enum(["unavailable", "ready", "degraded", "saturated"]),
});

export const FeedbackResponseSchema: Schema<FeedbackResponse> = z.object({
  id: z.string(),
  stream_id: z.string(),
  rating: z.number(),
  category: z.string(),
  feedback: z.string(),
  created_at: z.string().nullish(),
});

export const StreamInferenceResultSchema: Schema<StreamInferenceResult> =
  z.object({
    id: z.string(),
    stream_id: z.string(),
    mode: z.enum(["clip", "frame"]),
    model_backend: z.string(),
    model_name: z.string(),
    prompt: z.string(),
    result: z.string(),
    inference_latency_ms: z.number(),
    total_latency_ms: z.number(),
    ok: z.boolean(),
    error: z.string().nullish(),
    finish_reason: z.string().nullish(),
  });

export const ErrorResponseSchema: Schema<ErrorResponse> = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  request_id: z.string().optional(),
  details: z.unknown().optional(),
});

/**
 * Parse a successful response body, raising ApiError when it does not have
 * the documented shape.
 */
export function parseResponse<T>(schema: Schema<T>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ApiError(
      `Malformed response: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
      undefined,
      undefined,
      parsed.error.issues,
    );
  }
  return parsed.data;
}

/**
 * Parse a list endpoint that answers either with a bare array or with the
 * array wrapped under `key`.
 */
export function parseList<T>(
  schema: Schema<T>,
  data: unknown,
  key: string,
): T[] {
  return listItems(data, key).map((item) => parseResponse(schema, item));
}

function listItems(data: unknown, key: string): unknown[] {
  if (Array.isArray(data)) {
    return data;
  }
  const wrapped = z.record(z.unknown()).safeParse(data);
  const items = wrapped.success ? wrapped.data[key] : undefined;
  return Array.isArray(items) ? items : [];
}

/**
 * Decode one WebSocket text frame into an inference result.
 * Fails when the frame is not valid JSON or misses a required field.
 */
export function decodeInferenceResult(
  raw: string,
): { ok: true; value: StreamInferenceResult } | { ok: false; reason: string } {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  const parsed = StreamInferenceResultSchema.safeParse(data);
  if (!parsed.success) {
    return {
      ok: false,
      reason: parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    };
  }
  return { ok: true, value: Object.freeze(parsed.data) };
}

/**
 * Parse `result.result` as JSON. Use this when the stream was created with an
 * output schema. Throws SyntaxError when the payload is not JSON; when
 * `schema` is given the decoded value is validated against it as well.
 */
export function parseResultJson(result: StreamInferenceResult): unknown;
export function parseResultJson<T>(
  result: StreamInferenceResult,
  schema: Schema<T>,
): T;
export function parseResultJson<T>(
  result: StreamInferenceResult,
  schema?: Schema<T>,
): unknown {
  const value: unknown = JSON.parse(result.result);
  return schema ? schema.parse(value) : value;
}
