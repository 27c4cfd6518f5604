import { HttpClient, type HttpClientConfig, type Transport } from "./http";
import {
  FeedbackResponseSchema,
  KeepaliveResponseSchema,
  ModelInfoSchema,
  StatusResponseSchema,
  StreamConfigResponseSchema,
  StreamCreateResponseSchema,
  parseList,
  parseResponse,
} from "./schemas";
import {
  serializeInference,
  serializeProcessing,
  serializeSource,
} from "./serialize";
import { validateFeedback } from "./validation";
import type {
  FeedbackCreateRequest,
  FeedbackResponse,
  KeepaliveResponse,
  ModelInfo,
  StatusResponse,
  StreamConfigResponse,
  StreamCreateRequest,
  StreamCreateResponse,
} from "./types";

/**
 * Low-level client mapping 1:1 onto the API endpoints.
 *
 * No background tasks, no WebSocket, no callbacks. For automatic keepalive
 * and result delivery use `VisionClient.streams.create()`.
 */
export class StreamClient {
  private http: Transport;

  /**
   * Accepts connection settings, or an existing transport to share with a
   * high-level client.
   */
  constructor(config: HttpClientConfig | Transport) {
    this.http = "request" in config ? config : new HttpClient(config);
  }

  /** POST /streams */
  async createStream(
    request: StreamCreateRequest,
  ): Promise<StreamCreateResponse> {
    const body: Record<string, unknown> = {
      source: serializeSource(request.source),
      processing: serializeProcessing(request.processing),
      inference: serializeInference(request.inference),
    };
    if (request.mode !== undefined) {
      body.mode = request.mode;
    }

    const data = await this.http.request("POST", "/streams", { body });
    return parseResponse(StreamCreateResponseSchema, data);
  }

  /** POST /streams/{id}/keepalive */
  async renewLease(streamId: string): Promise<KeepaliveResponse> {
    const data = await this.http.request(
      "POST",
      `/streams/${streamId}/keepalive`,
    );
    return parseResponse(KeepaliveResponseSchema, data);
  }

  /** PATCH /streams/{id}/config/prompt */
  async updatePrompt(
    streamId: string,
    prompt: string,
  ): Promise<StreamConfigResponse> {
    const data = await this.http.request(
      "PATCH",
      `/streams/${streamId}/config/prompt`,
      { body: { prompt } },
    );
    return parseResponse(StreamConfigResponseSchema, data);
  }

  /** DELETE /streams/{id}: close the stream and trigger final billing. */
  async closeStream(streamId: string): Promise<StatusResponse> {
    const data = await this.http.request("DELETE", `/streams/${streamId}`);
    return parseResponse(StatusResponseSchema, data);
  }

  /** GET /models */
  async getModels(): Promise<ModelInfo[]> {
    const data = await this.http.request("GET", "/models");
    return parseList(ModelInfoSchema, data, "models");
  }

  async submitFeedback(
    streamId: string,
    feedback: FeedbackCreateRequest,
  ): Promise<StatusResponse> {
    validateFeedback(feedback);
    const data = await this.http.request(
      "POST",
      `/streams/${streamId}/feedback`,
      {
        body: {
          rating: feedback.rating,
          category: feedback.category,
          feedback: feedback.feedback ?? "",
        },
      },
    );
    return parseResponse(StatusResponseSchema, data);
  }

  async getAllFeedback(): Promise<FeedbackResponse[]> {
    const data = await this.http.request("GET", "/streams/feedback");
    return parseList(FeedbackResponseSchema, data, "feedback");
  }

  async healthCheck(): Promise<string> {
    const data = await this.http.request("GET", "/healthz");
    if (typeof data === "string") {
      return data;
    }
    return parseResponse(StatusResponseSchema, data).status;
  }
}
