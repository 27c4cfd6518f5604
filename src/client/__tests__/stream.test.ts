import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type Mock,
} from "vitest";
import {
  ConfigError,
  NetworkError,
  ServerError,
  StreamClosedError,
  WebSocketError,
  abortError,
} from "../errors";
import { HttpClient } from "../http";
import { ResolvedSource } from "../sources";
import { StreamSession, type ErrorHandler, type ResultHandler } from "../stream";
import {
  FakeTransport,
  createLogger,
  flush,
  inferenceRecord,
} from "./fakes";

const STREAM_ID = "stream-1";
const KEEPALIVE_PATH = `/streams/${STREAM_ID}/keepalive`;
const STREAM_PATH = `/streams/${STREAM_ID}`;

describe("StreamSession", () => {
  let transport: FakeTransport;
  let logger: ReturnType<typeof createLogger>;
  let source: ResolvedSource;
  let onResult: Mock<ResultHandler>;
  let onError: Mock<ErrorHandler>;

  const createSession = (ttlSeconds = 0) =>
    new StreamSession({
      streamId: STREAM_ID,
      transport,
      source,
      ttlSeconds,
      onResult,
      onError,
      logger,
    });

  beforeEach(() => {
    transport = new FakeTransport();
    logger = createLogger();
    source = new ResolvedSource(
      { type: "livekit", url: "wss://rtc.test", token: "test-token" },
      logger,
    );
    onResult = vi.fn<ResultHandler>();
    onError = vi.fn<ErrorHandler>();
  });

  describe("result loop", () => {
    it("should authenticate with the API key as the first frame", async () => {
      const session = createSession();
      session.start();
      await flush();

      expect(transport.openDuplex).toHaveBeenCalledWith(
        STREAM_ID,
        expect.any(AbortSignal),
      );
      expect(transport.duplex.sent).toEqual(['{"api_key":"test-key"}']);

      await session.close();
    });

    it("should deliver a well-formed result exactly once", async () => {
      const session = createSession();
      transport.duplex.pushText(inferenceRecord);
      session.start();
      await flush();

      expect(onResult).toHaveBeenCalledTimes(1);
      expect(onResult).toHaveBeenCalledWith(inferenceRecord);

      await session.close();
    });

    it("should drop a record with a missing field and keep reading", async () => {
      const { result: _dropped, ...incomplete } = inferenceRecord;
      const session = createSession();
      transport.duplex.pushText(incomplete);
      transport.duplex.pushText({ ...inferenceRecord, id: "result-2" });
      session.start();
      await flush();

      expect(logger.warn).toHaveBeenCalledWith(
        "Malformed WebSocket message:",
        "result: Required",
      );
      expect(onResult).toHaveBeenCalledTimes(1);
      expect(onResult.mock.calls[0]?.[0].id).toBe("result-2");
      expect(onError).not.toHaveBeenCalled();

      await session.close();
    });

    it("should drop frames that are not JSON", async () => {
      const session = createSession();
      transport.duplex.pushText("not json");
      session.start();
      await flush();

      expect(onResult).not.toHaveBeenCalled();
      expect(logger.warn).toHaveBeenCalledWith(
        "Malformed WebSocket message:",
        expect.any(String),
      );

      await session.close();
    });

    it("should keep reading after onResult throws", async () => {
      const failure = new Error("handler broke");
      onResult.mockImplementationOnce(() => {
        throw failure;
      });
      const session = createSession();
      transport.duplex.pushText(inferenceRecord);
      transport.duplex.pushText({ ...inferenceRecord, id: "result-2" });
      session.start();
      await flush();

      expect(onResult).toHaveBeenCalledTimes(2);
      expect(logger.error).toHaveBeenCalledWith(
        "onResult handler threw:",
        failure,
      );
      expect(onError).not.toHaveBeenCalled();

      await session.close();
    });

    it("should report an auth failure close once with code 1008", async () => {
      const session = createSession();
      transport.duplex.push({ type: "close", code: 1008, reason: "bad key" });
      session.start();
      await flush();

      expect(onError).toHaveBeenCalledTimes(1);
      const error = onError.mock.calls[0]?.[0];
      expect(error).toBeInstanceOf(WebSocketError);
      expect(error).toMatchObject({
        message: "WebSocket auth failed: invalid API key",
        code: 1008,
      });

      await session.close();
    });

    it("should not report a normal close", async () => {
      const session = createSession();
      transport.duplex.push({ type: "close", code: 1000, reason: "" });
      session.start();
      await flush();

      expect(onError).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith("WebSocket closed:", 1000);

      await session.close();
    });

    it("should report a transport error frame", async () => {
      const session = createSession();
      transport.duplex.push({ type: "error", error: new Error("reset") });
      session.start();
      await flush();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toMatchObject({
        name: "WebSocketError",
        message: "WebSocket error: reset",
      });

      await session.close();
    });

    it("should report a failed connection", async () => {
      transport.openDuplex.mockRejectedValueOnce(new Error("refused"));
      const session = createSession();
      session.start();
      await flush();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0].message).toBe(
        "WebSocket connection failed: refused",
      );

      await session.close();
    });

    it("should log errors when no onError handler is set", async () => {
      const session = new StreamSession({
        streamId: STREAM_ID,
        transport,
        source,
        ttlSeconds: 0,
        onResult,
        logger,
      });
      transport.duplex.push({ type: "close", code: 1008, reason: "" });
      session.start();
      await flush();

      expect(logger.error).toHaveBeenCalledWith(
        "Stream error (no onError handler):",
        "WebSocket auth failed: invalid API key",
      );

      await session.close();
    });
  });

  describe("close", () => {
    it("should tear down once however often it is called", async () => {
      const release = vi.spyOn(source, "release");
      const session = createSession(30);
      session.start();
      await flush();

      const first = session.close();
      const second = session.close();
      expect(second).toBe(first);
      expect(session.isActive).toBe(false);

      await Promise.all([first, second]);
      await session.close();

      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
      expect(release).toHaveBeenCalledTimes(1);
      expect(transport.duplex.close).toHaveBeenCalledTimes(1);
    });

    it("should release the source even when the server close fails", async () => {
      const release = vi.spyOn(source, "release");
      transport.request.mockImplementation(async (method) => {
        if (method === "DELETE") {
          throw new NetworkError("Network error: server down");
        }
        return { status: "ok" };
      });
      const session = createSession();
      session.start();
      await flush();

      await expect(session.close()).resolves.toBeUndefined();

      expect(release).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Failed to close stream on server:",
        "Network error: server down",
      );
    });

    it("should still release and close on the server when the connection close fails", async () => {
      const release = vi.spyOn(source, "release");
      transport.duplex.close.mockRejectedValueOnce(new Error("socket stuck"));
      const session = createSession();
      session.start();
      await flush();

      await expect(session.close()).rejects.toThrow("socket stuck");

      expect(release).toHaveBeenCalledTimes(1);
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
      await expect(session.close()).rejects.toThrow("socket stuck");
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
    });

    it("should still close on the server when the source release fails", async () => {
      vi.spyOn(source, "release").mockRejectedValueOnce(
        new Error("peer busy"),
      );
      const session = createSession();
      session.start();
      await flush();

      await expect(session.close()).rejects.toThrow("peer busy");

      expect(transport.duplex.close).toHaveBeenCalledTimes(1);
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
    });

    it("should close before start without touching the connection", async () => {
      const session = createSession();
      await session.close();

      expect(transport.openDuplex).not.toHaveBeenCalled();
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
      expect(() => session.start()).toThrow(StreamClosedError);
    });

    it("should refuse a second start", async () => {
      const session = createSession();
      session.start();

      expect(() => session.start()).toThrow("Stream already started");

      await session.close();
    });
  });

  describe("updatePrompt", () => {
    const configResponse = {
      id: "config-1",
      stream_id: STREAM_ID,
      prompt: "Count the people",
      backend: "gemini",
      model: "test-model",
    };

    it("should patch the prompt and return the new config", async () => {
      transport.request.mockResolvedValueOnce(configResponse);
      const session = createSession();

      const result = await session.updatePrompt("Count the people");

      expect(result).toEqual(configResponse);
      expect(transport.request).toHaveBeenCalledWith(
        "PATCH",
        `/streams/${STREAM_ID}/config/prompt`,
        { body: { prompt: "Count the people" } },
      );

      await session.close();
    });

    it("should reject an empty prompt", async () => {
      const session = createSession();

      await expect(session.updatePrompt("")).rejects.toThrow(ConfigError);
      expect(transport.request).not.toHaveBeenCalled();

      await session.close();
    });

    it("should fail after close without a request", async () => {
      const session = createSession();
      await session.close();
      transport.request.mockClear();

      await expect(session.updatePrompt("late")).rejects.toThrow(
        StreamClosedError,
      );
      expect(transport.request).not.toHaveBeenCalled();
    });
  });

  describe("submitFeedback", () => {
    it("should still send feedback after close", async () => {
      const session = createSession();
      await session.close();

      const response = await session.submitFeedback({
        rating: 5,
        category: "accuracy",
      });

      expect(response).toEqual({ status: "ok" });
      expect(transport.request).toHaveBeenCalledWith(
        "POST",
        `/streams/${STREAM_ID}/feedback`,
        { body: { rating: 5, category: "accuracy", feedback: "" } },
      );
    });

    it("should validate the rating", async () => {
      const session = createSession();

      await expect(
        session.submitFeedback({ rating: 6, category: "accuracy" }),
      ).rejects.toThrow("rating must be an integer between 1 and 5");

      await session.close();
    });
  });

  describe("keepalive loop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should renew the lease every half ttl", async () => {
      const session = createSession(30);
      session.start();

      await vi.advanceTimersByTimeAsync(14_999);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(1);
      expect(transport.request).toHaveBeenCalledWith("POST", KEEPALIVE_PATH, {
        signal: expect.any(AbortSignal),
      });

      await vi.advanceTimersByTimeAsync(15_000);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(2);

      await session.close();
    });

    it("should not renew when the ttl is zero", async () => {
      const session = createSession(0);
      session.start();

      await vi.advanceTimersByTimeAsync(120_000);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(0);

      await session.close();
    });

    it("should report a renewal failure once and close the stream", async () => {
      const failure = new NetworkError("Network error: down");
      transport.request.mockImplementation(async (method, path) => {
        if (path === KEEPALIVE_PATH) {
          throw failure;
        }
        return { status: "ok" };
      });
      const session = createSession(30);
      session.start();

      await vi.advanceTimersByTimeAsync(15_000);
      await vi.waitFor(() => {
        expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
      });

      expect(session.isActive).toBe(false);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(failure);
      expect(logger.error).toHaveBeenCalledWith(
        "Keepalive failed:",
        "Network error: down",
      );

      await vi.advanceTimersByTimeAsync(60_000);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(1);
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
    });

    it("should abort an in-flight renewal on close without reporting it", async () => {
      transport.request.mockImplementation(
        (method, path, options) =>
          new Promise((resolve, reject) => {
            if (path !== KEEPALIVE_PATH) {
              resolve({ status: "ok" });
              return;
            }
            options?.signal?.addEventListener("abort", () =>
              reject(abortError()),
            );
          }),
      );
      const session = createSession(30);
      session.start();

      await vi.advanceTimersByTimeAsync(15_000);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(1);

      await session.close();

      expect(onError).not.toHaveBeenCalled();
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
    });

    it("should not report a renewal rejected with another error on close", async () => {
      transport.request.mockImplementation(
        (method, path, options) =>
          new Promise((resolve, reject) => {
            if (path !== KEEPALIVE_PATH) {
              resolve({ status: "ok" });
              return;
            }
            options?.signal?.addEventListener("abort", () =>
              reject(
                new ServerError(
                  "Service Unavailable",
                  undefined,
                  undefined,
                  503,
                ),
              ),
            );
          }),
      );
      const session = createSession(30);
      session.start();

      await vi.advanceTimersByTimeAsync(15_000);
      expect(transport.callsTo("POST", KEEPALIVE_PATH)).toBe(1);

      await session.close();

      expect(onError).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
      expect(transport.callsTo("DELETE", STREAM_PATH)).toBe(1);
    });

    it("should not report a 503 whose body read is cut short by close", async () => {
      const http = new HttpClient({
        apiKey: "test-key",
        baseUrl: "http://test.local",
      });
      const fetchMock = vi.fn<typeof fetch>(async (_input, init) => {
        if (init?.method === "DELETE") {
          return new Response(null, { status: 204 });
        }
        const response = new Response("{}", {
          status: 503,
          statusText: "Service Unavailable",
        });
        vi.spyOn(response, "json").mockImplementation(
          () =>
            new Promise((_resolve, reject) => {
              if (init?.signal?.aborted) {
                reject(abortError());
                return;
              }
              init?.signal?.addEventListener("abort", () =>
                reject(abortError()),
              );
            }),
        );
        return response;
      });
      vi.stubGlobal("fetch", fetchMock);
      transport.request.mockImplementation((method, path, options) =>
        http.request(method, path, options),
      );
      const session = createSession(30);
      session.start();

      await vi.advanceTimersByTimeAsync(15_000);
      expect(fetchMock).toHaveBeenCalledTimes(1);

      await session.close();

      expect(onError).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fetchMock).toHaveBeenLastCalledWith(
        "http://test.local/streams/stream-1",
        expect.objectContaining({ method: "DELETE" }),
      );
    });
  });
});
