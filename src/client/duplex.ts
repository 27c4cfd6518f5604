import WebSocket from "ws";
import { abortError } from "./errors";

/**
 * Frames a stream's result connection can deliver to its reader.
 */
export type DuplexFrame =
  | { type: "text"; data: string }
  | { type: "error"; error: Error }
  | { type: "close"; code: number; reason: string };

/**
 * Pull-based view of a persistent bidirectional connection.
 */
export interface DuplexConnection {
  readonly closed: boolean;
  send(data: string): Promise<void>;
  /**
   * Resolve with the next frame. After an error or close frame every further
   * call resolves with that same frame. Rejects with an AbortError when
   * `signal` fires first.
   */
  receive(signal?: AbortSignal): Promise<DuplexFrame>;
  close(): Promise<void>;
}

/**
 * WebSocket channel implementation
 *
 * Buffers inbound frames from the moment the socket is created so that
 * nothing sent right after the handshake is lost before the first receive().
 */
export class WebSocketDuplex implements DuplexConnection {
  private readonly queue: DuplexFrame[] = [];
  private waiters: Array<(frame: DuplexFrame) => void> = [];
  private terminal: DuplexFrame | null = null;

  private constructor(private readonly socket: WebSocket) {
    socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (!isBinary) {
        this.push({ type: "text", data: rawToString(data) });
      }
    });
    socket.on("error", (error: Error) => {
      this.finish({ type: "error", error });
    });
    socket.on("close", (code: number, reason: Buffer) => {
      this.finish({ type: "close", code, reason: reason.toString("utf8") });
    });
  }

  /**
   * Open a socket and resolve once the handshake completes.
   */
  static connect(url: string, signal?: AbortSignal): Promise<WebSocketDuplex> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }

      const socket = new WebSocket(url);
      const duplex = new WebSocketDuplex(socket);

      const cleanup = () => {
        socket.off("open", onOpen);
        socket.off("error", onError);
        signal?.removeEventListener("abort", onAbort);
      };
      const onOpen = () => {
        cleanup();
        resolve(duplex);
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onAbort = () => {
        cleanup();
        socket.terminate();
        reject(abortError());
      };

      socket.once("open", onOpen);
      socket.once("error", onError);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  get closed(): boolean {
    return (
      this.socket.readyState === WebSocket.CLOSING ||
      this.socket.readyState === WebSocket.CLOSED
    );
  }

  send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  receive(signal?: AbortSignal): Promise<DuplexFrame> {
    if (signal?.aborted) {
      return Promise.reject(abortError());
    }

    const next = this.queue.shift() ?? this.terminal;
    if (next) {
      return Promise.resolve(next);
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((waiter) => waiter !== deliver);
        reject(abortError());
      };
      const deliver = (frame: DuplexFrame) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(frame);
      };
      this.waiters.push(deliver);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.close();
    });
  }

  private push(frame: DuplexFrame): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      this.queue.push(frame);
    }
  }

  private finish(frame: DuplexFrame): void {
    // ws reports a failed socket as "error" followed by "close"; keep the first
    if (this.terminal) {
      return;
    }
    this.terminal = frame;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(frame);
    }
  }
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}
