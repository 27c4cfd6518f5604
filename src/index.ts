export { VisionClient, type VisionClientConfig } from "./client/VisionClient";
export { StreamClient } from "./client/client";
export {
  StreamsApi,
  buildProcessing,
  type CreateStreamOptions,
} from "./client/streams";
export {
  StreamSession,
  type ErrorHandler,
  type ResultHandler,
} from "./client/stream";
export {
  HttpClient,
  type HttpClientConfig,
  type RequestOptions,
  type Transport,
} from "./client/http";
export {
  WebSocketDuplex,
  type DuplexConnection,
  type DuplexFrame,
} from "./client/duplex";
export {
  ResolvedSource,
  resolveSource,
  type ResolveSourceOptions,
} from "./client/sources";
export {
  weriftPeerFactory,
  type PeerConnectionFactory,
  type PeerOptions,
  type PeerSession,
} from "./client/peer";
export {
  cameraInput,
  createFfmpegPlayerFactory,
  fileInput,
  type MediaInput,
  type MediaPlayer,
  type MediaPlayerFactory,
} from "./client/media";
export { ConsoleLogger, type Logger } from "./client/logger";
export { parseResultJson, type Schema } from "./client/schemas";
export { CONSTRAINTS, DEFAULTS } from "./client/constants";
export {
  ApiError,
  AuthenticationError,
  ConfigError,
  InsufficientCreditsError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  SdkError,
  ServerError,
  SourceError,
  StreamClosedError,
  ValidationError,
  WebSocketError,
} from "./client/errors";
export type * from "./client/types";
