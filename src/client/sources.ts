import { DEFAULTS } from "./constants";
import { SourceError } from "./errors";
import { ConsoleLogger, type Logger } from "./logger";
import {
  cameraInput,
  createFfmpegPlayerFactory,
  fileInput,
  type MediaInput,
  type MediaPlayer,
  type MediaPlayerFactory,
} from "./media";
import {
  weriftPeerFactory,
  type PeerConnectionFactory,
  type PeerSession,
} from "./peer";
import type {
  IceServer,
  SourceConfig,
  WebRtcAnswer,
  WireSource,
} from "./types";

/**
 * Result of resolving a source: the payload to send to the API, plus the
 * peer connection and media player (file and camera sources only) that must
 * stay alive for the stream and be released when it closes.
 */
export class ResolvedSource {
  private peer: PeerSession | null;
  private player: MediaPlayer | null;

  constructor(
    readonly wireSource: WireSource,
    private readonly logger: Logger,
    peer: PeerSession | null = null,
    player: MediaPlayer | null = null,
  ) {
    this.peer = peer;
    this.player = player;
  }

  get hasPeerConnection(): boolean {
    return this.peer !== null;
  }

  /**
   * Set the server's SDP answer on the local peer connection, if any.
   */
  async applyAnswer(answer: WebRtcAnswer): Promise<void> {
    if (this.peer) {
      await this.peer.applyAnswer(answer);
      this.logger.debug("Applied SDP answer to peer connection");
    }
  }

  /**
   * Close the peer connection and stop the media player. Later calls do
   * nothing.
   */
  async release(): Promise<void> {
    const peer = this.peer;
    const player = this.player;
    this.peer = null;
    this.player = null;

    try {
      if (peer) {
        await peer.close();
        this.logger.debug("Peer connection closed");
      }
    } finally {
      if (player) {
        player.stop();
        this.logger.debug("Media player stopped");
      }
    }
  }
}

export type ResolveSourceOptions = {
  iceServers?: IceServer[];
  logger?: Logger;
  peerFactory?: PeerConnectionFactory;
  playerFactory?: MediaPlayerFactory;
  platform?: NodeJS.Platform;
};

/**
 * Convert any source into a wire-ready one.
 *
 * - livekit / webrtc sources pass through untouched.
 * - file / camera sources start a local media pipeline, attach it to a new
 *   peer connection and send that connection's SDP offer as a webrtc source.
 */
export async function resolveSource(
  source: SourceConfig,
  options: ResolveSourceOptions = {},
): Promise<ResolvedSource> {
  const logger = options.logger ?? new ConsoleLogger();

  switch (source.type) {
    case "livekit":
    case "webrtc":
      return new ResolvedSource(source, logger);

    case "file":
      return resolveMediaSource(
        fileInput(source.path, source.loop ?? false),
        options,
        logger,
      );

    case "camera":
      return resolveMediaSource(
        cameraInput(source.device ?? DEFAULTS.CAMERA_DEVICE, options.platform),
        options,
        logger,
      );

    default: {
      const unsupported: never = source;
      throw new SourceError(
        `Unsupported source type: ${JSON.stringify(unsupported)}`,
      );
    }
  }
}

async function resolveMediaSource(
  input: MediaInput,
  options: ResolveSourceOptions,
  logger: Logger,
): Promise<ResolvedSource> {
  const playerFactory =
    options.playerFactory ?? createFfmpegPlayerFactory(logger);
  const peerFactory = options.peerFactory ?? weriftPeerFactory;

  const player = await playerFactory.open(input);
  let peer: PeerSession | null = null;

  try {
    peer = peerFactory.create(player.track, {
      iceServers: options.iceServers ?? [],
      logger,
    });
    const sdp = await peer.createOffer();
    logger.debug("Created WebRTC offer from:", input.input);
    return new ResolvedSource({ type: "webrtc", sdp }, logger, peer, player);
  } catch (error) {
    try {
      await peer?.close();
    } finally {
      player.stop();
    }
    throw error;
  }
}
