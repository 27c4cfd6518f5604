import { RTCPeerConnection, type MediaStreamTrack } from "werift";
import { SourceError } from "./errors";
import type { Logger } from "./logger";
import type { IceServer, WebRtcAnswer } from "./types";

/**
 * A send-only peer connection carrying one local video track.
 */
export interface PeerSession {
  /** Create an SDP offer, set it locally and return its SDP. */
  createOffer(): Promise<string>;
  applyAnswer(answer: WebRtcAnswer): Promise<void>;
  close(): Promise<void>;
}

export type PeerOptions = {
  iceServers: IceServer[];
  logger: Logger;
};

export interface PeerConnectionFactory {
  create(track: MediaStreamTrack, options: PeerOptions): PeerSession;
}

class WeriftPeerSession implements PeerSession {
  private readonly pc: RTCPeerConnection;

  constructor(track: MediaStreamTrack, options: PeerOptions) {
    const { logger } = options;
    this.pc = new RTCPeerConnection({ iceServers: options.iceServers });
    this.pc.iceConnectionStateChange.subscribe((state) => {
      logger.debug("ICE connection state:", state);
    });
    this.pc.addTransceiver(track, { direction: "sendonly" });
  }

  async createOffer(): Promise<string> {
    const offer = await this.pc.createOffer();
    // werift gathers ICE candidates before this resolves, so the SDP is complete
    await this.pc.setLocalDescription(offer);

    const local = this.pc.localDescription;
    if (!local) {
      throw new SourceError("Failed to create local description");
    }
    return local.sdp;
  }

  async applyAnswer(answer: WebRtcAnswer): Promise<void> {
    await this.pc.setRemoteDescription({ type: answer.type, sdp: answer.sdp });
  }

  close(): Promise<void> {
    return this.pc.close();
  }
}

export const weriftPeerFactory: PeerConnectionFactory = {
  create: (track, options) => new WeriftPeerSession(track, options),
};
