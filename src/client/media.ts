import { createSocket, type Socket } from "node:dgram";
import type { AddressInfo } from "node:net";
import ffmpeg from "fluent-ffmpeg";
import { MediaStreamTrack } from "werift";
import { SourceError } from "./errors";
import type { Logger } from "./logger";

/**
 * An ffmpeg input: a file path or a capture device plus its demuxer.
 */
export type MediaInput = {
  input: string;
  format?: string;
  loop?: boolean;
  /** Pace reading at native frame rate (files, not live devices). */
  realtime?: boolean;
  /** Check for a video stream with ffprobe before starting. */
  probe?: boolean;
};

/**
 * A running media pipeline feeding one outgoing video track.
 */
export interface MediaPlayer {
  readonly track: MediaStreamTrack;
  stop(): void;
}

export interface MediaPlayerFactory {
  open(input: MediaInput): Promise<MediaPlayer>;
}

// dynamic payload type that werift offers VP8 under by default
const RTP_PAYLOAD_TYPE = 96;

export function fileInput(path: string, loop: boolean): MediaInput {
  return { input: path, loop, realtime: true, probe: true };
}

/**
 * Map a camera device name to an ffmpeg input for the current platform.
 */
export function cameraInput(
  device: string,
  platform: NodeJS.Platform = process.platform,
): MediaInput {
  if (device === "default") {
    if (platform === "linux") {
      return { input: "/dev/video0", format: "v4l2" };
    }
    if (platform === "darwin") {
      return { input: "default", format: "avfoundation" };
    }
    return { input: "video=0", format: "dshow" };
  }
  if (device.startsWith("/dev/")) {
    return { input: device, format: "v4l2" };
  }
  return { input: device };
}

function probeHasVideo(input: string): Promise<boolean> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(input, (error: unknown, data) => {
      if (error) {
        reject(
          new SourceError(`Failed to probe video input: ${input}`, error),
        );
        return;
      }
      resolve(data.streams.some((stream) => stream.codec_type === "video"));
    });
  });
}

/**
 * A loopback UDP socket whose packets are written to a track as RTP.
 */
export class RtpReceiver {
  private listening = false;
  private closed = false;

  constructor(
    private readonly track: MediaStreamTrack,
    private readonly logger: Logger,
    private readonly socket: Socket = createSocket("udp4"),
  ) {
    // bind() reports its own failure
    this.socket.on("error", (error: Error) => {
      if (this.listening && !this.closed) {
        this.logger.error("RTP socket failed:", error.message);
      }
    });
    this.socket.on("message", (packet: Buffer) => {
      this.track.writeRtp(packet);
    });
  }

  /** Bind to an ephemeral port on 127.0.0.1 and return it. */
  bind(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.socket.once("error", reject);
      this.socket.bind(0, "127.0.0.1", () => {
        this.socket.off("error", reject);
        this.listening = true;
        const address: AddressInfo = this.socket.address();
        resolve(address.port);
      });
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.socket.close();
  }
}

/**
 * Encodes the input to VP8 with ffmpeg and sends it as RTP to a loopback UDP
 * socket; every packet received there is written to the track.
 */
class FfmpegMediaPlayer implements MediaPlayer {
  readonly track = new MediaStreamTrack({ kind: "video" });
  private readonly receiver: RtpReceiver;
  private command: ffmpeg.FfmpegCommand | null = null;
  private stopped = false;

  constructor(
    private readonly input: MediaInput,
    private readonly logger: Logger,
  ) {
    this.receiver = new RtpReceiver(this.track, logger);
  }

  async start(): Promise<void> {
    const port = await this.receiver.bind();

    const command = ffmpeg(this.input.input);
    if (this.input.format) {
      command.inputFormat(this.input.format);
    }
    const inputOptions: string[] = [];
    if (this.input.realtime) {
      inputOptions.push("-re");
    }
    if (this.input.loop) {
      inputOptions.push("-stream_loop", "-1");
    }
    if (inputOptions.length > 0) {
      command.inputOptions(inputOptions);
    }

    command
      .noAudio()
      .videoCodec("libvpx")
      .outputOptions([
        "-deadline",
        "realtime",
        "-cpu-used",
        "8",
        "-b:v",
        "1M",
        "-payload_type",
        String(RTP_PAYLOAD_TYPE),
      ])
      .format("rtp")
      .output(`rtp://127.0.0.1:${port}`)
      .on("start", (commandLine: string) => {
        this.logger.debug("ffmpeg started:", commandLine);
      })
      .on("error", (error: Error) => {
        if (!this.stopped) {
          this.logger.error("ffmpeg failed:", error.message);
        }
      })
      .on("end", () => {
        this.logger.debug("ffmpeg finished:", this.input.input);
      });

    this.command = command;
    command.run();
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.command?.kill("SIGKILL");
    this.command = null;
    this.receiver.close();
  }
}

export function createFfmpegPlayerFactory(logger: Logger): MediaPlayerFactory {
  return {
    async open(input) {
      if (input.probe && !(await probeHasVideo(input.input))) {
        throw new SourceError(`No video track found in: ${input.input}`);
      }
      const player = new FfmpegMediaPlayer(input, logger);
      try {
        await player.start();
      } catch (error) {
        player.stop();
        throw new SourceError(
          `Failed to start media pipeline for: ${input.input}`,
          error,
        );
      }
      return player;
    },
  };
}
