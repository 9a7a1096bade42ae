import {
  RTP_VIDEO_CLOCK_RATE,
  StderrTail,
  describeExit,
  spawnMediaProcess,
  writeIvfFrame,
  writeIvfHeader,
} from "@peerstream/session";
import type {
  EncodedFrame,
  Logger,
  MediaProcess,
  SpawnMediaProcess,
  VideoFormat,
  VideoSink,
} from "@peerstream/session";
import { VIEWER_FORMATS } from "./config";
import type { ViewerCodec } from "./config";

export type FfmpegVideoSinkOptions = {
  ffmpegPath: string;
  codec: ViewerCodec;
  width: number;
  height: number;
  logger: Logger;
  spawnProcess?: SpawnMediaProcess;
};

// Decode the compressed stream on stdin to packed bgr24 pictures of a fixed size on stdout.
export function buildDecoderArgs(codec: ViewerCodec, width: number, height: number): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-fflags",
    "nobuffer",
    "-flags",
    "low_delay",
    "-f",
    codec === "VP8" ? "ivf" : "h264",
    "-i",
    "pipe:0",
    "-an",
    "-fps_mode",
    "passthrough",
    "-vf",
    `scale=${width}:${height}`,
    "-pix_fmt",
    "bgr24",
    "-f",
    "rawvideo",
    "pipe:1",
  ];
}

// VideoSink backed by an ffmpeg decoder process. VP8 is framed as IVF on the way in;
// H264 arrives as an Annex-B byte stream and is written through unchanged.
export class FfmpegVideoSink implements VideoSink {
  onRawFrame:
    | null
    | ((width: number, height: number, pixelFormat: string, payload: Buffer) => void) = null;
  onError: null | ((message: string) => void) = null;

  private readonly ffmpegPath: string;
  private readonly codec: ViewerCodec;
  private readonly width: number;
  private readonly height: number;
  private readonly frameBytes: number;
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnMediaProcess;
  private readonly stderrTail = new StderrTail();
  private format: VideoFormat | null = null;
  private process: MediaProcess | null = null;
  private exited: Promise<void> | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private firstTimestamp: number | null = null;
  private stopping = false;
  private failed = false;
  private awaitingKeyframe = true;
  private skipped = 0;
  private decoded = 0;

  constructor(options: FfmpegVideoSinkOptions) {
    this.ffmpegPath = options.ffmpegPath;
    this.codec = options.codec;
    this.width = options.width;
    this.height = options.height;
    this.frameBytes = options.width * options.height * 3;
    this.logger = options.logger;
    this.spawnProcess = options.spawnProcess ?? spawnMediaProcess;
  }

  getSinkFormats(): VideoFormat[] {
    return [VIEWER_FORMATS[this.codec]];
  }

  setFormat(format: VideoFormat): void {
    if (format.codec !== this.codec) {
      throw new Error(`Decoder is configured for ${this.codec}, not ${format.codec}`);
    }
    this.format = format;
  }

  // Frames dropped while waiting for the first keyframe.
  skippedFrames(): number {
    return this.skipped;
  }

  decodedFrames(): number {
    return this.decoded;
  }

  async start(): Promise<void> {
    if (this.process || this.stopping) {
      return;
    }
    if (!this.format) {
      throw new Error("Decoder started before a format was set");
    }

    this.logger.info(`Decoding ${this.codec} to bgr24 ${this.width}x${this.height}.`);
    const args = buildDecoderArgs(this.codec, this.width, this.height);
    const child = this.spawnProcess(this.ffmpegPath, args);
    this.process = child;

    let markExited: () => void = () => undefined;
    this.exited = new Promise((resolve) => {
      markExited = resolve;
    });

    child.stdout?.on("data", (chunk: Buffer) => this.onDecodedBytes(chunk));
    child.stderr?.on("data", (chunk: Buffer) => this.stderrTail.append(chunk));
    // EPIPE after the decoder exits is reported through "close".
    child.stdin?.on("error", (error: Error) => {
      this.logger.debug(`Decoder stdin: ${error.message}`);
    });

    child.once("error", (error) => {
      markExited();
      this.fail(`ffmpeg failed to run: ${error.message}`);
    });
    child.once("close", (code, signal) => {
      markExited();
      if (this.stopping) {
        return;
      }
      this.fail(describeExit("ffmpeg decoder", code, signal, this.stderrTail.toString()));
    });

    if (this.codec === "VP8") {
      child.stdin?.write(
        writeIvfHeader({
          fourcc: "VP80",
          width: this.width,
          height: this.height,
          timebaseNumerator: 1,
          timebaseDenominator: RTP_VIDEO_CLOCK_RATE,
          frameCount: 0,
        }),
      );
    }
  }

  gotVideoFrame(frame: EncodedFrame): void {
    const stdin = this.process?.stdin;
    if (!stdin || this.stopping || this.failed) {
      return;
    }
    if (this.awaitingKeyframe) {
      if (!frame.keyframe) {
        this.skipped += 1;
        return;
      }
      this.awaitingKeyframe = false;
      this.logger.debug(`First keyframe after ${this.skipped} skipped frames.`);
    }

    if (this.codec === "VP8") {
      this.firstTimestamp = this.firstTimestamp ?? frame.timestamp;
      const pts = (frame.timestamp - this.firstTimestamp) >>> 0;
      stdin.write(writeIvfFrame(frame.payload, pts));
      return;
    }
    stdin.write(frame.payload);
  }

  async stop(): Promise<void> {
    this.stopping = true;
    const child = this.process;
    if (!child || !this.exited) {
      return;
    }
    child.stdin?.end();
    child.kill("SIGTERM");
    await this.exited;
  }

  // stdout chunks do not line up with pictures; cut the stream into whole frames.
  private onDecodedBytes(chunk: Buffer): void {
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    while (this.pending.length >= this.frameBytes) {
      const frame = Buffer.from(this.pending.subarray(0, this.frameBytes));
      this.pending = this.pending.subarray(this.frameBytes);
      this.decoded += 1;
      if (!this.stopping) {
        this.onRawFrame?.(this.width, this.height, "bgr24", frame);
      }
    }
  }

  private fail(message: string): void {
    if (this.stopping || this.failed) {
      return;
    }
    this.failed = true;
    this.onError?.(message);
  }
}
