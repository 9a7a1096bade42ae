import {
  IvfFrameClock,
  IvfReader,
  StderrTail,
  describeError,
  describeExit,
  spawnMediaProcess,
} from "@peerstream/session";
import type {
  Logger,
  MediaProcess,
  SpawnMediaProcess,
  VideoFormat,
  VideoSource,
} from "@peerstream/session";

export const VP8_SOURCE_FORMAT: VideoFormat = { codec: "VP8", payloadType: 96, clockRate: 90000 };

export type FfmpegFileSourceOptions = {
  ffmpegPath: string;
  mediaPath: string;
  logger: Logger;
  spawnProcess?: SpawnMediaProcess;
};

// Real-time VP8 encode of the file, written to stdout as IVF. Audio is not carried.
export function buildEncoderArgs(mediaPath: string): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-re",
    "-i",
    mediaPath,
    "-an",
    "-c:v",
    "libvpx",
    "-deadline",
    "realtime",
    "-cpu-used",
    "8",
    "-b:v",
    "1M",
    "-g",
    "30",
    "-f",
    "ivf",
    "pipe:1",
  ];
}

// VideoSource backed by an ffmpeg child process encoding a media file.
export class FfmpegFileSource implements VideoSource {
  onEncodedSample: null | ((durationRtpUnits: number, sample: Buffer) => void) = null;
  onAudioSample: null | ((durationRtpUnits: number, sample: Buffer) => void) = null;
  onError: null | ((message: string) => void) = null;
  onEnded: null | (() => void) = null;

  private readonly ffmpegPath: string;
  private readonly mediaPath: string;
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnMediaProcess;
  private format: VideoFormat | null = null;
  private process: MediaProcess | null = null;
  private exited: Promise<void> | null = null;
  private stopping = false;
  private finished = false;
  private readonly stderrTail = new StderrTail();
  private samples = 0;

  constructor(options: FfmpegFileSourceOptions) {
    this.ffmpegPath = options.ffmpegPath;
    this.mediaPath = options.mediaPath;
    this.logger = options.logger;
    this.spawnProcess = options.spawnProcess ?? spawnMediaProcess;
  }

  getSourceFormats(): VideoFormat[] {
    return [VP8_SOURCE_FORMAT];
  }

  setFormat(format: VideoFormat): void {
    if (format.codec !== "VP8") {
      throw new Error(`ffmpeg source only encodes VP8, not ${format.codec}`);
    }
    this.format = format;
  }

  sampleCount(): number {
    return this.samples;
  }

  async start(): Promise<void> {
    if (this.process || this.stopping) {
      return;
    }
    if (!this.format) {
      throw new Error("ffmpeg source started before a format was set");
    }

    this.logger.info(`Streaming ${this.mediaPath}.`);
    const child = this.spawnProcess(this.ffmpegPath, buildEncoderArgs(this.mediaPath));
    this.process = child;

    let markExited: () => void = () => undefined;
    this.exited = new Promise((resolve) => {
      markExited = resolve;
    });

    const reader = new IvfReader();
    let clock: IvfFrameClock | null = null;

    child.stdout?.on("data", (chunk: Buffer) => {
      if (this.finished) {
        return;
      }
      try {
        for (const frame of reader.push(chunk)) {
          const header = reader.getHeader();
          if (!header) {
            continue;
          }
          clock = clock ?? new IvfFrameClock(header);
          this.samples += 1;
          this.onEncodedSample?.(clock.durationOf(frame), frame.payload);
        }
      } catch (error) {
        this.fail(`Unreadable encoder output: ${describeError(error)}`);
        child.kill("SIGKILL");
      }
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      this.stderrTail.append(chunk);
    });

    child.once("error", (error) => {
      markExited();
      this.fail(`ffmpeg failed to run: ${error.message}`);
    });

    child.once("close", (code, signal) => {
      markExited();
      if (this.stopping || this.finished) {
        return;
      }
      if (code === 0) {
        this.finished = true;
        this.logger.info(`End of media after ${this.samples} frames.`);
        this.onEnded?.();
        return;
      }
      this.fail(describeExit("ffmpeg", code, signal, this.stderrTail.toString()));
    });
  }

  // Safe before start; waits for the process to exit.
  async stop(): Promise<void> {
    this.stopping = true;
    const child = this.process;
    if (!child || !this.exited) {
      return;
    }
    if (!this.finished) {
      child.kill("SIGTERM");
    }
    await this.exited;
  }

  private fail(message: string): void {
    if (this.stopping || this.finished) {
      return;
    }
    this.finished = true;
    this.onError?.(message);
  }
}
