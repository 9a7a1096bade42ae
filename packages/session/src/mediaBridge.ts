import { PIXEL_FORMATS } from "@peerstream/protocol";
import { FrameBuffer } from "./frameBuffer";
import { FormatError, MediaSourceError, UnsupportedFrameFormat, describeError } from "./errors";
import type { Logger } from "./logger";
import type {
  EncodedFrame,
  MediaPipeline,
  PeerTransport,
  PipelineEvents,
  PixelFormat,
  VideoFormat,
  VideoSink,
  VideoSource,
} from "./types";

const RATE_WINDOW_MS = 5_000;

export type MediaBridgeOptions = {
  source?: VideoSource;
  sink?: VideoSink;
  frameBuffer?: FrameBuffer;
  // Defaults to what the source or sink advertises.
  formats?: VideoFormat[];
  hasAudio?: boolean;
  logger: Logger;
  now?: () => number;
};

export type MediaBridgeStats = {
  forwardedSamples: number;
  droppedSamples: number;
  publishedFrames: number;
  droppedFrames: number;
};

export function isPixelFormat(value: string): value is PixelFormat {
  return PIXEL_FORMATS.some((format) => format === value);
}

export function expectedFrameBytes(width: number, height: number, pixelFormat: PixelFormat) {
  if (pixelFormat === "i420") {
    return width * height + 2 * Math.ceil(width / 2) * Math.ceil(height / 2);
  }
  return width * height * 3;
}

// Connects the codec library's callbacks to the transport (send side) and to the
// frame buffer (receive side). One bridge per session; it never owns the codec objects.
export class MediaBridge implements MediaPipeline {
  readonly formats: VideoFormat[];
  readonly hasAudio: boolean;
  private readonly source: VideoSource | null;
  private readonly sink: VideoSink | null;
  private readonly logger: Logger;
  private readonly now: () => number;
  private frameBuffer: FrameBuffer | null;
  private transport: PeerTransport | null = null;
  private events: PipelineEvents | null = null;
  private negotiated: VideoFormat | null = null;
  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private detached = false;
  private readonly warnedDrops = new Set<string>();
  private forwardedSamples = 0;
  private droppedSamples = 0;
  private publishedFrames = 0;
  private droppedFrames = 0;
  private rateWindowStart = 0;
  private rateWindowFrames = 0;

  constructor(options: MediaBridgeOptions) {
    if (!options.source && !options.sink) {
      throw new Error("MediaBridge needs a source, a sink, or both");
    }
    if (options.sink && !options.frameBuffer) {
      throw new Error("MediaBridge receive side needs a frame buffer");
    }

    this.source = options.source ?? null;
    this.sink = options.sink ?? null;
    this.frameBuffer = options.frameBuffer ?? null;
    this.hasAudio = options.hasAudio ?? false;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.formats =
      options.formats ?? this.source?.getSourceFormats() ?? this.sink?.getSinkFormats() ?? [];
  }

  getNegotiatedFormat(): VideoFormat | null {
    return this.negotiated;
  }

  stats(): MediaBridgeStats {
    return {
      forwardedSamples: this.forwardedSamples,
      droppedSamples: this.droppedSamples,
      publishedFrames: this.publishedFrames,
      droppedFrames: this.droppedFrames,
    };
  }

  // Subscribe to the codec callbacks and bind the transport's send functions.
  attach(transport: PeerTransport, events: PipelineEvents): void {
    if (this.detached) {
      this.logger.warn("Ignoring attach on a detached media bridge.");
      return;
    }

    this.transport = transport;
    this.events = events;

    if (this.source) {
      this.source.onEncodedSample = (duration, sample) => this.onEncodedSample(duration, sample);
      this.source.onAudioSample = (duration, sample) => this.onAudioSample(duration, sample);
      this.source.onError = (message) =>
        this.fail(new MediaSourceError(`Media source error: ${message}`));
      this.source.onEnded = () => this.events?.onEnded();
    }

    if (this.sink) {
      this.sink.onRawFrame = (width, height, pixelFormat, payload) =>
        this.onRawFrame(width, height, pixelFormat, payload);
      this.sink.onError = (message) =>
        this.fail(new MediaSourceError(`Media sink error: ${message}`));
      transport.onvideoframe = (frame) => this.onRemoteVideoFrame(frame);
    }
  }

  onFormatNegotiated(format: VideoFormat): void {
    try {
      this.source?.setFormat(format);
      this.sink?.setFormat(format);
    } catch (error) {
      throw new FormatError(`Codec library rejected ${format.codec}: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.negotiated = format;
    this.logger.info(`Negotiated video format ${format.payloadType}:${format.codec}.`);
  }

  start(): Promise<void> {
    if (this.startPromise) {
      return this.startPromise;
    }
    if (this.detached) {
      return Promise.resolve();
    }
    if (!this.negotiated) {
      return Promise.reject(new FormatError("Media cannot start before a format is negotiated"));
    }

    this.startPromise = this.startMedia();
    return this.startPromise;
  }

  // Safe before start(), and after a start() that never completed.
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.stopMedia();
    }
    return this.stopPromise;
  }

  // Drop every subscription; afterwards all hooks are no-ops.
  detach(): void {
    this.detached = true;

    if (this.source) {
      this.source.onEncodedSample = null;
      this.source.onAudioSample = null;
      this.source.onError = null;
      this.source.onEnded = null;
    }
    if (this.sink) {
      this.sink.onRawFrame = null;
      this.sink.onError = null;
      if (this.transport) {
        this.transport.onvideoframe = null;
      }
    }

    this.transport = null;
    this.frameBuffer = null;
    this.events = null;
  }

  onEncodedSample(durationRtpUnits: number, payload: Buffer): void {
    const transport = this.transport;
    if (this.detached || !transport || payload.length === 0) {
      return;
    }

    try {
      transport.sendVideo(durationRtpUnits, payload);
      this.forwardedSamples += 1;
    } catch (error) {
      this.droppedSamples += 1;
      this.logger.warn(`Video send failed: ${describeError(error)}`);
    }
  }

  onAudioSample(durationRtpUnits: number, payload: Buffer): void {
    const transport = this.transport;
    if (this.detached || !transport || !this.hasAudio || payload.length === 0) {
      return;
    }

    try {
      transport.sendAudio(durationRtpUnits, payload);
    } catch (error) {
      this.logger.warn(`Audio send failed: ${describeError(error)}`);
    }
  }

  onRemoteVideoFrame(frame: EncodedFrame): void {
    const sink = this.sink;
    if (this.detached || !sink) {
      return;
    }

    try {
      sink.gotVideoFrame(frame);
    } catch (error) {
      this.fail(
        new MediaSourceError(`Decoder rejected frame: ${describeError(error)}`, { cause: error }),
      );
    }
  }

  // Copy a decoded picture into a new frame record and publish it, latest wins.
  onRawFrame(width: number, height: number, pixelFormat: string, payload: Buffer): void {
    const frameBuffer = this.frameBuffer;
    if (this.detached || !frameBuffer) {
      return;
    }

    if (!isPixelFormat(pixelFormat)) {
      this.dropFrame(
        `format:${pixelFormat}`,
        new UnsupportedFrameFormat(`Unhandled raw frame pixel format ${pixelFormat}.`),
      );
      return;
    }
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      this.dropFrame(
        "size",
        new UnsupportedFrameFormat(`Invalid raw frame size ${width}x${height}.`),
      );
      return;
    }

    const byteLength = expectedFrameBytes(width, height, pixelFormat);
    if (payload.length < byteLength) {
      this.dropFrame(
        "length",
        new UnsupportedFrameFormat(
          `Short ${pixelFormat} frame: ${payload.length} of ${byteLength} bytes.`,
        ),
      );
      return;
    }

    frameBuffer.publish({
      width,
      height,
      pixelFormat,
      data: Buffer.from(payload.subarray(0, byteLength)),
    });
    this.publishedFrames += 1;
    this.measureRate(width, height, pixelFormat);
  }

  private async startMedia(): Promise<void> {
    if (this.sink) {
      await this.sink.start();
    }
    if (this.source) {
      await this.source.start();
    }
    this.logger.info("Media pipeline started.");
  }

  private async stopMedia(): Promise<void> {
    if (!this.startPromise) {
      return;
    }

    // Let a start that is still in flight settle before stopping what it opened.
    await Promise.allSettled([this.startPromise]);

    const results = await Promise.allSettled([
      this.source ? this.source.stop() : Promise.resolve(),
      this.sink ? this.sink.stop() : Promise.resolve(),
    ]);

    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    if (failure) {
      throw new MediaSourceError(`Media stop failed: ${describeError(failure.reason)}`, {
        cause: failure.reason,
      });
    }
  }

  // Warn once per kind of drop; repeats go to debug so a bad stream does not flood the log.
  private dropFrame(kind: string, error: UnsupportedFrameFormat): void {
    this.droppedFrames += 1;
    if (this.warnedDrops.has(kind)) {
      this.logger.debug(error.message);
      return;
    }
    this.warnedDrops.add(kind);
    this.logger.warn(error.message);
  }

  private fail(error: Error): void {
    if (this.detached) {
      return;
    }
    this.logger.error(error.message);
    this.events?.onFatalError(error);
  }

  private measureRate(width: number, height: number, pixelFormat: PixelFormat): void {
    const now = this.now();
    if (this.rateWindowFrames === 0) {
      this.rateWindowStart = now;
    }
    this.rateWindowFrames += 1;

    const elapsedMs = now - this.rateWindowStart;
    if (elapsedMs >= RATE_WINDOW_MS) {
      const fps = (this.rateWindowFrames * 1000) / elapsedMs;
      this.logger.debug(
        `Decoded ${pixelFormat} frame ${width}x${height}, frame rate ${fps.toFixed(2)}fps.`,
      );
      this.rateWindowFrames = 0;
    }
  }
}
