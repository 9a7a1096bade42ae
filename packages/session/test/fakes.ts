import type { LogLevel, Logger } from "../src/logger";
import type {
  EncodedFrame,
  FrameDisplay,
  IceCandidate,
  PeerConnectionState,
  PeerTransport,
  RawFrame,
  SessionDescription,
  VideoFormat,
  VideoSink,
  VideoSource,
} from "../src/types";

export type LogEntry = { level: LogLevel; message: string };

export function createRecordingLogger(entries: LogEntry[] = []): Logger & { entries: LogEntry[] } {
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    child: () => createRecordingLogger(entries),
  };
}

export const VP8_FORMAT: VideoFormat = { codec: "VP8", payloadType: 96, clockRate: 90000 };
export const H264_FORMAT: VideoFormat = { codec: "H264", payloadType: 102, clockRate: 90000 };

// Minimal session description with one video section offering the given rtpmap entries.
export function makeSdp(codecs: Array<[number, string]>): string {
  const payloadTypes = codecs.map(([payloadType]) => payloadType).join(" ");
  return [
    "v=0",
    "o=- 1 1 IN IP4 127.0.0.1",
    "s=-",
    "t=0 0",
    `m=video 9 UDP/TLS/RTP/SAVPF ${payloadTypes}`,
    "c=IN IP4 0.0.0.0",
    ...codecs.map(([payloadType, name]) => `a=rtpmap:${payloadType} ${name}/90000`),
    "",
  ].join("\r\n");
}

export class FakeTransport implements PeerTransport {
  onconnectionstatechange: null | ((state: PeerConnectionState) => void) = null;
  onicecandidate: null | ((candidate: IceCandidate) => void) = null;
  onvideoframe: null | ((frame: EncodedFrame) => void) = null;

  readonly sentVideo: Array<{ duration: number; payload: Buffer }> = [];
  readonly sentAudio: Array<{ duration: number; payload: Buffer }> = [];
  readonly remoteCandidates: IceCandidate[] = [];
  readonly closeReasons: string[] = [];
  remoteDescription: SessionDescription | null = null;
  localDescription: SessionDescription | null = null;
  setRemoteError: Error | null = null;
  closeError: Error | null = null;
  offerSdp = makeSdp([[96, "VP8"]]);

  async createOffer(): Promise<SessionDescription> {
    return { type: "offer", sdp: this.offerSdp };
  }

  async createAnswer(): Promise<SessionDescription> {
    return { type: "answer", sdp: "v=0\r\nanswer" };
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    this.localDescription = description;
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    if (this.setRemoteError) {
      throw this.setRemoteError;
    }
    this.remoteDescription = description;
  }

  getLocalDescription(): SessionDescription | null {
    return this.localDescription;
  }

  async addIceCandidate(candidate: IceCandidate): Promise<void> {
    this.remoteCandidates.push(candidate);
  }

  sendVideo(duration: number, payload: Buffer): void {
    this.sentVideo.push({ duration, payload });
  }

  sendAudio(duration: number, payload: Buffer): void {
    this.sentAudio.push({ duration, payload });
  }

  async close(reason: string): Promise<void> {
    this.closeReasons.push(reason);
    if (this.closeError) {
      throw this.closeError;
    }
  }

  emitState(state: PeerConnectionState): void {
    this.onconnectionstatechange?.(state);
  }
}

export class FakeSource implements VideoSource {
  onEncodedSample: null | ((duration: number, sample: Buffer) => void) = null;
  onAudioSample: null | ((duration: number, sample: Buffer) => void) = null;
  onError: null | ((message: string) => void) = null;
  onEnded: null | (() => void) = null;

  readonly formats: VideoFormat[];
  readonly appliedFormats: VideoFormat[] = [];
  startCalls = 0;
  stopCalls = 0;
  startError: Error | null = null;
  stopError: Error | null = null;
  // When set, start() waits for it before settling.
  startGate: Promise<void> | null = null;
  readonly lifecycle: string[] = [];

  constructor(formats: VideoFormat[] = [VP8_FORMAT]) {
    this.formats = formats;
  }

  getSourceFormats(): VideoFormat[] {
    return this.formats;
  }

  setFormat(format: VideoFormat): void {
    this.appliedFormats.push(format);
  }

  async start(): Promise<void> {
    this.startCalls += 1;
    if (this.startGate) {
      await this.startGate;
    }
    this.lifecycle.push("started");
    if (this.startError) {
      throw this.startError;
    }
  }

  async stop(): Promise<void> {
    this.stopCalls += 1;
    this.lifecycle.push("stopped");
    if (this.stopError) {
      throw this.stopError;
    }
  }
}

export class FakeSink implements VideoSink {
  onRawFrame:
    | null
    | ((width: number, height: number, pixelFormat: string, payload: Buffer) => void) = null;
  onError: null | ((message: string) => void) = null;

  readonly formats: VideoFormat[];
  readonly received: EncodedFrame[] = [];
  readonly appliedFormats: VideoFormat[] = [];
  startCalls = 0;
  stopCalls = 0;
  decodeError: Error | null = null;

  constructor(formats: VideoFormat[] = [VP8_FORMAT]) {
    this.formats = formats;
  }

  getSinkFormats(): VideoFormat[] {
    return this.formats;
  }

  setFormat(format: VideoFormat): void {
    this.appliedFormats.push(format);
  }

  async start(): Promise<void> {
    this.startCalls += 1;
  }

  async stop(): Promise<void> {
    this.stopCalls += 1;
  }

  gotVideoFrame(frame: EncodedFrame): void {
    if (this.decodeError) {
      throw this.decodeError;
    }
    this.received.push(frame);
  }
}

export class FakeDisplay implements FrameDisplay {
  readonly shown: RawFrame[] = [];
  failNext = false;

  show(frame: RawFrame): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("window gone");
    }
    this.shown.push(frame);
  }
}

export function makeRawFrame(width = 2, height = 2, fill = 0): RawFrame {
  return { width, height, pixelFormat: "bgr24", data: Buffer.alloc(width * height * 3, fill) };
}

// Let pending promise callbacks run.
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
