import type {
  AudioFormat,
  IceCandidate,
  PixelFormat,
  SessionDescription,
  VideoCodec,
  VideoFormat,
} from "@peerstream/protocol";

export type { AudioFormat, IceCandidate, PixelFormat, SessionDescription, VideoCodec, VideoFormat };

// Connection states reported by the peer connection library.
export type PeerConnectionState =
  | "new"
  | "connecting"
  | "connected"
  | "disconnected"
  | "failed"
  | "closed";

// One reassembled compressed video frame received from the network.
export type EncodedFrame = {
  codec: VideoCodec;
  payload: Buffer;
  timestamp: number;
  keyframe: boolean;
};

// One decoded, uncompressed picture ready for display.
export type RawFrame = {
  width: number;
  height: number;
  pixelFormat: PixelFormat;
  data: Buffer;
};

// The peer connection as seen by the session: negotiation, media send, and state callbacks.
export type PeerTransport = {
  createOffer: () => Promise<SessionDescription>;
  createAnswer: () => Promise<SessionDescription>;
  setLocalDescription: (desc: SessionDescription) => Promise<void>;
  setRemoteDescription: (desc: SessionDescription) => Promise<void>;
  getLocalDescription: () => SessionDescription | null;
  addIceCandidate: (candidate: IceCandidate) => Promise<void>;
  sendVideo: (durationRtpUnits: number, payload: Buffer) => void;
  sendAudio: (durationRtpUnits: number, payload: Buffer) => void;
  close: (reason: string) => Promise<void>;
  onconnectionstatechange: null | ((state: PeerConnectionState) => void);
  onicecandidate: null | ((candidate: IceCandidate) => void);
  onvideoframe: null | ((frame: EncodedFrame) => void);
};

// Encoder/demuxer producing compressed samples (send side).
export type VideoSource = {
  getSourceFormats: () => VideoFormat[];
  setFormat: (format: VideoFormat) => void;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  onEncodedSample: null | ((durationRtpUnits: number, sample: Buffer) => void);
  onAudioSample: null | ((durationRtpUnits: number, sample: Buffer) => void);
  onError: null | ((message: string) => void);
  onEnded: null | (() => void);
};

// Decoder turning compressed frames into raw pictures (receive side).
export type VideoSink = {
  getSinkFormats: () => VideoFormat[];
  setFormat: (format: VideoFormat) => void;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  gotVideoFrame: (frame: EncodedFrame) => void;
  onRawFrame:
    | null
    | ((width: number, height: number, pixelFormat: string, payload: Buffer) => void);
  onError: null | ((message: string) => void);
};

// Receives frames from the render loop; expected to return quickly.
export type FrameDisplay = {
  show: (frame: RawFrame) => void;
};

// Callbacks a media pipeline raises back into its owning session.
export type PipelineEvents = {
  onFatalError: (error: Error) => void;
  onEnded: () => void;
};

// What the session controller needs from the media bridge, and nothing more.
export type MediaPipeline = {
  readonly formats: VideoFormat[];
  readonly hasAudio: boolean;
  attach: (transport: PeerTransport, events: PipelineEvents) => void;
  onFormatNegotiated: (format: VideoFormat) => void;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  detach: () => void;
};
