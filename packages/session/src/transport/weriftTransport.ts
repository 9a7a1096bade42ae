import crypto from "node:crypto";
import {
  MediaStreamTrack,
  RTCIceCandidate,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  RTCSessionDescription,
  RtpHeader,
  RtpPacket,
} from "werift";
import type { IceServer } from "@peerstream/protocol";
import { describeError } from "../errors";
import type { Logger } from "../logger";
import { H264Depacketizer } from "../rtp/h264";
import type { FrameDepacketizer } from "../rtp/depacketizer";
import { DEFAULT_MAX_PAYLOAD, Vp8Depacketizer, packetizeVp8 } from "../rtp/vp8";
import { extractOfferedFormats } from "../sdp/formats";
import type {
  EncodedFrame,
  IceCandidate,
  PeerConnectionState,
  PeerTransport,
  SessionDescription,
  VideoCodec,
  VideoFormat,
} from "../types";

export type TransportDirection = "sendonly" | "recvonly";

export type WeriftTransportOptions = {
  direction: TransportDirection;
  formats: VideoFormat[];
  iceServers?: IceServer[];
  logger: Logger;
  maxPayloadSize?: number;
};

type Subscription = { unSubscribe: () => void };

const H264_FMTP = "level-asymmetry-allowed=1;packetization-mode=1;profile-level-id=42e01f";

function toCodecParameters(format: VideoFormat) {
  return new RTCRtpCodecParameters({
    mimeType: `video/${format.codec}`,
    clockRate: format.clockRate,
    payloadType: format.payloadType,
    rtcpFeedback: [{ type: "nack" }, { type: "nack", parameter: "pli" }],
    parameters: format.codec === "H264" ? H264_FMTP : undefined,
  });
}

// werift takes one URL per entry.
function toWeriftIceServers(servers: IceServer[]) {
  return servers.flatMap((server) =>
    (Array.isArray(server.urls) ? server.urls : [server.urls]).map((urls) => ({
      urls,
      username: server.username,
      credential: server.credential,
    })),
  );
}

function toSessionDescription(
  description: { type: string; sdp: string } | undefined,
): SessionDescription | null {
  if (!description) {
    return null;
  }
  if (description.type === "offer" || description.type === "answer") {
    return { type: description.type, sdp: description.sdp };
  }
  return null;
}

function createDepacketizer(codec: VideoCodec): FrameDepacketizer | null {
  if (codec === "VP8") {
    return new Vp8Depacketizer();
  }
  if (codec === "H264") {
    return new H264Depacketizer();
  }
  return null;
}

// PeerTransport over werift's RTCPeerConnection. Sends VP8 frames as RTP on a sendonly
// track, or reassembles received RTP into encoded frames on a recvonly transceiver.
export class WeriftTransport implements PeerTransport {
  onconnectionstatechange: null | ((state: PeerConnectionState) => void) = null;
  onicecandidate: null | ((candidate: IceCandidate) => void) = null;
  onvideoframe: null | ((frame: EncodedFrame) => void) = null;

  private readonly pc: RTCPeerConnection;
  private readonly direction: TransportDirection;
  private readonly formats: VideoFormat[];
  private readonly logger: Logger;
  private readonly maxPayloadSize: number;
  private readonly subscriptions: Subscription[] = [];
  private readonly depacketizers = new Map<number, FrameDepacketizer>();
  private readonly unknownPayloadTypes = new Set<number>();
  private videoTrack: MediaStreamTrack | null = null;
  private transceiverAdded = false;
  private negotiated: VideoFormat[] = [];
  private sequenceNumber = crypto.randomInt(0, 0x10000);
  private rtpTimestamp = crypto.randomInt(0, 0x100000000);
  private closePromise: Promise<void> | null = null;

  constructor(options: WeriftTransportOptions) {
    this.direction = options.direction;
    this.logger = options.logger;
    this.maxPayloadSize = options.maxPayloadSize ?? DEFAULT_MAX_PAYLOAD;
    this.formats =
      options.direction === "sendonly"
        ? options.formats.filter((format) => format.codec === "VP8")
        : options.formats;
    if (this.formats.length === 0) {
      throw new Error(`No usable video format for a ${options.direction} transport`);
    }

    this.pc = new RTCPeerConnection({
      codecs: { video: this.formats.map(toCodecParameters) },
      iceServers: toWeriftIceServers(options.iceServers ?? []),
    });

    this.subscriptions.push(
      this.pc.connectionStateChange.subscribe((state) => {
        this.onconnectionstatechange?.(state);
      }),
      this.pc.onIceCandidate.subscribe((candidate) => {
        if (!candidate?.candidate) {
          return;
        }
        this.onicecandidate?.({
          candidate: candidate.candidate,
          sdpMid: candidate.sdpMid,
          sdpMLineIndex: candidate.sdpMLineIndex,
        });
      }),
    );

    if (this.direction === "sendonly") {
      this.videoTrack = new MediaStreamTrack({ kind: "video" });
      this.subscriptions.push(
        this.pc.onRemoteTransceiverAdded.subscribe((transceiver) => {
          if (transceiver.kind !== "video" || !this.videoTrack || this.transceiverAdded) {
            return;
          }
          this.transceiverAdded = true;
          transceiver.setDirection("sendonly");
          Promise.resolve(transceiver.sender.replaceTrack(this.videoTrack)).catch((error) =>
            this.logger.warn(`Attaching the video track failed: ${describeError(error)}`),
          );
        }),
      );
    } else {
      this.subscriptions.push(
        this.pc.onTrack.subscribe((track) => {
          if (track.kind !== "video") {
            return;
          }
          this.subscriptions.push(
            track.onReceiveRtp.subscribe((rtp) => this.onRtp(rtp)),
          );
        }),
      );
    }
  }

  async createOffer(): Promise<SessionDescription> {
    this.ensureTransceiver();
    const offer = await this.pc.createOffer();
    return { type: "offer", sdp: offer.sdp };
  }

  async createAnswer(): Promise<SessionDescription> {
    const answer = await this.pc.createAnswer();
    return { type: "answer", sdp: answer.sdp };
  }

  async setLocalDescription(description: SessionDescription): Promise<void> {
    await this.pc.setLocalDescription(new RTCSessionDescription(description.sdp, description.type));
    if (description.type === "answer") {
      this.onAnswerApplied(this.getLocalDescription()?.sdp ?? description.sdp);
    }
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    const remote = new RTCSessionDescription(description.sdp, description.type);
    await this.pc.setRemoteDescription(remote);
    if (description.type === "answer") {
      this.onAnswerApplied(description.sdp);
    }
  }

  getLocalDescription(): SessionDescription | null {
    return toSessionDescription(this.pc.localDescription);
  }

  async addIceCandidate(candidate: IceCandidate): Promise<void> {
    await this.pc.addIceCandidate(
      new RTCIceCandidate({
        candidate: candidate.candidate,
        sdpMid: candidate.sdpMid ?? undefined,
        sdpMLineIndex: candidate.sdpMLineIndex ?? undefined,
      }),
    );
  }

  // Packetize one VP8 frame, stamp every packet with the current timestamp, then advance it.
  sendVideo(durationRtpUnits: number, payload: Buffer): void {
    const track = this.videoTrack;
    if (this.closePromise || !track) {
      return;
    }

    const payloadType = this.sendPayloadType();
    const packets = packetizeVp8(payload, this.maxPayloadSize);
    packets.forEach((chunk, index) => {
      const header = new RtpHeader({
        payloadType,
        sequenceNumber: this.sequenceNumber,
        timestamp: this.rtpTimestamp,
        marker: index === packets.length - 1,
      });
      this.sequenceNumber = (this.sequenceNumber + 1) & 0xffff;
      track.writeRtp(new RtpPacket(header, chunk));
    });

    this.rtpTimestamp = (this.rtpTimestamp + durationRtpUnits) >>> 0;
  }

  sendAudio(): void {
    throw new Error("Audio is not negotiated on this transport");
  }

  close(reason: string): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.closeConnection(reason);
    }
    return this.closePromise;
  }

  private async closeConnection(reason: string): Promise<void> {
    this.logger.debug(`Closing peer connection: ${reason}.`);
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.unSubscribe();
    }
    this.onconnectionstatechange = null;
    this.onicecandidate = null;
    this.onvideoframe = null;
    this.videoTrack = null;
    await this.pc.close();
  }

  private ensureTransceiver(): void {
    if (this.transceiverAdded) {
      return;
    }
    this.transceiverAdded = true;
    if (this.videoTrack) {
      this.pc.addTransceiver(this.videoTrack, { direction: "sendonly" });
    } else {
      this.pc.addTransceiver("video", { direction: "recvonly" });
    }
  }

  // The answer carries the payload types both sides agreed on.
  private onAnswerApplied(sdp: string): void {
    this.negotiated = extractOfferedFormats(sdp);
    this.depacketizers.clear();
    this.logger.debug(
      `Negotiated payload types: ${this.negotiated
        .map((format) => `${format.payloadType}:${format.codec}`)
        .join(", ")}.`,
    );
  }

  private sendPayloadType(): number {
    const agreed = this.negotiated.find((format) => format.codec === "VP8");
    return agreed?.payloadType ?? this.formats[0].payloadType;
  }

  private onRtp(rtp: RtpPacket): void {
    const handler = this.onvideoframe;
    if (this.closePromise || !handler) {
      return;
    }

    const depacketizer = this.depacketizerFor(rtp.header.payloadType);
    if (!depacketizer) {
      return;
    }

    const frame = depacketizer.push({
      sequenceNumber: rtp.header.sequenceNumber,
      timestamp: rtp.header.timestamp,
      marker: rtp.header.marker,
      payload: rtp.payload,
    });
    if (frame) {
      handler(frame);
    }
  }

  private depacketizerFor(payloadType: number): FrameDepacketizer | null {
    const existing = this.depacketizers.get(payloadType);
    if (existing) {
      return existing;
    }

    const format =
      this.negotiated.find((candidate) => candidate.payloadType === payloadType) ??
      this.formats.find((candidate) => candidate.payloadType === payloadType);
    const depacketizer = format ? createDepacketizer(format.codec) : null;
    if (!depacketizer) {
      if (!this.unknownPayloadTypes.has(payloadType)) {
        this.unknownPayloadTypes.add(payloadType);
        this.logger.warn(`Ignoring RTP with unhandled payload type ${payloadType}.`);
      }
      return null;
    }

    this.depacketizers.set(payloadType, depacketizer);
    return depacketizer;
  }
}
