import type { EncodedFrame, VideoCodec } from "../types";

// The RTP fields reassembly depends on.
export type RtpPayloadPacket = {
  sequenceNumber: number;
  timestamp: number;
  marker: boolean;
  payload: Buffer;
};

export type PayloadUnit = {
  // Bytes ready for the frame; empty while a fragmented unit is still being collected.
  data: Buffer[];
  // True when the packet only makes sense after an earlier packet of the same frame.
  continuation: boolean;
  keyframe: boolean;
};

// Reassembles compressed frames from RTP payloads. Packets sharing a timestamp form one
// frame that completes on the marker bit. A sequence gap discards the frame it falls in;
// a gap right before a new timestamp belongs to the new frame.
export abstract class FrameDepacketizer {
  abstract readonly codec: VideoCodec;
  private parts: Buffer[] = [];
  private timestamp: number | null = null;
  private expectedSequence: number | null = null;
  private started = false;
  private broken = false;
  private keyframe = false;
  private dropped = 0;

  protected abstract depacketize(payload: Buffer): PayloadUnit | null;

  // Clears codec state carried between packets of one frame.
  protected resetUnit(): void {}

  // True while a fragmented unit has begun but not finished.
  protected hasPartialUnit(): boolean {
    return false;
  }

  droppedFrames(): number {
    return this.dropped;
  }

  push(packet: RtpPayloadPacket): EncodedFrame | null {
    const contiguous =
      this.expectedSequence === null || packet.sequenceNumber === this.expectedSequence;
    this.expectedSequence = (packet.sequenceNumber + 1) & 0xffff;

    if (packet.timestamp !== this.timestamp) {
      if (this.timestamp !== null) {
        // The previous frame never saw its marker.
        this.dropped += 1;
      }
      this.startFrame(packet.timestamp);
      this.broken = !contiguous;
    } else if (!contiguous) {
      this.broken = true;
    }

    if (!this.broken) {
      this.accept(packet.payload);
    }

    if (!packet.marker) {
      return null;
    }

    const complete = !this.broken && this.parts.length > 0 && !this.hasPartialUnit();
    const frame: EncodedFrame | null = complete
      ? {
          codec: this.codec,
          payload: Buffer.concat(this.parts),
          timestamp: packet.timestamp,
          keyframe: this.keyframe,
        }
      : null;

    if (!complete) {
      this.dropped += 1;
    }
    this.startFrame(null);
    return frame;
  }

  private accept(payload: Buffer): void {
    const unit = this.depacketize(payload);
    if (!unit || (unit.continuation && !this.started)) {
      this.broken = true;
      return;
    }
    this.started = true;
    this.parts.push(...unit.data);
    this.keyframe = this.keyframe || unit.keyframe;
  }

  private startFrame(timestamp: number | null): void {
    this.parts = [];
    this.timestamp = timestamp;
    this.started = false;
    this.broken = false;
    this.keyframe = false;
    this.resetUnit();
  }
}
