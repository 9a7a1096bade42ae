import { Vp8RtpPayload } from "werift";
import { FrameDepacketizer } from "./depacketizer";
import type { PayloadUnit } from "./depacketizer";

// Payload bytes per RTP packet, leaving headroom under a 1500-byte path MTU.
export const DEFAULT_MAX_PAYLOAD = 1200;

// Payload descriptor (RFC 7741) without extensions: S=1 and PID=0 on the first packet.
const DESCRIPTOR_FRAME_START = 0x10;
const DESCRIPTOR_CONTINUATION = 0x00;

// Split one compressed VP8 frame into RTP payloads, each prefixed with a payload descriptor.
export function packetizeVp8(frame: Buffer, maxPayloadSize = DEFAULT_MAX_PAYLOAD): Buffer[] {
  if (maxPayloadSize < 2) {
    throw new Error(`Payload size ${maxPayloadSize} leaves no room for VP8 data`);
  }

  const chunkSize = maxPayloadSize - 1;
  const payloads: Buffer[] = [];
  for (let offset = 0; offset < frame.length; offset += chunkSize) {
    const descriptor = offset === 0 ? DESCRIPTOR_FRAME_START : DESCRIPTOR_CONTINUATION;
    const chunk = frame.subarray(offset, offset + chunkSize);
    payloads.push(Buffer.concat([Buffer.from([descriptor]), chunk]));
  }
  return payloads;
}

// Descriptor parsing comes from werift; this class only applies the frame policy.
export class Vp8Depacketizer extends FrameDepacketizer {
  readonly codec = "VP8" as const;

  protected depacketize(payload: Buffer): PayloadUnit | null {
    if (payload.length < 1) {
      return null;
    }

    let vp8: Vp8RtpPayload;
    try {
      vp8 = Vp8RtpPayload.deSerialize(payload);
    } catch {
      return null;
    }
    if (vp8.payload.length === 0) {
      return null;
    }

    // A frame starts at the head of partition 0.
    const frameStart = vp8.sBit === 1 && vp8.pid === 0;
    return {
      data: [vp8.payload],
      continuation: !frameStart,
      keyframe: frameStart && vp8.isKeyframe,
    };
  }
}
