import { H264RtpPayload } from "werift";
import { FrameDepacketizer } from "./depacketizer";
import type { PayloadUnit } from "./depacketizer";

export const ANNEX_B_START_CODE = Buffer.from([0x00, 0x00, 0x00, 0x01]);

const NAL_IDR = 5;
const NAL_SPS = 7;
const NAL_STAP_A = 24;
const NAL_FU_A = 28;

function isKeyNal(type: number) {
  return type === NAL_IDR || type === NAL_SPS;
}

// Single NAL, STAP-A and FU-A payloads (RFC 6184) become an Annex-B byte stream through
// werift's H264RtpPayload; FU-A fragments are collected across packets of one frame.
export class H264Depacketizer extends FrameDepacketizer {
  readonly codec = "H264" as const;
  private fragment: Buffer | undefined = undefined;

  protected resetUnit(): void {
    this.fragment = undefined;
  }

  protected hasPartialUnit(): boolean {
    return this.fragment !== undefined;
  }

  protected depacketize(payload: Buffer): PayloadUnit | null {
    if (payload.length < 1) {
      return null;
    }

    const nalType = payload[0] & 0x1f;
    // STAP-B, MTAP and FU-B are not used by WebRTC senders.
    const known = (nalType >= 1 && nalType <= 23) || nalType === NAL_STAP_A || nalType === NAL_FU_A;
    if (!known || (nalType === NAL_FU_A && payload.length < 3)) {
      return null;
    }

    const fragmentStart = nalType === NAL_FU_A && (payload[1] & 0x80) !== 0;
    if (fragmentStart) {
      this.fragment = undefined;
    }

    let h264: H264RtpPayload;
    try {
      h264 = H264RtpPayload.deSerialize(payload, this.fragment);
    } catch {
      return null;
    }

    if (nalType === NAL_FU_A) {
      this.fragment = h264.fragment;
      if (this.fragment !== undefined) {
        return { data: [], continuation: !fragmentStart, keyframe: false };
      }
    }

    const unit = h264.payload;
    if (unit.length <= ANNEX_B_START_CODE.length) {
      return null;
    }
    return {
      data: [unit],
      continuation: nalType === NAL_FU_A && !fragmentStart,
      keyframe: h264.isKeyframe || isKeyNal(unit[ANNEX_B_START_CODE.length] & 0x1f),
    };
  }
}
