import { VIDEO_CODECS } from "@peerstream/protocol";
import { NegotiationError } from "../errors";
import type { VideoCodec, VideoFormat } from "../types";

const RTPMAP_REGEX = /^a=rtpmap:(\d+)\s+([A-Za-z0-9-]+)\/(\d+)/;

function toVideoCodec(name: string): VideoCodec | null {
  const upper = name.toUpperCase();
  return VIDEO_CODECS.find((codec) => codec === upper) ?? null;
}

// Read the codecs offered in the video sections of a session description, in offer order.
// Retransmission, redundancy and FEC payloads are skipped along with codecs we cannot describe.
export function extractOfferedFormats(sdp: string): VideoFormat[] {
  const lines = sdp.split(/\r?\n/).map((line) => line.trim());
  if (!lines.some((line) => line.startsWith("v="))) {
    throw new NegotiationError("Session description has no version line");
  }

  const formats: VideoFormat[] = [];
  let inVideo = false;
  let sawVideo = false;

  for (const line of lines) {
    if (line.startsWith("m=")) {
      inVideo = line.startsWith("m=video");
      sawVideo = sawVideo || inVideo;
      continue;
    }
    if (!inVideo) {
      continue;
    }

    const match = RTPMAP_REGEX.exec(line);
    if (!match) {
      continue;
    }

    const codec = toVideoCodec(match[2]);
    const payloadType = Number(match[1]);
    if (!codec || payloadType > 127) {
      continue;
    }
    if (formats.some((format) => format.payloadType === payloadType)) {
      continue;
    }

    formats.push({ codec, payloadType, clockRate: Number(match[3]) });
  }

  if (!sawVideo) {
    throw new NegotiationError("Session description has no video section");
  }

  return formats;
}

// Pick the first remote format whose codec we support, honouring the remote preference order.
// The remote payload type wins; dimensions come from the local descriptor.
export function selectFormat(local: VideoFormat[], remote: VideoFormat[]): VideoFormat | null {
  for (const candidate of remote) {
    const match = local.find((format) => format.codec === candidate.codec);
    if (match) {
      return { ...match, payloadType: candidate.payloadType, clockRate: candidate.clockRate };
    }
  }
  return null;
}

export function describeFormats(formats: VideoFormat[]): string {
  return formats.map((format) => format.codec).join(", ") || "none";
}
