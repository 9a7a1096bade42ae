import { z } from "zod";
import type { IceServer } from "@peerstream/protocol";
import { DEFAULT_DISPLAY_INTERVAL_MS, resolveIceServers } from "@peerstream/session";
import type { VideoFormat } from "@peerstream/session";

export const DEFAULT_OFFER_URL = "http://127.0.0.1:8080/offer";
export const DEFAULT_WS_URL = "ws://127.0.0.1:8080/ws";
export const DEFAULT_LISTEN_HOST = "0.0.0.0";
export const DEFAULT_LISTEN_PORT = 8081;
export const DEFAULT_VIEW_WIDTH = 640;
export const DEFAULT_VIEW_HEIGHT = 480;

export const VIEWER_FORMATS = {
  VP8: { codec: "VP8", payloadType: 96, clockRate: 90000 },
  H264: { codec: "H264", payloadType: 102, clockRate: 90000 },
} satisfies Record<string, VideoFormat>;

export type ViewerCodec = keyof typeof VIEWER_FORMATS;
// ws-listen: the viewer hosts the socket and answers the sender's offer.
export type SignalingMode = "http" | "ws" | "ws-listen";

export type ViewerConfig = {
  offerUrl: string;
  wsUrl: string;
  signaling: SignalingMode;
  listenHost: string;
  listenPort: number;
  codec: ViewerCodec;
  width: number;
  height: number;
  displayIntervalMs: number;
  ffmpegPath: string;
  ffplayPath: string;
  iceServers: IceServer[];
};

const SignalingSchema = z.enum(["http", "ws", "ws-listen"]).catch("http");
const CodecSchema = z.enum(["VP8", "H264"]).catch("VP8");

function positiveInt(raw: string | undefined, fallback: number) {
  const parsed = z.coerce.number().int().positive().safeParse(raw);
  return raw !== undefined && parsed.success ? parsed.data : fallback;
}

function nonEmpty(...values: Array<string | undefined>) {
  return values.find((value) => value !== undefined && value.trim().length > 0)?.trim();
}

// Unknown or malformed values fall back to their defaults.
export function loadViewerConfig(env: NodeJS.ProcessEnv, configDir?: string): ViewerConfig {
  return {
    offerUrl: nonEmpty(env.PEERSTREAM_OFFER_URL) ?? DEFAULT_OFFER_URL,
    wsUrl: nonEmpty(env.PEERSTREAM_WS_URL) ?? DEFAULT_WS_URL,
    signaling: SignalingSchema.parse(env.PEERSTREAM_SIGNALING?.trim().toLowerCase()),
    listenHost: nonEmpty(env.PEERSTREAM_LISTEN_HOST) ?? DEFAULT_LISTEN_HOST,
    listenPort: positiveInt(env.PEERSTREAM_LISTEN_PORT, DEFAULT_LISTEN_PORT),
    codec: CodecSchema.parse(env.PEERSTREAM_VIDEO_CODEC?.trim().toUpperCase()),
    width: positiveInt(env.PEERSTREAM_VIEW_WIDTH, DEFAULT_VIEW_WIDTH),
    height: positiveInt(env.PEERSTREAM_VIEW_HEIGHT, DEFAULT_VIEW_HEIGHT),
    displayIntervalMs: positiveInt(env.PEERSTREAM_DISPLAY_INTERVAL_MS, DEFAULT_DISPLAY_INTERVAL_MS),
    ffmpegPath: nonEmpty(env.PEERSTREAM_FFMPEG_PATH, env.FFMPEG_PATH) ?? "ffmpeg",
    ffplayPath: nonEmpty(env.PEERSTREAM_FFPLAY_PATH) ?? "ffplay",
    iceServers: resolveIceServers({ env, configDir }),
  };
}
