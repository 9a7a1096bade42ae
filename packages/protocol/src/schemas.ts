import { z } from "zod";

// Codecs the media pipeline knows how to describe in SDP.
export const VIDEO_CODECS = ["VP8", "VP9", "H264", "AV1"] as const;
export const AUDIO_CODECS = ["OPUS", "PCMU", "PCMA"] as const;

// Raw pixel layouts a decoded frame may carry to the display.
export const PIXEL_FORMATS = ["bgr24", "rgb24", "i420"] as const;

export const VideoCodecSchema = z.enum(VIDEO_CODECS);
export const AudioCodecSchema = z.enum(AUDIO_CODECS);
export const PixelFormatSchema = z.enum(PIXEL_FORMATS);

const PayloadTypeSchema = z.number().int().min(0).max(127);

export const VideoFormatSchema = z.object({
  codec: VideoCodecSchema,
  payloadType: PayloadTypeSchema,
  clockRate: z.number().int().positive(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
});

export const AudioFormatSchema = z.object({
  codec: AudioCodecSchema,
  payloadType: PayloadTypeSchema,
  clockRate: z.number().int().positive(),
  channels: z.number().int().positive().optional(),
});

export const SessionDescriptionSchema = z.object({
  type: z.enum(["offer", "answer"]),
  sdp: z.string().min(1),
});

export const IceCandidateSchema = z.object({
  candidate: z.string().min(1),
  sdpMid: z.string().nullable().optional(),
  sdpMLineIndex: z.number().int().nonnegative().nullable().optional(),
});

export const OfferMessageSchema = z.object({
  type: z.literal("offer"),
  sdp: z.string().min(1),
});

export const AnswerMessageSchema = z.object({
  type: z.literal("answer"),
  sdp: z.string().min(1),
});

export const IceMessageSchema = z.object({
  type: z.literal("ice"),
  candidate: IceCandidateSchema,
});

export const ByeMessageSchema = z.object({
  type: z.literal("bye"),
  reason: z.string().min(1).optional(),
});

export const ErrorMessageSchema = z.object({
  type: z.literal("error"),
  code: z.string().min(1),
  message: z.string().min(1),
});

export const ClientToServerMessageSchema = z.union([
  OfferMessageSchema,
  IceMessageSchema,
  ByeMessageSchema,
]);

export const ServerToClientMessageSchema = z.union([
  AnswerMessageSchema,
  IceMessageSchema,
  ByeMessageSchema,
  ErrorMessageSchema,
]);

// Body returned by the HTTP offer endpoint when negotiation cannot proceed.
export const ProblemSchema = z.object({
  title: z.string().min(1),
  detail: z.string().min(1),
  status: z.number().int().min(400).max(599),
});

export const IceServerSchema = z.object({
  urls: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  username: z.string().optional(),
  credential: z.string().optional(),
});

export const IceServerListSchema = z.array(IceServerSchema);

export type VideoCodec = z.infer<typeof VideoCodecSchema>;
export type AudioCodec = z.infer<typeof AudioCodecSchema>;
export type PixelFormat = z.infer<typeof PixelFormatSchema>;
export type VideoFormat = z.infer<typeof VideoFormatSchema>;
export type AudioFormat = z.infer<typeof AudioFormatSchema>;
export type SessionDescription = z.infer<typeof SessionDescriptionSchema>;
export type IceCandidate = z.infer<typeof IceCandidateSchema>;
export type OfferMessage = z.infer<typeof OfferMessageSchema>;
export type AnswerMessage = z.infer<typeof AnswerMessageSchema>;
export type IceMessage = z.infer<typeof IceMessageSchema>;
export type ByeMessage = z.infer<typeof ByeMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorMessageSchema>;
export type ClientToServerMessage = z.infer<typeof ClientToServerMessageSchema>;
export type ServerToClientMessage = z.infer<typeof ServerToClientMessageSchema>;
export type Problem = z.infer<typeof ProblemSchema>;
export type IceServer = z.infer<typeof IceServerSchema>;
