import { FormatError, NegotiationError, describeError } from "@peerstream/session";

// Canonical error codes used by the HTTP and WebSocket signaling endpoints.
export const ERROR_CODES = {
  INVALID_MESSAGE: "invalid_message",
  NEGOTIATION_FAILED: "negotiation_failed",
  FORMAT_MISMATCH: "format_mismatch",
  MEDIA_UNAVAILABLE: "media_unavailable",
  SESSION_NOT_FOUND: "session_not_found",
  INTERNAL_ERROR: "internal_error",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ffmpeg or the media file cannot be found; the server stays up and reports it per request.
export class MediaUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MediaUnavailableError";
  }
}

export class RequestTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "RequestTooLargeError";
  }
}

export type ClassifiedError = {
  status: number;
  title: string;
  code: ErrorCode;
  detail: string;
};

// Map a failure while opening or negotiating a session onto a status and error code.
export function classifyError(error: unknown): ClassifiedError {
  const detail = describeError(error) || "Unknown error";
  if (error instanceof FormatError) {
    return {
      status: 422,
      title: "Unsupported Media Format",
      code: ERROR_CODES.FORMAT_MISMATCH,
      detail,
    };
  }
  if (error instanceof NegotiationError) {
    return {
      status: 400,
      title: "Negotiation Failed",
      code: ERROR_CODES.NEGOTIATION_FAILED,
      detail,
    };
  }
  if (error instanceof RequestTooLargeError) {
    return { status: 413, title: "Payload Too Large", code: ERROR_CODES.INVALID_MESSAGE, detail };
  }
  if (error instanceof MediaUnavailableError) {
    return { status: 500, title: "Media Unavailable", code: ERROR_CODES.MEDIA_UNAVAILABLE, detail };
  }
  return { status: 500, title: "Internal Server Error", code: ERROR_CODES.INTERNAL_ERROR, detail };
}
