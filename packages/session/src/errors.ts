// Canonical error codes for session and media pipeline failures.
export const SESSION_ERROR_CODES = {
  NEGOTIATION_FAILED: "negotiation_failed",
  FORMAT_MISMATCH: "format_mismatch",
  TRANSPORT_FAILED: "transport_failed",
  MEDIA_SOURCE_FAILED: "media_source_failed",
  UNSUPPORTED_FRAME_FORMAT: "unsupported_frame_format",
} as const;

export type SessionErrorCode = (typeof SESSION_ERROR_CODES)[keyof typeof SESSION_ERROR_CODES];

export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SessionError";
    this.code = code;
  }
}

// The offer or answer could not be applied; reported to the signaling caller, never retried.
export class NegotiationError extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SESSION_ERROR_CODES.NEGOTIATION_FAILED, message, options);
    this.name = "NegotiationError";
  }
}

// No codec in common between the local pipeline and the remote description.
export class FormatError extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SESSION_ERROR_CODES.FORMAT_MISMATCH, message, options);
    this.name = "FormatError";
  }
}

export class TransportFailure extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SESSION_ERROR_CODES.TRANSPORT_FAILED, message, options);
    this.name = "TransportFailure";
  }
}

export class MediaSourceError extends SessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SESSION_ERROR_CODES.MEDIA_SOURCE_FAILED, message, options);
    this.name = "MediaSourceError";
  }
}

// Recoverable: the frame is dropped and the session keeps streaming.
export class UnsupportedFrameFormat extends SessionError {
  constructor(message: string) {
    super(SESSION_ERROR_CODES.UNSUPPORTED_FRAME_FORMAT, message);
    this.name = "UnsupportedFrameFormat";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
