import WebSocket from "ws";
import {
  ByeMessageSchema,
  IceMessageSchema,
  OfferMessageSchema,
  ServerToClientMessageSchema,
} from "@peerstream/protocol";
import type { IceCandidate, ServerToClientMessage } from "@peerstream/protocol";
import { FormatError, NegotiationError } from "@peerstream/session";
import type { Logger } from "@peerstream/session";

export type WsSignalingOptions = {
  logger: Logger;
  onRemoteCandidate?: (candidate: IceCandidate) => void;
  // The server ended the session, or the socket dropped after the answer.
  onClosed?: (reason: string) => void;
};

// Trickles local candidates to the remote peer until closed.
export type SignalingChannel = {
  sendCandidate: (candidate: IceCandidate) => void;
  close: (reason?: string) => Promise<void>;
};

// Open signaling channel; the server keeps the session only while the socket stays up.
export type WsSignalingChannel = SignalingChannel & {
  answer: string;
};

function parseMessage(raw: string): ServerToClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ServerToClientMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function rejectionFor(code: string, message: string): NegotiationError | FormatError {
  if (code === "format_mismatch") {
    return new FormatError(message);
  }
  return new NegotiationError(`Server rejected the offer (${code}): ${message}`);
}

// Send the offer over the WebSocket endpoint and resolve once the answer arrives.
export function exchangeOverWebSocket(
  url: string,
  sdp: string,
  options: WsSignalingOptions,
): Promise<WsSignalingChannel> {
  const { logger } = options;
  const socket = new WebSocket(url);
  const closed = new Promise<void>((resolve) => socket.once("close", () => resolve()));
  let settled = false;
  let ended = false;

  const send = (payload: unknown) => {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(payload));
    }
  };

  const end = (reason: string) => {
    if (!ended) {
      ended = true;
      options.onClosed?.(reason);
    }
  };

  const channel = (answer: string): WsSignalingChannel => ({
    answer,
    sendCandidate: (candidate) => send(IceMessageSchema.parse({ type: "ice", candidate })),
    close: async (reason = "bye") => {
      ended = true;
      if (socket.readyState === WebSocket.OPEN) {
        send(ByeMessageSchema.parse({ type: "bye", reason }));
        socket.close();
      } else if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      }
      await closed;
    },
  });

  return new Promise((resolve, reject) => {
    const fail = (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      ended = true;
      socket.terminate();
      reject(error);
    };

    socket.once("open", () => {
      logger.debug(`Signaling connected to ${url}.`);
      send(OfferMessageSchema.parse({ type: "offer", sdp }));
    });

    socket.on("error", (error) => {
      if (!settled) {
        const message = `WebSocket signaling failed: ${error.message}`;
        fail(new NegotiationError(message, { cause: error }));
        return;
      }
      logger.warn(`Signaling socket error: ${error.message}`);
    });

    socket.on("message", (data) => {
      const message = parseMessage(data.toString());
      if (!message) {
        logger.warn("Ignoring unreadable signaling message.");
        return;
      }

      switch (message.type) {
        case "answer":
          if (settled) {
            logger.warn("Ignoring a second answer.");
            return;
          }
          settled = true;
          resolve(channel(message.sdp));
          return;
        case "ice":
          options.onRemoteCandidate?.(message.candidate);
          return;
        case "error":
          if (!settled) {
            fail(rejectionFor(message.code, message.message));
            return;
          }
          logger.warn(`Signaling error (${message.code}): ${message.message}`);
          return;
        case "bye":
          end(message.reason ?? "bye");
          return;
      }
    });

    socket.once("close", () => {
      if (!settled) {
        fail(new NegotiationError("WebSocket closed before an answer arrived"));
        return;
      }
      end("signaling-closed");
    });
  });
}
