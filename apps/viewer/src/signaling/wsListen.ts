import WebSocket, { WebSocketServer } from "ws";
import {
  AnswerMessageSchema,
  ByeMessageSchema,
  ClientToServerMessageSchema,
  ErrorMessageSchema,
  IceMessageSchema,
} from "@peerstream/protocol";
import type { ClientToServerMessage, IceCandidate } from "@peerstream/protocol";
import { FormatError, NegotiationError, describeError } from "@peerstream/session";
import type { Logger } from "@peerstream/session";
import type { SignalingChannel } from "./ws";

export const LISTEN_PATH = "/ws";

export type WsListenOptions = {
  port: number;
  host?: string;
  logger: Logger;
  // Apply the remote offer and return the answer SDP.
  answerOffer: (sdp: string) => Promise<string>;
  onRemoteCandidate?: (candidate: IceCandidate) => void;
  // The sender said bye, or its socket dropped after the answer.
  onClosed?: (reason: string) => void;
  signal?: AbortSignal;
};

export type WsListeningChannel = SignalingChannel & {
  port: number;
  // Settles once the first offer has been answered, or rejects when that failed.
  answered: Promise<void>;
};

function parseMessage(raw: string): ClientToServerMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ClientToServerMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function errorCodeFor(error: unknown) {
  return error instanceof FormatError ? "format_mismatch" : "negotiation_failed";
}

// Wait for a sender to connect and offer; this viewer answers. Only one sender is served.
export async function listenForOffer(options: WsListenOptions): Promise<WsListeningChannel> {
  const { logger } = options;
  const wss = new WebSocketServer({ port: options.port, host: options.host, path: LISTEN_PATH });

  await new Promise<void>((resolve, reject) => {
    wss.once("error", reject);
    wss.once("listening", () => {
      wss.off("error", reject);
      resolve();
    });
  });

  const address = wss.address();
  const port = typeof address === "string" ? options.port : address.port;

  let peer: WebSocket | null = null;
  let answeredPeer = false;
  let ended = false;
  let closePromise: Promise<void> | null = null;
  const pendingCandidates: IceCandidate[] = [];

  let settleAnswered: (error: Error | null) => void = () => undefined;
  const answered = new Promise<void>((resolve, reject) => {
    settleAnswered = (error) => (error ? reject(error) : resolve());
  });
  // Rejections reach callers through `answered`; this marks them handled.
  answered.catch(() => undefined);

  const send = (socket: WebSocket, payload: unknown) => {
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

  const handleOffer = async (socket: WebSocket, sdp: string) => {
    try {
      const answer = await options.answerOffer(sdp);
      send(socket, AnswerMessageSchema.parse({ type: "answer", sdp: answer }));
      answeredPeer = true;
      for (const candidate of pendingCandidates.splice(0)) {
        send(socket, IceMessageSchema.parse({ type: "ice", candidate }));
      }
      settleAnswered(null);
    } catch (error) {
      logger.warn(`Answering the offer failed: ${describeError(error)}`);
      send(
        socket,
        ErrorMessageSchema.parse({
          type: "error",
          code: errorCodeFor(error),
          message: describeError(error),
        }),
      );
      settleAnswered(
        error instanceof NegotiationError || error instanceof FormatError
          ? error
          : new NegotiationError(`Answering the offer failed: ${describeError(error)}`, {
              cause: error,
            }),
      );
    }
  };

  wss.on("connection", (socket) => {
    if (peer) {
      send(
        socket,
        ErrorMessageSchema.parse({
          type: "error",
          code: "invalid_message",
          message: "This viewer already has a sender",
        }),
      );
      socket.close();
      return;
    }
    peer = socket;
    logger.info("Sender connected.");

    socket.on("message", (data) => {
      const message = parseMessage(data.toString());
      if (!message) {
        logger.warn("Ignoring unreadable signaling message.");
        return;
      }

      switch (message.type) {
        case "offer":
          if (answeredPeer) {
            logger.warn("Ignoring a second offer.");
            return;
          }
          void handleOffer(socket, message.sdp);
          return;
        case "ice":
          options.onRemoteCandidate?.(message.candidate);
          return;
        case "bye":
          end(message.reason ?? "bye");
          return;
      }
    });

    socket.once("close", () => {
      if (!answeredPeer) {
        settleAnswered(new NegotiationError("Sender left before the offer was answered"));
      }
      end("signaling-closed");
    });
  });

  const close = (reason = "bye"): Promise<void> => {
    if (!closePromise) {
      ended = true;
      settleAnswered(new NegotiationError(`Stopped listening (${reason})`));
      closePromise = new Promise<void>((resolve) => {
        if (peer) {
          send(peer, ByeMessageSchema.parse({ type: "bye", reason }));
          peer.close();
        }
        for (const client of wss.clients) {
          if (client !== peer) {
            client.terminate();
          }
        }
        wss.close(() => resolve());
      });
    }
    return closePromise;
  };

  if (options.signal?.aborted) {
    await close("aborted");
  } else {
    options.signal?.addEventListener("abort", () => void close("aborted"), { once: true });
  }

  return {
    port,
    answered,
    sendCandidate: (candidate) => {
      if (peer && answeredPeer) {
        send(peer, IceMessageSchema.parse({ type: "ice", candidate }));
      } else {
        pendingCandidates.push(candidate);
      }
    },
    close,
  };
}
