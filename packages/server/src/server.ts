import crypto from "node:crypto";
import { createServer } from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import {
  AnswerMessageSchema,
  ByeMessageSchema,
  ClientToServerMessageSchema,
  ErrorMessageSchema,
  IceMessageSchema,
  ProblemSchema,
} from "@peerstream/protocol";
import type { IceCandidate } from "@peerstream/protocol";
import { createLogger, describeError } from "@peerstream/session";
import type { Logger } from "@peerstream/session";
import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  HEALTH_PATH,
  MAX_OFFER_BYTES,
  OFFER_PATH,
  WS_PATH,
} from "./config";
import { ERROR_CODES, RequestTooLargeError, classifyError } from "./errors";
import type { ServerSession, SessionFactory } from "./types";

export type ServerOptions = {
  port?: number;
  host?: string;
  createSession: SessionFactory;
  logger?: Logger;
};

export type RunningServer = {
  port: number;
  sessionCount: () => number;
  close: () => Promise<void>;
};

// Live state of one running server; handlers receive it instead of sharing module globals.
type ServerContext = {
  sessions: Map<string, ServerSession>;
  createSession: SessionFactory;
  logger: Logger;
};

// Signaling state for one WebSocket client.
type SocketRecord = {
  socket: WebSocket;
  session: ServerSession | null;
  negotiating: boolean;
  // Set once the socket has closed; an offer still in flight must then tear its session down.
  closed: boolean;
  // Local candidates gathered before the answer went out.
  pendingCandidates: IceCandidate[];
};

function sendJson(socket: WebSocket, payload: unknown) {
  if (socket.readyState === WebSocket.OPEN) {
    socket.send(JSON.stringify(payload));
  }
}

function sendError(socket: WebSocket, code: string, message: string) {
  const payload = ErrorMessageSchema.parse({ type: "error", code, message });
  sendJson(socket, payload);
}

function sendProblem(res: ServerResponse, status: number, title: string, detail: string) {
  const body = ProblemSchema.parse({ title, detail, status });
  res.writeHead(status, { "Content-Type": "application/problem+json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        reject(new RequestTooLargeError(limit));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

// Create a session and keep it registered until it reaches "closed".
async function openSession(
  context: ServerContext,
  onIceCandidate?: (candidate: IceCandidate) => void,
): Promise<ServerSession> {
  const sessionId = crypto.randomUUID();
  const logger = context.logger.child(`Session ${sessionId.slice(0, 8)}`);
  const session = await context.createSession({ sessionId, logger, onIceCandidate });

  context.sessions.set(session.id, session);
  void session.whenClosed().then(() => {
    context.sessions.delete(session.id);
    context.logger.debug(`Session ${session.id} removed; ${context.sessions.size} active.`);
  });
  return session;
}

async function handleOffer(context: ServerContext, req: IncomingMessage, res: ServerResponse) {
  let session: ServerSession | null = null;
  try {
    const sdp = await readBody(req, MAX_OFFER_BYTES);
    if (sdp.trim().length === 0) {
      sendProblem(res, 400, "Bad Request", "The request body must contain an SDP offer.");
      return;
    }

    context.logger.info(`Offer received from ${req.socket.remoteAddress ?? "unknown"}.`);
    session = await openSession(context);
    const answer = await session.beginNegotiation({ type: "offer", sdp });
    if (!answer) {
      throw new Error("Negotiation produced no answer");
    }

    res.writeHead(200, { "Content-Type": "application/sdp" });
    res.end(answer.sdp);
  } catch (error) {
    const classified = classifyError(error);
    context.logger.warn(`Offer failed (${classified.code}): ${classified.detail}`);
    if (session) {
      await session.close("offer-failed");
    }
    if (!res.headersSent) {
      sendProblem(res, classified.status, classified.title, classified.detail);
    }
  }
}

function handleRequest(context: ServerContext, req: IncomingMessage, res: ServerResponse) {
  const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

  if (pathname === HEALTH_PATH) {
    if (req.method !== "GET") {
      res.setHeader("Allow", "GET");
      sendProblem(res, 405, "Method Not Allowed", `${HEALTH_PATH} only accepts GET.`);
      return;
    }
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end("ok");
    return;
  }

  if (pathname === OFFER_PATH) {
    if (req.method !== "POST") {
      res.setHeader("Allow", "POST");
      sendProblem(res, 405, "Method Not Allowed", `${OFFER_PATH} only accepts POST.`);
      return;
    }
    void handleOffer(context, req, res);
    return;
  }

  sendProblem(res, 404, "Not Found", `No route for ${pathname}.`);
}

function flushCandidates(record: SocketRecord) {
  for (const candidate of record.pendingCandidates.splice(0)) {
    sendJson(record.socket, IceMessageSchema.parse({ type: "ice", candidate }));
  }
}

function socketGone(record: SocketRecord) {
  return record.closed || record.socket.readyState !== WebSocket.OPEN;
}

async function abandonOffer(record: SocketRecord, session: ServerSession) {
  record.negotiating = false;
  record.pendingCandidates = [];
  if (record.session === session) {
    record.session = null;
  }
  await session.close("signaling-closed");
}

async function handleSocketOffer(context: ServerContext, record: SocketRecord, sdp: string) {
  if (record.session || record.negotiating) {
    sendError(record.socket, ERROR_CODES.INVALID_MESSAGE, "This connection already has a session");
    return;
  }

  record.negotiating = true;
  let session: ServerSession | null = null;
  try {
    session = await openSession(context, (candidate) => {
      if (record.negotiating) {
        record.pendingCandidates.push(candidate);
        return;
      }
      sendJson(record.socket, IceMessageSchema.parse({ type: "ice", candidate }));
    });
    if (socketGone(record)) {
      await abandonOffer(record, session);
      return;
    }
    record.session = session;

    const answer = await session.beginNegotiation({ type: "offer", sdp });
    if (socketGone(record)) {
      await abandonOffer(record, session);
      return;
    }
    if (!answer) {
      throw new Error("Negotiation produced no answer");
    }
    sendJson(record.socket, AnswerMessageSchema.parse({ type: "answer", sdp: answer.sdp }));
    record.negotiating = false;
    flushCandidates(record);

    const current = session;
    void current.whenClosed().then(() => {
      if (record.session === current) {
        record.session = null;
        sendJson(record.socket, ByeMessageSchema.parse({ type: "bye", reason: "session-closed" }));
      }
    });
  } catch (error) {
    const classified = classifyError(error);
    context.logger.warn(`WebSocket offer failed (${classified.code}): ${classified.detail}`);
    record.negotiating = false;
    record.pendingCandidates = [];
    record.session = null;
    if (session) {
      await session.close("offer-failed");
    }
    sendError(record.socket, classified.code, classified.detail);
  }
}

async function handleSocketCandidate(record: SocketRecord, candidate: IceCandidate) {
  if (!record.session) {
    sendError(record.socket, ERROR_CODES.SESSION_NOT_FOUND, "No session to add the candidate to");
    return;
  }
  try {
    await record.session.addRemoteCandidate(candidate);
  } catch (error) {
    const detail = `Candidate rejected: ${describeError(error)}`;
    sendError(record.socket, ERROR_CODES.INVALID_MESSAGE, detail);
  }
}

async function closeSocketSession(record: SocketRecord, reason: string) {
  const session = record.session;
  record.session = null;
  if (session) {
    await session.close(reason);
  }
}

function handleMessage(context: ServerContext, record: SocketRecord, raw: string) {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    sendError(record.socket, ERROR_CODES.INVALID_MESSAGE, "Message must be JSON");
    return;
  }

  const parsed = ClientToServerMessageSchema.safeParse(message);
  if (!parsed.success) {
    sendError(record.socket, ERROR_CODES.INVALID_MESSAGE, "Unknown message type");
    return;
  }

  switch (parsed.data.type) {
    case "offer":
      void handleSocketOffer(context, record, parsed.data.sdp);
      break;
    case "ice":
      void handleSocketCandidate(record, parsed.data.candidate);
      break;
    case "bye":
      void closeSocketSession(record, parsed.data.reason ?? "bye");
      break;
    default:
      sendError(record.socket, ERROR_CODES.INVALID_MESSAGE, "Unsupported message type");
  }
}

// Starts the HTTP offer endpoint and the WebSocket signaling endpoint on one port.
export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const port = options.port ?? DEFAULT_PORT;
  const host = options.host ?? DEFAULT_HOST;
  const context: ServerContext = {
    sessions: new Map(),
    createSession: options.createSession,
    logger: options.logger ?? createLogger("Server"),
  };

  const httpServer = createServer((req, res) => handleRequest(context, req, res));
  const wss = new WebSocketServer({ server: httpServer, path: WS_PATH });

  wss.on("connection", (socket) => {
    const record: SocketRecord = {
      socket,
      session: null,
      negotiating: false,
      closed: false,
      pendingCandidates: [],
    };
    socket.on("message", (data) => handleMessage(context, record, data.toString()));
    socket.on("close", () => {
      record.closed = true;
      void closeSocketSession(record, "signaling-closed");
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const resolvedPort = typeof address === "string" ? port : address?.port ?? port;
  context.logger.info(
    `Listening on http://${host}:${resolvedPort} (POST ${OFFER_PATH}, ws ${WS_PATH}).`,
  );

  let closing: Promise<void> | null = null;
  const shutdown = async () => {
    await Promise.all(
      [...context.sessions.values()].map((session) => session.close("server-shutdown")),
    );
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
      httpServer.closeAllConnections();
    });
  };

  return {
    port: resolvedPort,
    sessionCount: () => context.sessions.size,
    close: () => {
      if (!closing) {
        closing = shutdown();
      }
      return closing;
    },
  };
}
