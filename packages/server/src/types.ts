import type { IceCandidate, Logger, SessionController } from "@peerstream/session";

// The part of a session controller the signaling endpoints drive.
export type ServerSession = Pick<
  SessionController,
  "id" | "beginNegotiation" | "addRemoteCandidate" | "close" | "whenClosed" | "getState"
>;

export type SessionFactoryOptions = {
  sessionId: string;
  logger: Logger;
  onIceCandidate?: (candidate: IceCandidate) => void;
};

// Builds one fully wired session (transport, media source, bridge, controller) per offer.
export type SessionFactory = (options: SessionFactoryOptions) => Promise<ServerSession>;
