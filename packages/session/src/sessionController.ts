import crypto from "node:crypto";
import {
  FormatError,
  MediaSourceError,
  NegotiationError,
  SessionError,
  TransportFailure,
  describeError,
} from "./errors";
import type { FrameBuffer } from "./frameBuffer";
import type { Logger } from "./logger";
import { describeFormats, extractOfferedFormats, selectFormat } from "./sdp/formats";
import { acceptsMedia, transitionSession } from "./stateMachine";
import type { SessionEvent, SessionState } from "./stateMachine";
import type {
  IceCandidate,
  MediaPipeline,
  PeerConnectionState,
  PeerTransport,
  SessionDescription,
} from "./types";

export type SessionControllerOptions = {
  transport: PeerTransport;
  pipeline: MediaPipeline;
  // Cleared on teardown; the render loop only ever reads it.
  frameBuffer?: FrameBuffer;
  logger: Logger;
  sessionId?: string;
  onIceCandidate?: (candidate: IceCandidate) => void;
};

export type SessionStateListener = (state: SessionState, previous: SessionState) => void;

// Drives one peer session from negotiation to teardown. Every shutdown path
// (explicit close, transport failure, media error, failed negotiation) funnels
// through the same guarded teardown, which runs exactly once.
export class SessionController {
  readonly id: string;
  private state: SessionState = "negotiating";
  private failure: SessionError | null = null;
  private readonly transport: PeerTransport;
  private readonly pipeline: MediaPipeline;
  private readonly frameBuffer: FrameBuffer | null;
  private readonly logger: Logger;
  private readonly onIceCandidate?: (candidate: IceCandidate) => void;
  private readonly listeners = new Set<SessionStateListener>();
  private teardownPromise: Promise<void> | null = null;
  private mediaStart: Promise<void> | null = null;
  private localOffer: SessionDescription | null = null;
  private negotiationInFlight = false;
  private connectedEarly = false;

  constructor(options: SessionControllerOptions) {
    this.id = options.sessionId ?? crypto.randomUUID();
    this.transport = options.transport;
    this.pipeline = options.pipeline;
    this.frameBuffer = options.frameBuffer ?? null;
    this.logger = options.logger;
    this.onIceCandidate = options.onIceCandidate;

    this.transport.onconnectionstatechange = (state) => this.onTransportState(state);
    this.transport.onicecandidate = (candidate) => this.handleIceCandidate(candidate);
    this.pipeline.attach(this.transport, {
      onFatalError: (error) => this.handlePipelineError(error),
      onEnded: () => this.requestTeardown("media-ended", null),
    });
  }

  getState(): SessionState {
    return this.state;
  }

  // The error that ended the session, if it did not close cleanly.
  getFailure(): SessionError | null {
    return this.failure;
  }

  onStateChange(listener: SessionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Resolves once the session has released everything and reached "closed".
  whenClosed(): Promise<void> {
    if (this.state === "closed") {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const unsubscribe = this.onStateChange((state) => {
        if (state === "closed") {
          unsubscribe();
          resolve();
        }
      });
    });
  }

  // Settles once the media pipeline started after "connected", or failed to.
  whenMediaStarted(): Promise<void> {
    return this.mediaStart ?? Promise.resolve();
  }

  // Outbound negotiation: create and apply a local offer for the caller to deliver.
  async createOffer(): Promise<SessionDescription> {
    if (this.state !== "negotiating" || this.localOffer || this.negotiationInFlight) {
      throw new NegotiationError(`Cannot create an offer in state ${this.state}`);
    }

    this.negotiationInFlight = true;
    try {
      const offer = await this.transport.createOffer();
      await this.transport.setLocalDescription(offer);
      this.ensureStillNegotiating();
      this.localOffer = this.transport.getLocalDescription() ?? offer;
      this.logger.info("Created local offer.");
      return this.localOffer;
    } catch (error) {
      throw await this.failNegotiation(error, "create offer");
    } finally {
      this.negotiationInFlight = false;
    }
  }

  // Apply the remote description. An offer yields the answer to return to the caller;
  // an answer to our own offer yields null. Failures tear the session down and are rethrown.
  async beginNegotiation(description: SessionDescription): Promise<SessionDescription | null> {
    if (this.state !== "negotiating" || this.negotiationInFlight) {
      throw new NegotiationError(`Cannot negotiate in state ${this.state}`);
    }

    this.negotiationInFlight = true;
    try {
      const answer = await this.applyRemoteDescription(description);
      this.transition("negotiated");

      if (this.connectedEarly) {
        this.connectedEarly = false;
        this.handleConnected();
      }
      return answer;
    } catch (error) {
      throw await this.failNegotiation(error, `apply remote ${description.type}`);
    } finally {
      this.negotiationInFlight = false;
    }
  }

  // Connection-state notifications from the transport; may arrive at any time.
  onTransportState(state: PeerConnectionState): void {
    this.logger.info(`Peer connection state: ${state}.`);

    switch (state) {
      case "connected":
        this.handleConnected();
        return;
      case "failed":
      case "disconnected":
        this.requestTeardown(
          `transport-${state}`,
          new TransportFailure(`Peer connection ${state}`),
        );
        return;
      case "closed":
        this.requestTeardown("transport-closed", null);
        return;
      default:
        return;
    }
  }

  async addRemoteCandidate(candidate: IceCandidate): Promise<void> {
    if (!acceptsMedia(this.state)) {
      return;
    }
    await this.transport.addIceCandidate(candidate);
  }

  // Explicit shutdown. Every caller receives the same teardown; only the first does the work.
  close(reason = "closed-by-caller"): Promise<void> {
    return this.beginTeardown(reason, null);
  }

  private async applyRemoteDescription(
    description: SessionDescription,
  ): Promise<SessionDescription | null> {
    if (description.type === "answer" && !this.localOffer) {
      throw new NegotiationError("Received an answer without a local offer");
    }
    if (description.type === "offer" && this.localOffer) {
      throw new NegotiationError("Received an offer while awaiting an answer");
    }

    const remoteFormats = extractOfferedFormats(description.sdp);
    const selected = selectFormat(this.pipeline.formats, remoteFormats);
    if (!selected) {
      throw new FormatError(
        `No common video codec: local [${describeFormats(this.pipeline.formats)}], ` +
          `remote [${describeFormats(remoteFormats)}]`,
      );
    }
    this.pipeline.onFormatNegotiated(selected);

    let answer: SessionDescription | null = null;
    try {
      await this.transport.setRemoteDescription(description);
      if (description.type === "offer") {
        const created = await this.transport.createAnswer();
        await this.transport.setLocalDescription(created);
        answer = this.transport.getLocalDescription() ?? created;
      }
    } catch (error) {
      throw new NegotiationError(
        `Failed to apply remote ${description.type}: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.ensureStillNegotiating();
    this.logger.info(
      description.type === "offer"
        ? `Returning answer with length ${answer?.sdp.length ?? 0}.`
        : "Remote answer applied. ICE negotiation in progress.",
    );
    return answer;
  }

  private ensureStillNegotiating(): void {
    if (this.state !== "negotiating") {
      throw new NegotiationError(`Session left negotiation (state ${this.state})`);
    }
  }

  private async failNegotiation(error: unknown, step: string): Promise<SessionError> {
    const failure =
      error instanceof SessionError
        ? error
        : new NegotiationError(`Failed to ${step}: ${describeError(error)}`, { cause: error });
    this.logger.warn(`Negotiation failed: ${failure.message}`);
    await this.beginTeardown(`negotiation-${failure.code}`, failure);
    return failure;
  }

  private handleConnected(): void {
    if (this.state === "negotiating") {
      // The transport can report connectivity before the answer has been applied.
      this.connectedEarly = true;
      return;
    }
    if (this.state !== "connecting") {
      return;
    }

    this.transition("connected");
    this.logger.info("Starting media pipeline.");
    this.mediaStart = this.pipeline.start().then(
      () => undefined,
      (error: unknown) =>
        this.handlePipelineError(
          new MediaSourceError(`Media pipeline failed to start: ${describeError(error)}`, {
            cause: error,
          }),
        ),
    );
  }

  private handleIceCandidate(candidate: IceCandidate): void {
    this.logger.debug(`ICE candidate: ${candidate.candidate}`);
    try {
      this.onIceCandidate?.(candidate);
    } catch (error) {
      this.logger.warn(`ICE candidate listener threw: ${describeError(error)}`);
    }
  }

  private handlePipelineError(error: Error): void {
    const failure =
      error instanceof SessionError
        ? error
        : new MediaSourceError(describeError(error), { cause: error });
    this.requestTeardown("media-error", failure);
  }

  // Entry point for callbacks; the teardown promise never rejects.
  private requestTeardown(reason: string, failure: SessionError | null): void {
    void this.beginTeardown(reason, failure);
  }

  private beginTeardown(reason: string, failure: SessionError | null): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownPromise = this.teardown(reason, failure);
    }
    return this.teardownPromise;
  }

  private async teardown(reason: string, failure: SessionError | null): Promise<void> {
    this.logger.info(`Cleaning up session: ${reason}.`);

    if (failure) {
      this.failure = failure;
      this.transition("fail");
    } else {
      this.transition("close");
    }

    // Unsubscribe before stopping so no callback lands in a half-released session.
    this.pipeline.detach();
    this.transport.onicecandidate = null;
    this.transport.onconnectionstatechange = null;

    try {
      await this.pipeline.stop();
    } catch (error) {
      this.logger.warn(`Media stop threw: ${describeError(error)}`);
    }

    this.frameBuffer?.clear();

    try {
      await this.transport.close(reason);
    } catch (error) {
      this.logger.warn(`Transport close threw: ${describeError(error)}`);
    }

    this.transition("released");
    this.logger.info("Session closed.");
  }

  private transition(event: SessionEvent): void {
    const previous = this.state;
    const next = transitionSession(previous, event);
    if (next === previous) {
      return;
    }

    this.state = next;
    this.logger.debug(`State: ${previous} -> ${next}`);
    for (const listener of [...this.listeners]) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.warn(`State listener threw: ${describeError(error)}`);
      }
    }
  }
}
