import crypto from "node:crypto";
import {
  FrameBuffer,
  MediaBridge,
  RenderLoop,
  SessionController,
  NegotiationError,
  WeriftTransport,
  createLogger,
  describeError,
} from "@peerstream/session";
import type { IceCandidate } from "@peerstream/session";
import { loadViewerConfig } from "./config";
import { FfmpegVideoSink } from "./ffmpegVideoSink";
import { FfplayDisplay } from "./ffplayDisplay";
import { postOffer } from "./signaling/http";
import { exchangeOverWebSocket } from "./signaling/ws";
import type { SignalingChannel } from "./signaling/ws";
import { LISTEN_PATH, listenForOffer } from "./signaling/wsListen";

const logger = createLogger("Viewer");

// Offer, receive, decode and display until interrupted, the window closes or the session ends.
async function main(): Promise<number> {
  const config = loadViewerConfig(process.env, process.cwd());
  const sessionId = crypto.randomUUID();
  const sessionLogger = logger.child(`Session ${sessionId.slice(0, 8)}`);

  const frameBuffer = new FrameBuffer();
  const sink = new FfmpegVideoSink({
    ffmpegPath: config.ffmpegPath,
    codec: config.codec,
    width: config.width,
    height: config.height,
    logger: sessionLogger.child("decoder"),
  });
  const pipeline = new MediaBridge({ sink, frameBuffer, logger: sessionLogger.child("media") });
  const transport = new WeriftTransport({
    direction: "recvonly",
    formats: pipeline.formats,
    iceServers: config.iceServers,
    logger: sessionLogger.child("rtc"),
  });

  let channel: SignalingChannel | null = null;
  const earlyCandidates: IceCandidate[] = [];
  const controller = new SessionController({
    transport,
    pipeline,
    frameBuffer,
    sessionId,
    logger: sessionLogger,
    onIceCandidate: (candidate) => {
      if (channel) {
        channel.sendCandidate(candidate);
      } else {
        earlyCandidates.push(candidate);
      }
    },
  });

  const display = new FfplayDisplay({
    ffplayPath: config.ffplayPath,
    logger: logger.child("display"),
  });
  const renderLoop = new RenderLoop({
    frameBuffer,
    display,
    logger: logger.child("render"),
    intervalMs: config.displayIntervalMs,
  });

  const abort = new AbortController();
  const stop = (why: string) => {
    if (!abort.signal.aborted) {
      logger.info(`${why} Stopping.`);
      abort.abort();
    }
  };
  process.once("SIGINT", () => stop("Interrupted."));
  display.onClosed = () => stop("Display window closed.");
  controller.onStateChange((state) => {
    if (state === "closed") {
      stop("Session closed.");
    }
  });

  const rendering = renderLoop.run(abort.signal);

  const onRemoteCandidate = (candidate: IceCandidate) => {
    controller.addRemoteCandidate(candidate).catch((error: unknown) => {
      logger.warn(`Remote candidate rejected: ${describeError(error)}`);
    });
  };
  const onClosed = (reason: string) => stop(`Signaling ended (${reason}).`);

  try {
    if (config.signaling === "ws-listen") {
      const listener = await listenForOffer({
        port: config.listenPort,
        host: config.listenHost,
        logger: logger.child("signaling"),
        answerOffer: async (sdp) => {
          const answer = await controller.beginNegotiation({ type: "offer", sdp });
          if (!answer) {
            throw new NegotiationError("Negotiation produced no answer");
          }
          return answer.sdp;
        },
        onRemoteCandidate,
        onClosed,
        signal: abort.signal,
      });
      channel = listener;
      for (const candidate of earlyCandidates.splice(0)) {
        listener.sendCandidate(candidate);
      }
      const where = `ws://${config.listenHost}:${listener.port}${LISTEN_PATH}`;
      logger.info(`Waiting for a ${config.codec} offer on ${where}.`);
      await listener.answered;
    } else {
      const offer = await controller.createOffer();
      logger.info(`Sending ${config.codec} offer over ${config.signaling}.`);
      let answer: string;
      if (config.signaling === "ws") {
        const exchange = await exchangeOverWebSocket(config.wsUrl, offer.sdp, {
          logger: logger.child("signaling"),
          onRemoteCandidate,
          onClosed,
        });
        channel = exchange;
        for (const candidate of earlyCandidates.splice(0)) {
          exchange.sendCandidate(candidate);
        }
        answer = exchange.answer;
      } else {
        answer = await postOffer(config.offerUrl, offer.sdp, abort.signal);
      }
      await controller.beginNegotiation({ type: "answer", sdp: answer });
    }
  } catch (error) {
    logger.error(`Negotiation failed: ${describeError(error)}`);
    stop("No session.");
  }

  await rendering;
  await controller.close("viewer-exit");
  await channel?.close("viewer-exit");
  await display.close();

  const failure = controller.getFailure();
  if (failure) {
    logger.error(`Session failed (${failure.code}): ${failure.message}`);
    return 1;
  }
  logger.info(`Displayed ${renderLoop.displayedFrames()} frames.`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error(`Viewer crashed: ${describeError(error)}`);
    process.exit(1);
  });
