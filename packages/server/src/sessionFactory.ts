import { MediaBridge, SessionController, WeriftTransport } from "@peerstream/session";
import type { SpawnMediaProcess } from "@peerstream/session";
import type { IceServer } from "@peerstream/protocol";
import { FfmpegFileSource } from "./ffmpegFileSource";
import type { FfmpegRuntime } from "./ffmpegRuntime";
import type { SessionFactory } from "./types";

export type FileSessionFactoryOptions = {
  runtime: FfmpegRuntime;
  // Resolved per session so a file added after startup is picked up.
  resolveMediaPath: () => string;
  iceServers: IceServer[];
  spawnProcess?: SpawnMediaProcess;
};

// Each session gets its own ffmpeg process, bridge and sendonly werift peer connection.
export function createFileSessionFactory(options: FileSessionFactoryOptions): SessionFactory {
  return async ({ sessionId, logger, onIceCandidate }) => {
    const ffmpegPath = await options.runtime.ensureInitialised();
    const mediaPath = options.resolveMediaPath();

    const source = new FfmpegFileSource({
      ffmpegPath,
      mediaPath,
      logger: logger.child("ffmpeg"),
      spawnProcess: options.spawnProcess,
    });
    const pipeline = new MediaBridge({ source, logger: logger.child("media") });
    const transport = new WeriftTransport({
      direction: "sendonly",
      formats: pipeline.formats,
      iceServers: options.iceServers,
      logger: logger.child("rtc"),
    });

    return new SessionController({ transport, pipeline, logger, sessionId, onIceCandidate });
  };
}
