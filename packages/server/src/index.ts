import { createLogger, describeError, resolveIceServers } from "@peerstream/session";
import { DEFAULT_HOST, DEFAULT_PORT } from "./config";
import { FfmpegRuntime } from "./ffmpegRuntime";
import { resolveMediaPath } from "./mediaPath";
import { startServer } from "./server";
import { createFileSessionFactory } from "./sessionFactory";

// Boot the server from the environment.
const logger = createLogger("Server");
const port = Number(process.env.PORT) || DEFAULT_PORT;
const host = process.env.HOST || DEFAULT_HOST;

const mediaPathOptions = { env: process.env, cwd: process.cwd(), codeDir: __dirname };
const runtime = new FfmpegRuntime({ env: process.env, logger: logger.child("ffmpeg") });

async function main() {
  const iceServers = resolveIceServers({ env: process.env, configDir: process.cwd() });

  // Report problems at startup; requests still fail individually until they are fixed.
  try {
    await runtime.ensureInitialised();
    logger.info(`Media file: ${resolveMediaPath(mediaPathOptions)}.`);
  } catch (error) {
    logger.warn(describeError(error));
  }

  const server = await startServer({
    port,
    host,
    logger,
    createSession: createFileSessionFactory({
      runtime,
      iceServers,
      resolveMediaPath: () => resolveMediaPath(mediaPathOptions),
    }),
  });

  process.once("SIGINT", () => {
    logger.info("Shutting down.");
    server
      .close()
      .catch((error: unknown) => logger.error(`Shutdown failed: ${describeError(error)}`))
      .finally(() => process.exit(0));
  });
}

main().catch((error: unknown) => {
  logger.error(`Failed to start: ${describeError(error)}`);
  process.exit(1);
});
