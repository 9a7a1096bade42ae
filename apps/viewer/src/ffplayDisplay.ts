import { StderrTail, describeExit, spawnMediaProcess } from "@peerstream/session";
import type {
  FrameDisplay,
  Logger,
  MediaProcess,
  PixelFormat,
  RawFrame,
  SpawnMediaProcess,
} from "@peerstream/session";

export type FfplayDisplayOptions = {
  ffplayPath: string;
  logger: Logger;
  title?: string;
  spawnProcess?: SpawnMediaProcess;
};

const FFPLAY_PIXEL_FORMATS: Record<PixelFormat, string> = {
  bgr24: "bgr24",
  rgb24: "rgb24",
  i420: "yuv420p",
};

export function buildPlayerArgs(frame: RawFrame, title: string): string[] {
  return [
    "-hide_banner",
    "-loglevel",
    "error",
    "-window_title",
    title,
    "-fflags",
    "nobuffer",
    "-f",
    "rawvideo",
    "-pixel_format",
    FFPLAY_PIXEL_FORMATS[frame.pixelFormat],
    "-video_size",
    `${frame.width}x${frame.height}`,
    "-i",
    "pipe:0",
  ];
}

type Player = {
  process: MediaProcess;
  key: string;
  exited: Promise<void>;
  retired: boolean;
};

function frameKey(frame: RawFrame) {
  return `${frame.width}x${frame.height}/${frame.pixelFormat}`;
}

// Shows raw frames in an ffplay window fed through stdin. The window opens on the
// first frame; a frame that arrives while the pipe is still full is dropped.
export class FfplayDisplay implements FrameDisplay {
  // The user closed the window, or ffplay went away on its own.
  onClosed: null | ((reason: string) => void) = null;

  private readonly ffplayPath: string;
  private readonly logger: Logger;
  private readonly title: string;
  private readonly spawnProcess: SpawnMediaProcess;
  private player: Player | null = null;
  private closed = false;
  private dropped = 0;
  private written = 0;

  constructor(options: FfplayDisplayOptions) {
    this.ffplayPath = options.ffplayPath;
    this.logger = options.logger;
    this.title = options.title ?? "peerstream";
    this.spawnProcess = options.spawnProcess ?? spawnMediaProcess;
  }

  droppedFrames(): number {
    return this.dropped;
  }

  writtenFrames(): number {
    return this.written;
  }

  show(frame: RawFrame): void {
    if (this.closed) {
      return;
    }

    const key = frameKey(frame);
    if (this.player && this.player.key !== key) {
      this.logger.info(`Frame size changed to ${key}; restarting player.`);
      this.retire(this.player);
      this.player = null;
    }

    const player = this.player ?? this.launch(frame, key);
    const stdin = player.process.stdin;
    if (!stdin || stdin.writableNeedDrain) {
      this.dropped += 1;
      return;
    }
    stdin.write(frame.data);
    this.written += 1;
  }

  // Close the window if it is still open and wait for ffplay to exit.
  async close(): Promise<void> {
    this.closed = true;
    const player = this.player;
    this.player = null;
    if (player) {
      this.retire(player);
      await player.exited;
    }
  }

  private launch(frame: RawFrame, key: string): Player {
    this.logger.info(`Opening display ${key}.`);
    const child = this.spawnProcess(this.ffplayPath, buildPlayerArgs(frame, this.title));
    const stderrTail = new StderrTail();

    let markExited: () => void = () => undefined;
    const player: Player = {
      process: child,
      key,
      retired: false,
      exited: new Promise((resolve) => {
        markExited = resolve;
      }),
    };

    child.stderr?.on("data", (chunk: Buffer) => stderrTail.append(chunk));
    child.stdin?.on("error", (error: Error) => this.logger.debug(`Player stdin: ${error.message}`));
    child.once("error", (error) => {
      markExited();
      this.lost(player, `ffplay failed to run: ${error.message}`);
    });
    child.once("close", (code, signal) => {
      markExited();
      this.lost(player, describeExit("ffplay", code, signal, stderrTail.toString()));
    });

    this.player = player;
    return player;
  }

  private retire(player: Player): void {
    player.retired = true;
    player.process.stdin?.end();
    player.process.kill("SIGTERM");
  }

  private lost(player: Player, reason: string): void {
    if (player.retired || this.closed) {
      return;
    }
    this.closed = true;
    this.player = null;
    this.logger.info(`Display closed: ${reason}.`);
    this.onClosed?.(reason);
  }
}
