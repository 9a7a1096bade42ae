import { execFile } from "node:child_process";
import { describeError } from "@peerstream/session";
import type { Logger } from "@peerstream/session";
import { MediaUnavailableError } from "./errors";

export type CommandResult = {
  ok: boolean;
  output: string;
};

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export type FfmpegRuntimeOptions = {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  run?: CommandRunner;
};

const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    execFile(command, args, { timeout: 10_000 }, (error, stdout, stderr) => {
      resolve({ ok: !error, output: error ? describeError(error) : `${stdout}${stderr}` });
    });
  });

// Locates a working ffmpeg binary once and remembers it for every later session.
export class FfmpegRuntime {
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly run: CommandRunner;
  private resolving: Promise<string> | null = null;

  constructor(options: FfmpegRuntimeOptions) {
    this.env = options.env;
    this.logger = options.logger;
    this.run = options.run ?? runCommand;
  }

  candidates(): string[] {
    const configured = [this.env.PEERSTREAM_FFMPEG_PATH, this.env.FFMPEG_PATH]
      .map((value) => value?.trim())
      .filter((value): value is string => Boolean(value));
    return [...new Set([...configured, "ffmpeg"])];
  }

  // Concurrent callers share one probe; a failed probe is retried on the next call.
  ensureInitialised(): Promise<string> {
    if (!this.resolving) {
      this.resolving = this.probe().catch((error: unknown) => {
        this.resolving = null;
        throw error;
      });
    }
    return this.resolving;
  }

  private async probe(): Promise<string> {
    const failures: string[] = [];
    for (const candidate of this.candidates()) {
      const result = await this.run(candidate, ["-hide_banner", "-version"]);
      if (result.ok) {
        const version = result.output.split(/\r?\n/)[0]?.trim() ?? "";
        this.logger.info(`Using ${candidate}${version ? ` (${version})` : ""}.`);
        return candidate;
      }
      failures.push(`${candidate}: ${result.output}`);
    }

    throw new MediaUnavailableError(
      `ffmpeg is not available; set PEERSTREAM_FFMPEG_PATH. Tried ${failures.join("; ")}`,
    );
  }
}
