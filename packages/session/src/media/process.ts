import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

// The slice of a child process the media adapters use; tests substitute an in-memory fake.
export type MediaProcess = {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  kill: (signal?: NodeJS.Signals) => boolean;
  once(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
};

export type SpawnMediaProcess = (command: string, args: string[]) => MediaProcess;

export const spawnMediaProcess: SpawnMediaProcess = (command, args) =>
  spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

const STDERR_TAIL_BYTES = 2048;

// Keeps the last few KiB of a process's stderr for error reports.
export class StderrTail {
  private text = "";

  append(chunk: Buffer): void {
    this.text = `${this.text}${chunk.toString("utf8")}`.slice(-STDERR_TAIL_BYTES);
  }

  toString(): string {
    return this.text.trim();
  }
}

export function describeExit(
  name: string,
  code: number | null,
  signal: NodeJS.Signals | null,
  tail: string,
) {
  const how = code === null ? `signal ${signal ?? "unknown"}` : `code ${code}`;
  return `${name} exited with ${how}` + (tail ? `: ${tail}` : "");
}
