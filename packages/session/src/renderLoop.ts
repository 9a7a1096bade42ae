import { setTimeout as sleep } from "node:timers/promises";
import { describeError } from "./errors";
import type { FrameBuffer } from "./frameBuffer";
import type { Logger } from "./logger";
import type { FrameDisplay } from "./types";

export const DEFAULT_DISPLAY_INTERVAL_MS = 15;
const RATE_WINDOW_MS = 5_000;

export type RenderLoopOptions = {
  frameBuffer: FrameBuffer;
  display: FrameDisplay;
  logger: Logger;
  intervalMs?: number;
  now?: () => number;
};

// Polls the frame buffer on a fixed cadence and hands each new frame to the display.
// It reads the buffer but never clears it; the session owns that.
export class RenderLoop {
  private readonly frameBuffer: FrameBuffer;
  private readonly display: FrameDisplay;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private firstFrameLogged = false;
  private displayed = 0;
  private rateWindowStart = 0;
  private rateWindowFrames = 0;

  constructor(options: RenderLoopOptions) {
    this.frameBuffer = options.frameBuffer;
    this.display = options.display;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_DISPLAY_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  displayedFrames(): number {
    return this.displayed;
  }

  // Runs until the signal aborts; the cancellation check happens once per tick.
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.tick();

      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
    }

    this.logger.debug(`Render loop stopped after ${this.displayed} frames.`);
  }

  // One poll: take whatever is pending and show it.
  tick(): boolean {
    const frame = this.frameBuffer.tryTake();
    if (!frame) {
      return false;
    }

    try {
      this.display.show(frame);
    } catch (error) {
      this.logger.warn(`Display rejected frame: ${describeError(error)}`);
      return false;
    }

    this.displayed += 1;
    if (!this.firstFrameLogged) {
      this.logger.info("Displaying first frame.");
      this.firstFrameLogged = true;
    }
    this.measureRate();
    return true;
  }

  private measureRate(): void {
    const now = this.now();
    if (this.rateWindowFrames === 0) {
      this.rateWindowStart = now;
    }
    this.rateWindowFrames += 1;

    const elapsedMs = now - this.rateWindowStart;
    if (elapsedMs >= RATE_WINDOW_MS) {
      const fps = (this.rateWindowFrames * 1000) / elapsedMs;
      this.logger.debug(`Display frame rate ${fps.toFixed(2)}fps.`);
      this.rateWindowFrames = 0;
    }
  }
}
