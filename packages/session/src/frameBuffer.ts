import type { RawFrame } from "./types";

export type FrameBufferStats = {
  published: number;
  overwritten: number;
  taken: number;
};

// Single-slot, latest-wins hand-off between the decoder callback and the render loop.
// Every method runs to completion on the event loop, so publish and take never interleave.
export class FrameBuffer {
  private frame: RawFrame | null = null;
  private pending = false;
  private published = 0;
  private overwritten = 0;
  private taken = 0;

  // Replace whatever is stored; an unconsumed frame is discarded, never queued.
  publish(frame: RawFrame): void {
    if (this.pending) {
      this.overwritten += 1;
    }
    this.frame = frame;
    this.pending = true;
    this.published += 1;
  }

  // Move the pending frame out, or return null when nothing new arrived since the last take.
  tryTake(): RawFrame | null {
    if (!this.pending || !this.frame) {
      return null;
    }

    const frame = this.frame;
    this.frame = null;
    this.pending = false;
    this.taken += 1;
    return frame;
  }

  clear(): void {
    this.frame = null;
    this.pending = false;
  }

  hasPending(): boolean {
    return this.pending;
  }

  stats(): FrameBufferStats {
    return { published: this.published, overwritten: this.overwritten, taken: this.taken };
  }
}
