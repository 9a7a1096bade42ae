// IVF container: a 32-byte file header followed by frames, each with a 12-byte header
// (little-endian payload size and 64-bit presentation timestamp).
export const IVF_FILE_HEADER_BYTES = 32;
export const IVF_FRAME_HEADER_BYTES = 12;
const IVF_SIGNATURE = "DKIF";

export const RTP_VIDEO_CLOCK_RATE = 90_000;
// One frame at 30 fps; used when there is no previous timestamp to measure against.
export const DEFAULT_FRAME_DURATION_RTP_UNITS = 3_000;

export type IvfHeader = {
  fourcc: string;
  width: number;
  height: number;
  // Seconds per timestamp tick is numerator / denominator.
  timebaseNumerator: number;
  timebaseDenominator: number;
  frameCount: number;
};

export type IvfFrame = {
  pts: number;
  payload: Buffer;
};

export class IvfFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IvfFormatError";
  }
}

// Incremental IVF parser for a byte stream arriving in arbitrary chunks.
export class IvfReader {
  private pending: Buffer = Buffer.alloc(0);
  private header: IvfHeader | null = null;

  getHeader(): IvfHeader | null {
    return this.header;
  }

  push(chunk: Buffer): IvfFrame[] {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    if (!this.header) {
      if (this.pending.length < IVF_FILE_HEADER_BYTES) {
        return [];
      }
      const header = parseIvfHeader(this.pending);
      const headerLength = Math.max(this.pending.readUInt16LE(6), IVF_FILE_HEADER_BYTES);
      if (this.pending.length < headerLength) {
        return [];
      }
      this.header = header;
      this.pending = this.pending.subarray(headerLength);
    }

    const frames: IvfFrame[] = [];
    while (this.pending.length >= IVF_FRAME_HEADER_BYTES) {
      const size = this.pending.readUInt32LE(0);
      const end = IVF_FRAME_HEADER_BYTES + size;
      if (this.pending.length < end) {
        break;
      }
      frames.push({
        pts: Number(this.pending.readBigUInt64LE(4)),
        payload: Buffer.from(this.pending.subarray(IVF_FRAME_HEADER_BYTES, end)),
      });
      this.pending = this.pending.subarray(end);
    }
    return frames;
  }

  // Bytes received that do not yet form a complete frame.
  bufferedBytes(): number {
    return this.pending.length;
  }
}

export function parseIvfHeader(buffer: Buffer): IvfHeader {
  if (buffer.length < IVF_FILE_HEADER_BYTES) {
    throw new IvfFormatError(
      `IVF header needs ${IVF_FILE_HEADER_BYTES} bytes, got ${buffer.length}`,
    );
  }
  const signature = buffer.toString("ascii", 0, 4);
  if (signature !== IVF_SIGNATURE) {
    throw new IvfFormatError(`Not an IVF stream (signature "${signature}")`);
  }

  return {
    fourcc: buffer.toString("ascii", 8, 12),
    width: buffer.readUInt16LE(12),
    height: buffer.readUInt16LE(14),
    timebaseDenominator: buffer.readUInt32LE(16),
    timebaseNumerator: buffer.readUInt32LE(20),
    frameCount: buffer.readUInt32LE(24),
  };
}

export function writeIvfHeader(header: IvfHeader): Buffer {
  const buffer = Buffer.alloc(IVF_FILE_HEADER_BYTES);
  buffer.write(IVF_SIGNATURE, 0, "ascii");
  buffer.writeUInt16LE(0, 4);
  buffer.writeUInt16LE(IVF_FILE_HEADER_BYTES, 6);
  buffer.write(header.fourcc.padEnd(4, " ").slice(0, 4), 8, "ascii");
  buffer.writeUInt16LE(header.width, 12);
  buffer.writeUInt16LE(header.height, 14);
  buffer.writeUInt32LE(header.timebaseDenominator, 16);
  buffer.writeUInt32LE(header.timebaseNumerator, 20);
  buffer.writeUInt32LE(header.frameCount, 24);
  return buffer;
}

export function writeIvfFrame(payload: Buffer, pts: number): Buffer {
  const header = Buffer.alloc(IVF_FRAME_HEADER_BYTES);
  header.writeUInt32LE(payload.length, 0);
  header.writeBigUInt64LE(BigInt(pts), 4);
  return Buffer.concat([header, payload]);
}

// Converts IVF presentation timestamps into per-frame durations on the RTP video clock.
export class IvfFrameClock {
  private readonly header: IvfHeader;
  private readonly clockRate: number;
  private previousPts: number | null = null;

  constructor(header: IvfHeader, clockRate = RTP_VIDEO_CLOCK_RATE) {
    this.header = header;
    this.clockRate = clockRate;
  }

  durationOf(frame: IvfFrame): number {
    const previous = this.previousPts;
    this.previousPts = frame.pts;
    if (previous === null || frame.pts <= previous || this.header.timebaseDenominator === 0) {
      return DEFAULT_FRAME_DURATION_RTP_UNITS;
    }

    const ticks = frame.pts - previous;
    return Math.round(
      (ticks * this.clockRate * this.header.timebaseNumerator) / this.header.timebaseDenominator,
    );
  }
}
