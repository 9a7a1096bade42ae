import { describe, it } from "node:test";
import assert from "node:assert";
import { FrameBuffer } from "../src/frameBuffer";
import { makeRawFrame } from "./fakes";

describe("FrameBuffer", () => {
  it("should return null when nothing was published", () => {
    const buffer = new FrameBuffer();

    assert.strictEqual(buffer.tryTake(), null);
    assert.strictEqual(buffer.hasPending(), false);
  });

  it("should hand out only the latest of several published frames", () => {
    const buffer = new FrameBuffer();
    buffer.publish(makeRawFrame(2, 2, 1));
    buffer.publish(makeRawFrame(2, 2, 2));
    buffer.publish(makeRawFrame(2, 2, 3));

    const frame = buffer.tryTake();
    assert.ok(frame);
    assert.strictEqual(frame.data[0], 3);
    assert.strictEqual(buffer.tryTake(), null);
    assert.deepStrictEqual(buffer.stats(), { published: 3, overwritten: 2, taken: 1 });
  });

  it("should never return the same frame twice", () => {
    const buffer = new FrameBuffer();
    buffer.publish(makeRawFrame(2, 2, 7));

    assert.ok(buffer.tryTake());
    assert.strictEqual(buffer.tryTake(), null);

    buffer.publish(makeRawFrame(2, 2, 8));
    const next = buffer.tryTake();
    assert.ok(next);
    assert.strictEqual(next.data[0], 8);
  });

  it("should not count a publish after a take as an overwrite", () => {
    const buffer = new FrameBuffer();
    buffer.publish(makeRawFrame());
    buffer.tryTake();
    buffer.publish(makeRawFrame());

    assert.strictEqual(buffer.stats().overwritten, 0);
  });

  it("should drop the pending frame on clear", () => {
    const buffer = new FrameBuffer();
    buffer.publish(makeRawFrame());
    buffer.clear();

    assert.strictEqual(buffer.hasPending(), false);
    assert.strictEqual(buffer.tryTake(), null);
  });
});
