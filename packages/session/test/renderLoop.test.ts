import { describe, it } from "node:test";
import assert from "node:assert";
import { FrameBuffer } from "../src/frameBuffer";
import { RenderLoop } from "../src/renderLoop";
import { FakeDisplay, createRecordingLogger, makeRawFrame } from "./fakes";

function setup(now?: () => number) {
  const frameBuffer = new FrameBuffer();
  const display = new FakeDisplay();
  const logger = createRecordingLogger();
  const loop = new RenderLoop({ frameBuffer, display, logger, intervalMs: 1, now });
  return { frameBuffer, display, logger, loop };
}

describe("RenderLoop", () => {
  it("should show nothing when no frame is pending", () => {
    const { loop, display } = setup();

    assert.strictEqual(loop.tick(), false);
    assert.strictEqual(display.shown.length, 0);
  });

  it("should show the latest frame and take it from the buffer", () => {
    const { loop, display, frameBuffer } = setup();
    frameBuffer.publish(makeRawFrame(2, 2, 1));
    frameBuffer.publish(makeRawFrame(2, 2, 2));

    assert.strictEqual(loop.tick(), true);
    assert.strictEqual(loop.tick(), false);
    assert.strictEqual(display.shown.length, 1);
    assert.strictEqual(display.shown[0].data[0], 2);
    assert.strictEqual(loop.displayedFrames(), 1);
  });

  it("should log the first displayed frame once", () => {
    const { loop, frameBuffer, logger } = setup();
    frameBuffer.publish(makeRawFrame());
    loop.tick();
    frameBuffer.publish(makeRawFrame());
    loop.tick();

    assert.strictEqual(
      logger.entries.filter((entry) => entry.message === "Displaying first frame.").length,
      1,
    );
  });

  it("should keep going after the display throws", () => {
    const { loop, frameBuffer, display, logger } = setup();
    display.failNext = true;
    frameBuffer.publish(makeRawFrame(2, 2, 1));

    assert.strictEqual(loop.tick(), false);

    frameBuffer.publish(makeRawFrame(2, 2, 2));
    assert.strictEqual(loop.tick(), true);
    assert.strictEqual(display.shown.length, 1);
    assert.deepStrictEqual(
      logger.entries.filter((entry) => entry.level === "warn").map((entry) => entry.message),
      ["Display rejected frame: window gone"],
    );
  });

  it("should log the display rate every five seconds", () => {
    let clock = 0;
    const { loop, frameBuffer, logger } = setup(() => clock);
    frameBuffer.publish(makeRawFrame());
    loop.tick();
    clock = 5_000;
    frameBuffer.publish(makeRawFrame());
    loop.tick();

    assert.ok(logger.entries.some((entry) => entry.message === "Display frame rate 0.40fps."));
  });

  it("should return at once for an aborted signal", async () => {
    const { loop, frameBuffer, display } = setup();
    frameBuffer.publish(makeRawFrame());
    const controller = new AbortController();
    controller.abort();

    await loop.run(controller.signal);

    assert.strictEqual(display.shown.length, 0);
    assert.strictEqual(frameBuffer.hasPending(), true);
  });

  it("should poll until aborted without clearing the buffer", async () => {
    const { loop, frameBuffer, display } = setup();
    frameBuffer.publish(makeRawFrame(2, 2, 4));
    const controller = new AbortController();

    const running = loop.run(controller.signal);
    setTimeout(() => {
      frameBuffer.publish(makeRawFrame(2, 2, 5));
      setTimeout(() => controller.abort(), 30);
    }, 10);
    await running;

    assert.deepStrictEqual(
      display.shown.map((frame) => frame.data[0]),
      [4, 5],
    );
  });
});
