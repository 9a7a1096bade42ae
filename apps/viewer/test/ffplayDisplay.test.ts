import { describe, it } from "node:test";
import assert from "node:assert";
import { createLogger } from "@peerstream/session";
import type { PixelFormat, RawFrame } from "@peerstream/session";
import { FfplayDisplay, buildPlayerArgs } from "../src/ffplayDisplay";
import { FakeProcess, nextTurn, recordSpawns } from "./fakeProcess";

function frame(width: number, height: number, fill = 0, pixelFormat: PixelFormat = "bgr24"): RawFrame {
  return { width, height, pixelFormat, data: Buffer.alloc(width * height * 3, fill) };
}

function setup(create?: () => FakeProcess) {
  const { spawned, spawnProcess } = recordSpawns(create);
  const display = new FfplayDisplay({
    ffplayPath: "/opt/ffplay",
    logger: createLogger("test", "error"),
    title: "test-window",
    spawnProcess,
  });
  const closedReasons: string[] = [];
  display.onClosed = (reason) => closedReasons.push(reason);
  return { display, spawned, closedReasons };
}

describe("FfplayDisplay", () => {
  it("should describe the raw frame to ffplay", () => {
    assert.deepStrictEqual(buildPlayerArgs(frame(640, 480), "test-window").slice(-8), [
      "-f",
      "rawvideo",
      "-pixel_format",
      "bgr24",
      "-video_size",
      "640x480",
      "-i",
      "pipe:0",
    ]);
    assert.ok(buildPlayerArgs(frame(2, 2, 0, "i420"), "test-window").includes("yuv420p"));
  });

  it("should open the window on the first frame and write frames to it", async () => {
    const { display, spawned } = setup();
    assert.strictEqual(spawned.length, 0);

    display.show(frame(2, 1, 7));
    const written = spawned[0].child.captureStdin();
    display.show(frame(2, 1, 8));
    await nextTurn();

    assert.strictEqual(spawned.length, 1);
    assert.strictEqual(spawned[0].command, "/opt/ffplay");
    assert.deepStrictEqual([...written()], [7, 7, 7, 7, 7, 7, 8, 8, 8, 8, 8, 8]);
    assert.strictEqual(display.writtenFrames(), 2);
  });

  it("should drop a frame while the pipe is full", () => {
    const { display } = setup(() => new FakeProcess(4));

    display.show(frame(2, 1));
    display.show(frame(2, 1));

    assert.strictEqual(display.writtenFrames(), 1);
    assert.strictEqual(display.droppedFrames(), 1);
  });

  it("should restart the player when the frame size changes", async () => {
    const { display, spawned, closedReasons } = setup();

    display.show(frame(2, 1));
    display.show(frame(4, 2));
    await nextTurn();

    assert.strictEqual(spawned.length, 2);
    assert.deepStrictEqual(spawned[0].child.signals, ["SIGTERM"]);
    assert.ok(spawned[1].args.includes("4x2"));
    assert.deepStrictEqual(closedReasons, []);
  });

  it("should report a window the user closed and stop showing frames", () => {
    const { display, spawned, closedReasons } = setup();
    display.show(frame(2, 1));

    spawned[0].child.emit("close", 0, null);
    display.show(frame(2, 1));

    assert.deepStrictEqual(closedReasons, ["ffplay exited with code 0"]);
    assert.strictEqual(spawned.length, 1);
  });

  it("should close the window without reporting it", async () => {
    const { display, spawned, closedReasons } = setup();
    display.show(frame(2, 1));

    await display.close();

    assert.deepStrictEqual(spawned[0].child.signals, ["SIGTERM"]);
    assert.deepStrictEqual(closedReasons, []);
  });
});
