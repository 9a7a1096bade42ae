import { describe, it } from "node:test";
import assert from "node:assert";
import { Vp8Depacketizer, packetizeVp8 } from "../src/rtp/vp8";

function frameOf(length: number, firstByte: number) {
  const frame = Buffer.alloc(length, 0x33);
  frame[0] = firstByte;
  return frame;
}

describe("packetizeVp8", () => {
  it("should split a frame under the payload limit", () => {
    const payloads = packetizeVp8(frameOf(2500, 0x10), 1200);

    assert.deepStrictEqual(
      payloads.map((payload) => payload.length),
      [1200, 1200, 103],
    );
    assert.deepStrictEqual(
      payloads.map((payload) => payload[0]),
      [0x10, 0x00, 0x00],
    );
    assert.strictEqual(payloads[0][1], 0x10);
  });

  it("should produce nothing for an empty frame", () => {
    assert.deepStrictEqual(packetizeVp8(Buffer.alloc(0)), []);
  });

  it("should refuse a payload limit with no room for data", () => {
    assert.throws(() => packetizeVp8(Buffer.from([1]), 1));
  });
});

describe("Vp8Depacketizer", () => {
  function feed(depacketizer: Vp8Depacketizer, payloads: Buffer[], firstSequence: number, timestamp: number) {
    return payloads.map((payload, index) =>
      depacketizer.push({
        sequenceNumber: (firstSequence + index) & 0xffff,
        timestamp,
        marker: index === payloads.length - 1,
        payload,
      }),
    );
  }

  it("should reassemble a packetized key frame", () => {
    const frame = frameOf(2500, 0x10);
    const results = feed(new Vp8Depacketizer(), packetizeVp8(frame), 65534, 9000);

    assert.strictEqual(results[0], null);
    assert.strictEqual(results[1], null);
    const last = results[2];
    assert.ok(last);
    assert.strictEqual(last.codec, "VP8");
    assert.strictEqual(last.timestamp, 9000);
    assert.strictEqual(last.keyframe, true);
    assert.ok(last.payload.equals(frame));
  });

  it("should flag inter frames", () => {
    const [frame] = feed(new Vp8Depacketizer(), packetizeVp8(frameOf(10, 0x01)), 1, 3000);

    assert.ok(frame);
    assert.strictEqual(frame.keyframe, false);
  });

  it("should drop a frame with a missing packet and recover on the next one", () => {
    const depacketizer = new Vp8Depacketizer();
    const payloads = packetizeVp8(frameOf(2500, 0x10));

    assert.strictEqual(depacketizer.push({ sequenceNumber: 10, timestamp: 1, marker: false, payload: payloads[0] }), null);
    assert.strictEqual(depacketizer.push({ sequenceNumber: 12, timestamp: 1, marker: true, payload: payloads[2] }), null);
    assert.strictEqual(depacketizer.droppedFrames(), 1);

    const [next] = feed(depacketizer, packetizeVp8(frameOf(5, 0x11)), 13, 2);
    assert.ok(next);
    assert.strictEqual(next.payload.length, 5);
  });

  it("should drop a frame whose first packet was lost", () => {
    const depacketizer = new Vp8Depacketizer();
    const payloads = packetizeVp8(frameOf(1500, 0x10));

    const result = depacketizer.push({ sequenceNumber: 2, timestamp: 1, marker: true, payload: payloads[1] });

    assert.strictEqual(result, null);
    assert.strictEqual(depacketizer.droppedFrames(), 1);
  });

  it("should skip extended descriptor fields", () => {
    // X=1, S=1; I=1 with a 15-bit picture id.
    const payload = Buffer.from([0x90, 0x80, 0x85, 0x12, 0xaa, 0xbb]);

    const frame = new Vp8Depacketizer().push({ sequenceNumber: 1, timestamp: 1, marker: true, payload });

    assert.ok(frame);
    assert.deepStrictEqual([...frame.payload], [0xaa, 0xbb]);
    assert.strictEqual(frame.keyframe, true);
  });
});
