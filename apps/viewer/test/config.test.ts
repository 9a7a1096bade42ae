import { describe, it } from "node:test";
import assert from "node:assert";
import {
  DEFAULT_LISTEN_HOST,
  DEFAULT_OFFER_URL,
  DEFAULT_WS_URL,
  VIEWER_FORMATS,
  loadViewerConfig,
} from "../src/config";

describe("loadViewerConfig", () => {
  it("should fall back to defaults on an empty environment", () => {
    const config = loadViewerConfig({});

    assert.deepStrictEqual(config, {
      offerUrl: DEFAULT_OFFER_URL,
      wsUrl: DEFAULT_WS_URL,
      signaling: "http",
      listenHost: DEFAULT_LISTEN_HOST,
      listenPort: 8081,
      codec: "VP8",
      width: 640,
      height: 480,
      displayIntervalMs: 15,
      ffmpegPath: "ffmpeg",
      ffplayPath: "ffplay",
      iceServers: [],
    });
  });

  it("should read every viewer setting", () => {
    const config = loadViewerConfig({
      PEERSTREAM_OFFER_URL: "http://media.test:9000/offer",
      PEERSTREAM_WS_URL: "ws://media.test:9000/ws",
      PEERSTREAM_SIGNALING: "WS",
      PEERSTREAM_VIDEO_CODEC: "h264",
      PEERSTREAM_VIEW_WIDTH: "1280",
      PEERSTREAM_VIEW_HEIGHT: "720",
      PEERSTREAM_DISPLAY_INTERVAL_MS: "40",
      FFMPEG_PATH: "/opt/bin/ffmpeg",
      PEERSTREAM_FFPLAY_PATH: "/opt/bin/ffplay",
      PEERSTREAM_STUN_URLS: "stun:stun.test:3478",
    });

    assert.strictEqual(config.offerUrl, "http://media.test:9000/offer");
    assert.strictEqual(config.wsUrl, "ws://media.test:9000/ws");
    assert.strictEqual(config.signaling, "ws");
    assert.strictEqual(config.codec, "H264");
    assert.strictEqual(config.width, 1280);
    assert.strictEqual(config.height, 720);
    assert.strictEqual(config.displayIntervalMs, 40);
    assert.strictEqual(config.ffmpegPath, "/opt/bin/ffmpeg");
    assert.strictEqual(config.ffplayPath, "/opt/bin/ffplay");
    assert.deepStrictEqual(config.iceServers, [{ urls: ["stun:stun.test:3478"] }]);
  });

  it("should read the listening settings of the answering mode", () => {
    const config = loadViewerConfig({
      PEERSTREAM_SIGNALING: " ws-listen ",
      PEERSTREAM_LISTEN_HOST: "127.0.0.1",
      PEERSTREAM_LISTEN_PORT: "9091",
    });

    assert.strictEqual(config.signaling, "ws-listen");
    assert.strictEqual(config.listenHost, "127.0.0.1");
    assert.strictEqual(config.listenPort, 9091);
  });

  it("should treat an unknown signaling mode as http", () => {
    assert.strictEqual(loadViewerConfig({ PEERSTREAM_SIGNALING: "carrier-pigeon" }).signaling, "http");
  });

  it("should treat an unknown codec as VP8", () => {
    assert.strictEqual(loadViewerConfig({ PEERSTREAM_VIDEO_CODEC: "THEORA" }).codec, "VP8");
  });

  it("should ignore sizes that are not positive integers", () => {
    const config = loadViewerConfig({
      PEERSTREAM_VIEW_WIDTH: "-5",
      PEERSTREAM_VIEW_HEIGHT: "wide",
      PEERSTREAM_DISPLAY_INTERVAL_MS: "2.5",
    });

    assert.strictEqual(config.width, 640);
    assert.strictEqual(config.height, 480);
    assert.strictEqual(config.displayIntervalMs, 15);
  });

  it("should prefer the project ffmpeg variable", () => {
    const config = loadViewerConfig({
      PEERSTREAM_FFMPEG_PATH: "/a/ffmpeg",
      FFMPEG_PATH: "/b/ffmpeg",
    });

    assert.strictEqual(config.ffmpegPath, "/a/ffmpeg");
  });

  it("should map H264 to dynamic payload type 102", () => {
    assert.deepStrictEqual(VIEWER_FORMATS.H264, { codec: "H264", payloadType: 102, clockRate: 90000 });
  });
});
