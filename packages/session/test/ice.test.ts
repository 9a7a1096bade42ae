import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { IceConfigError, resolveIceServers } from "../src/config/ice";

describe("resolveIceServers", () => {
  let configDir: string;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), "peerstream-ice-"));
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  function writeConfig(contents: unknown) {
    fs.writeFileSync(path.join(configDir, "config.json"), JSON.stringify(contents));
  }

  it("should prefer the JSON variable over everything else", () => {
    writeConfig({ iceServers: [{ urls: "stun:file.test:3478" }] });

    const servers = resolveIceServers({
      env: {
        PEERSTREAM_ICE_JSON: JSON.stringify([{ urls: "stun:json.test:3478" }]),
        PEERSTREAM_STUN_URLS: "stun:csv.test:3478",
      },
      configDir,
    });

    assert.deepStrictEqual(servers, [{ urls: "stun:json.test:3478" }]);
  });

  it("should reject a malformed JSON variable", () => {
    assert.throws(
      () => resolveIceServers({ env: { PEERSTREAM_ICE_JSON: "[{" } }),
      IceConfigError,
    );
    assert.throws(
      () => resolveIceServers({ env: { PEERSTREAM_ICE_JSON: JSON.stringify([{ url: "x" }]) } }),
      IceConfigError,
    );
  });

  it("should build servers from the URL lists", () => {
    const servers = resolveIceServers({
      env: {
        PEERSTREAM_ICE_JSON: "[]",
        PEERSTREAM_STUN_URLS: "stun:a.test:3478, stun:b.test:3478",
        PEERSTREAM_TURN_URLS: "turn:c.test:3478",
        PEERSTREAM_TURN_USERNAME: "test-user",
        PEERSTREAM_TURN_CREDENTIAL: "test-secret",
      },
    });

    assert.deepStrictEqual(servers, [
      { urls: ["stun:a.test:3478", "stun:b.test:3478"] },
      { urls: ["turn:c.test:3478"], username: "test-user", credential: "test-secret" },
    ]);
  });

  it("should fall back to config.json", () => {
    writeConfig({ iceServers: [{ urls: ["stun:file.test:3478"] }] });

    assert.deepStrictEqual(resolveIceServers({ env: {}, configDir }), [
      { urls: ["stun:file.test:3478"] },
    ]);
  });

  it("should ignore a config.json without ICE servers", () => {
    writeConfig({ other: true });

    assert.deepStrictEqual(resolveIceServers({ env: {}, configDir }), []);
  });

  it("should use host candidates only when nothing is configured", () => {
    assert.deepStrictEqual(resolveIceServers({ env: {}, configDir }), []);
  });
});
