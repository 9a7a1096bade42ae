import { describe, it } from "node:test";
import assert from "node:assert";
import { MediaUnavailableError } from "../src/errors";
import { mediaPathCandidates, resolveMediaPath } from "../src/mediaPath";

const LAYOUT = { cwd: "/work", codeDir: "/srv/app/packages/server/src" };

describe("resolveMediaPath", () => {
  it("should probe the working directory, the code directory and three parents", () => {
    assert.deepStrictEqual(mediaPathCandidates({ env: {}, ...LAYOUT }), [
      "/work/sample.mp4",
      "/srv/app/packages/server/src/sample.mp4",
      "/srv/app/packages/server/sample.mp4",
      "/srv/app/packages/sample.mp4",
      "/srv/app/sample.mp4",
    ]);
  });

  it("should return the first candidate that exists", () => {
    const found = resolveMediaPath({
      env: { PEERSTREAM_FILE: "media/clip.webm" },
      ...LAYOUT,
      exists: (candidate) =>
        candidate === "/srv/app/media/clip.webm" || candidate === "/srv/app/packages/media/clip.webm",
    });

    assert.strictEqual(found, "/srv/app/packages/media/clip.webm");
  });

  it("should use an absolute path as given", () => {
    const found = resolveMediaPath({
      env: { PEERSTREAM_FILE: "/data/clip.mp4" },
      ...LAYOUT,
      exists: (candidate) => candidate === "/data/clip.mp4",
    });

    assert.strictEqual(found, "/data/clip.mp4");
  });

  it("should report a missing file as unavailable media", () => {
    assert.throws(
      () =>
        resolveMediaPath({
          env: { PEERSTREAM_FILE: "/data/missing.mp4" },
          ...LAYOUT,
          exists: () => false,
        }),
      (error: unknown) => {
        assert.ok(error instanceof MediaUnavailableError);
        assert.strictEqual(error.message, "Media file not found. Looked in: /data/missing.mp4");
        return true;
      },
    );
  });
});
