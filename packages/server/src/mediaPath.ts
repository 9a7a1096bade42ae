import fs from "node:fs";
import path from "node:path";
import { DEFAULT_MEDIA_FILE } from "./config";
import { MediaUnavailableError } from "./errors";

export type MediaPathOptions = {
  env: NodeJS.ProcessEnv;
  cwd: string;
  // Directory of the running code; the file may also sit beside it or a few levels up.
  codeDir: string;
  exists?: (candidate: string) => boolean;
};

const PARENT_LEVELS = 3;

function isFile(candidate: string) {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function mediaPathCandidates({ env, cwd, codeDir }: MediaPathOptions): string[] {
  const configured = env.PEERSTREAM_FILE?.trim() || DEFAULT_MEDIA_FILE;
  if (path.isAbsolute(configured)) {
    return [configured];
  }

  const roots = [cwd, codeDir];
  for (let level = 1; level <= PARENT_LEVELS; level += 1) {
    roots.push(path.resolve(codeDir, ...Array<string>(level).fill("..")));
  }
  return [...new Set(roots.map((root) => path.resolve(root, configured)))];
}

// Find the media file to stream; absolute paths must exist as given.
export function resolveMediaPath(options: MediaPathOptions): string {
  const exists = options.exists ?? isFile;
  const candidates = mediaPathCandidates(options);
  const found = candidates.find((candidate) => exists(candidate));
  if (!found) {
    throw new MediaUnavailableError(`Media file not found. Looked in: ${candidates.join(", ")}`);
  }
  return found;
}
