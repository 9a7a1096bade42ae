import fs from "node:fs";
import path from "node:path";
import { IceServerListSchema } from "@peerstream/protocol";
import type { IceServer } from "@peerstream/protocol";

export type IceResolutionOptions = {
  env: NodeJS.ProcessEnv;
  // Directory that may hold a config.json with an "iceServers" array.
  configDir?: string;
};

export class IceConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IceConfigError";
  }
}

function parseCsv(value?: string) {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseJson(raw: string, origin: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new IceConfigError(`${origin} is not valid JSON`, { cause: error });
  }
}

function parseServerList(json: unknown, origin: string): IceServer[] {
  const parsed = IceServerListSchema.safeParse(json);
  if (!parsed.success) {
    throw new IceConfigError(`${origin} is not a list of ICE servers: ${parsed.error.message}`);
  }
  return parsed.data;
}

function readConfigFile(configDir: string): IceServer[] | null {
  const configPath = path.join(configDir, "config.json");
  if (!fs.existsSync(configPath)) {
    return null;
  }

  const json = parseJson(fs.readFileSync(configPath, "utf8"), configPath);
  if (typeof json !== "object" || json === null || !("iceServers" in json)) {
    return null;
  }
  return parseServerList(json.iceServers, `${configPath} iceServers`);
}

// Resolve ICE servers; the first configured source wins. With none, only host candidates are used.
export function resolveIceServers({ env, configDir }: IceResolutionOptions): IceServer[] {
  if (env.PEERSTREAM_ICE_JSON) {
    const parsed = parseServerList(
      parseJson(env.PEERSTREAM_ICE_JSON, "PEERSTREAM_ICE_JSON"),
      "PEERSTREAM_ICE_JSON",
    );
    if (parsed.length > 0) {
      return parsed;
    }
  }

  const stunUrls = parseCsv(env.PEERSTREAM_STUN_URLS);
  const turnUrls = parseCsv(env.PEERSTREAM_TURN_URLS);
  if (stunUrls.length > 0 || turnUrls.length > 0) {
    const servers: IceServer[] = [];
    if (stunUrls.length > 0) {
      servers.push({ urls: stunUrls });
    }

    if (turnUrls.length > 0) {
      servers.push({
        urls: turnUrls,
        username: env.PEERSTREAM_TURN_USERNAME,
        credential: env.PEERSTREAM_TURN_CREDENTIAL,
      });
    }

    return servers;
  }

  if (configDir) {
    const fromFile = readConfigFile(configDir);
    if (fromFile && fromFile.length > 0) {
      return fromFile;
    }
  }

  return [];
}
