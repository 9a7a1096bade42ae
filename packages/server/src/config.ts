// Server configuration with explicit defaults.
export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_MEDIA_FILE = "sample.mp4";
export const HEALTH_PATH = "/health";
export const OFFER_PATH = "/offer";
export const WS_PATH = "/ws";
// Offers are a few kilobytes; anything near this size is not an SDP offer.
export const MAX_OFFER_BYTES = 256 * 1024;
