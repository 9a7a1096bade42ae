export * from "./types";
export * from "./errors";
export * from "./logger";
export * from "./stateMachine";
export * from "./frameBuffer";
export * from "./mediaBridge";
export * from "./sessionController";
export * from "./renderLoop";
export * from "./sdp/formats";
export * from "./rtp/depacketizer";
export * from "./rtp/vp8";
export * from "./rtp/h264";
export * from "./media/ivf";
export * from "./media/process";
export * from "./transport/weriftTransport";
export * from "./config/ice";
