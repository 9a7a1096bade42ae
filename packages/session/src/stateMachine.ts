export type SessionState =
  | "negotiating"
  | "connecting"
  | "active"
  | "closing"
  | "closed"
  | "failed";

export type SessionEvent = "negotiated" | "connected" | "close" | "fail" | "released";

// Transition table for one peer session. Unlisted events leave the state unchanged.
export function transitionSession(current: SessionState, event: SessionEvent): SessionState {
  switch (current) {
    case "negotiating":
      if (event === "negotiated") {
        return "connecting";
      }
      if (event === "close") {
        return "closing";
      }
      if (event === "fail") {
        return "failed";
      }
      return current;
    case "connecting":
      if (event === "connected") {
        return "active";
      }
      if (event === "close") {
        return "closing";
      }
      if (event === "fail") {
        return "failed";
      }
      return current;
    case "active":
      if (event === "close") {
        return "closing";
      }
      if (event === "fail") {
        return "failed";
      }
      return current;
    case "closing":
    case "failed":
      if (event === "released") {
        return "closed";
      }
      return current;
    case "closed":
      return current;
    default:
      return current;
  }
}

// Media start/stop calls are only issued while the session has not begun shutting down.
export function acceptsMedia(state: SessionState): boolean {
  return state === "negotiating" || state === "connecting" || state === "active";
}
