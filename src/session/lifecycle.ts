import type { SessionState } from "./types.js";

const ALLOWED_TRANSITIONS: Record<SessionState, ReadonlySet<SessionState>> = {
  new: new Set(["new", "running", "interrupted", "closed"]),
  running: new Set(["running", "interrupted", "closed"]),
  interrupted: new Set(["interrupted"]),
  closed: new Set(["closed"]),
};

export function isTransitionAllowed(from: SessionState, to: SessionState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

export function isTerminal(state: SessionState): boolean {
  return state === "interrupted" || state === "closed";
}
