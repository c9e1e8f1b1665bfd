import type { SessionHandler } from "../session/types.js";

/** Sends every payload straight back to the session it came from. */
export function createEchoHandler(): SessionHandler {
  return {
    message(ctx, payload) {
      ctx.send(payload);
    },
  };
}
