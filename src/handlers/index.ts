import type { SessionHandlerFactory } from "../session/types.js";
import { createChatHandler, type Broadcast } from "./chat.js";
import { createEchoHandler } from "./echo.js";

export const HANDLER_NAMES = ["echo", "chat"] as const;
export type HandlerName = (typeof HANDLER_NAMES)[number];

export function isHandlerName(s: string): s is HandlerName {
  return HANDLER_NAMES.some((name) => name === s);
}

/** Session handler factory for a built-in handler. */
export function createHandlerFactory(name: HandlerName, broadcast: Broadcast): SessionHandlerFactory {
  switch (name) {
    case "echo":
      return () => createEchoHandler();
    case "chat":
      return (sid) => createChatHandler(sid, broadcast);
  }
}

export { createEchoHandler } from "./echo.js";
export { ChatHandler, createChatHandler } from "./chat.js";
export type { Broadcast } from "./chat.js";
