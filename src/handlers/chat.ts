import { messageFrame, type Frame } from "../protocol/index.js";
import type { SessionContext, SessionHandler, SessionId } from "../session/types.js";

export type Broadcast = (frame: Frame) => void;

/**
 * One chat participant. Messages, joins and leaves are broadcast to every
 * running session, the sender included.
 */
export class ChatHandler implements SessionHandler {
  constructor(
    private readonly sid: SessionId,
    private readonly broadcast: Broadcast,
  ) {}

  opened(): void {
    this.broadcast(messageFrame(`${this.sid} joined`));
  }

  message(_ctx: SessionContext, payload: string): void {
    this.broadcast(messageFrame(`${this.sid}: ${payload}`));
  }

  closed(): void {
    this.broadcast(messageFrame(`${this.sid} left`));
  }
}

export function createChatHandler(sid: SessionId, broadcast: Broadcast): ChatHandler {
  return new ChatHandler(sid, broadcast);
}
