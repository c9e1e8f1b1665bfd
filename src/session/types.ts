import type { Frame } from "../protocol/index.js";

export type SessionId = string;

export type SessionState = "new" | "running" | "interrupted" | "closed";

/** What the registry pushes into a bound transport. */
export type ChannelItem = { kind: "frame"; frame: Frame } | { kind: "ready" };

/**
 * Transport-side endpoint of an attachment. `deliver` returns false when the
 * transport can no longer take items; the registry then buffers the frame.
 */
export interface TransportSink {
  readonly id: string;
  deliver(item: ChannelItem): boolean;
}

/** Copy of a record handed to a transport for the length of one attachment. */
export interface RecordSnapshot {
  sid: SessionId;
  state: SessionState;
  buffer: Frame[];
  attachment: number;
  createdAt: number;
  updatedAt: number;
}

/** Read-only view of a registry entry. */
export interface SessionInfo {
  sid: SessionId;
  state: SessionState;
  attached: boolean;
  buffered: number;
  createdAt: number;
  updatedAt: number;
}

/** Handle a session handler uses to talk back to its client. */
export interface SessionContext {
  readonly sid: SessionId;
  readonly state: SessionState;
  send(payload: string): void;
  sendBatch(payloads: readonly string[]): void;
  /** Close the session with "go away"; buffered frames before it are still delivered. */
  close(): void;
}

/** Application logic behind a session. One instance per session. */
export interface SessionHandler {
  message(ctx: SessionContext, payload: string): void | Promise<void>;
  /** First attachment of a new session. */
  opened?(ctx: SessionContext): void | Promise<void>;
  /** Every later attachment. */
  acquired?(ctx: SessionContext): void | Promise<void>;
  /** Detached while still running. */
  released?(ctx: SessionContext): void | Promise<void>;
  /** Reached a terminal state. Called once. */
  closed?(ctx: SessionContext): void | Promise<void>;
}

export type SessionHandlerFactory<H extends SessionHandler = SessionHandler> = (sid: SessionId) => H;

/** Operations a transport performs against the registry. */
export interface Registry {
  acquire(sid: SessionId, sink: TransportSink): Promise<RecordSnapshot>;
  release(record: RecordSnapshot): void;
  broadcast(frame: Frame): void;
  deliver(sid: SessionId, payload: string): void;
}
