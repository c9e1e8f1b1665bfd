import { cloneFrame, type Frame } from "../protocol/index.js";
import { isTerminal, isTransitionAllowed } from "./lifecycle.js";
import type { RecordSnapshot, SessionId, SessionState } from "./types.js";

/**
 * Per-session state: lifecycle plus the FIFO of frames not yet written to
 * any connection. Terminal states are sticky.
 */
export class SessionRecord {
  state: SessionState = "new";
  buffer: Frame[] = [];
  createdAt: number;
  updatedAt: number;

  constructor(readonly sid: SessionId, now = Date.now()) {
    this.createdAt = now;
    this.updatedAt = now;
  }

  static fromSnapshot(snapshot: RecordSnapshot): SessionRecord {
    const record = new SessionRecord(snapshot.sid, snapshot.createdAt);
    record.state = snapshot.state;
    record.buffer = snapshot.buffer.map(cloneFrame);
    record.updatedAt = snapshot.updatedAt;
    return record;
  }

  toSnapshot(attachment: number): RecordSnapshot {
    return {
      sid: this.sid,
      state: this.state,
      buffer: this.buffer.map(cloneFrame),
      attachment,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  add(frame: Frame): void {
    this.buffer.push(frame);
    this.touch();
  }

  /** Pop the oldest buffered frame. */
  take(): Frame | undefined {
    return this.buffer.shift();
  }

  /** Empty the buffer and return what it held, oldest first. */
  drain(): Frame[] {
    const frames = this.buffer;
    this.buffer = [];
    return frames;
  }

  /** Put frames back at the front of the buffer, ahead of anything queued since. */
  prepend(frames: readonly Frame[]): void {
    if (frames.length === 0) return;
    this.buffer = [...frames, ...this.buffer];
    this.touch();
  }

  start(): void {
    if (this.state === "new") this.transition("running");
  }

  close(): void {
    if (!this.isTerminal()) this.transition("closed");
  }

  interrupt(): void {
    if (!this.isTerminal()) this.transition("interrupted");
  }

  /** Move to `to`; returns false, leaving the state alone, when the lifecycle forbids it. */
  transition(to: SessionState): boolean {
    if (!isTransitionAllowed(this.state, to)) return false;
    this.state = to;
    this.touch();
    return true;
  }

  isTerminal(): boolean {
    return isTerminal(this.state);
  }

  touch(now = Date.now()): void {
    this.updatedAt = now;
  }
}
