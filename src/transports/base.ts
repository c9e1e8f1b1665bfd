import {
  closeCodeFor,
  closeFrame,
  encodeClose,
  isCloseFrame,
  openFrame,
  type CloseCode,
  type Frame,
} from "../protocol/index.js";
import { SessionBusyError, errorMessage } from "../shared/errors.js";
import { genId } from "../shared/ids.js";
import { componentLogger, type Logger } from "../shared/logging.js";
import { SessionRecord } from "../session/record.js";
import type {
  ChannelItem,
  RecordSnapshot,
  Registry,
  SessionId,
  TransportSink,
} from "../session/types.js";

export type SendResult = "continue" | "stop";

/**
 * How a connection ended, as seen on release:
 * - detach: connection still usable, session stays running
 * - graceful: peer or application closed cleanly, session closes
 * - abrupt: connection dropped or broke protocol, session is interrupted
 */
export type Disconnect = "detach" | "graceful" | "abrupt";

type Phase = "idle" | "pending" | "attached" | "released";

export interface TransportOptions {
  registry: Registry;
  sid: SessionId;
  logger?: Logger;
}

/**
 * Abstract base for transports (WebSocket, ...). One instance per physical
 * connection. Subclasses implement the wire: encode, write, connectivity and
 * teardown. The base runs the acquire / ready / release handshake.
 */
export abstract class Transport implements TransportSink {
  readonly id = genId("conn");
  readonly sid: SessionId;
  protected readonly registry: Registry;
  protected readonly log: Logger;

  private phase: Phase = "idle";
  private record: SessionRecord | undefined;
  private attachment = 0;
  private ready = false;
  private releaseRequested = false;
  private pendingRelease: { disconnect?: Disconnect } | undefined;
  private readonly inbox: ChannelItem[] = [];
  private readonly deferred: Array<() => void> = [];

  constructor(options: TransportOptions) {
    this.registry = options.registry;
    this.sid = options.sid;
    this.log = options.logger ?? componentLogger("transport", { sid: options.sid, conn: this.id });
  }

  /** Wire text for a frame, or undefined when the frame has no form on this wire. */
  protected abstract encode(frame: Frame): string | undefined;

  /** Write wire data. Returns false when the connection can no longer take it. */
  protected abstract write(data: string): boolean;

  /** Close the physical connection if it is still open. */
  protected abstract disconnect(): void;

  abstract isConnected(): boolean;

  /** Acquire the session. Resolves once the attachment is set up or refused. */
  async init(): Promise<void> {
    if (this.phase !== "idle") return;
    this.phase = "pending";

    let snapshot: RecordSnapshot;
    try {
      snapshot = await this.registry.acquire(this.sid, this);
    } catch (err) {
      this.refuse(err);
      return;
    }
    this.attach(snapshot);
  }

  /** Registry side of the attachment. */
  deliver(item: ChannelItem): boolean {
    if (this.phase === "pending") {
      this.inbox.push(item);
      return true;
    }
    if (this.phase !== "attached") return false;
    this.handle(item);
    return true;
  }

  /** Transmit a frame, or keep it in the record until the transport is ready and connected. */
  send(frame: Frame): void {
    const record = this.record;
    if (!record) {
      this.log.debug({ frame: frame.type }, "send without a session record ignored");
      return;
    }
    if (!this.ready || !this.isConnected()) {
      record.add(frame);
      return;
    }
    if (this.transmit(frame, record) === "stop") this.release();
  }

  /**
   * Give the record back to the registry and tear the connection down. Runs
   * once; later calls do nothing. Without a disconnect kind (given now or
   * while the acquire was pending) the connection decides: still open means
   * detach, otherwise abrupt.
   */
  release(disconnect?: Disconnect): void {
    if (this.phase === "pending") {
      this.pendingRelease ??= { disconnect };
      return;
    }
    if (this.phase === "released") return;
    this.phase = "released";
    this.ready = false;
    this.inbox.length = 0;
    this.deferred.length = 0;

    const record = this.record;
    this.record = undefined;
    if (record) {
      const kind =
        disconnect ?? this.pendingRelease?.disconnect ?? (this.isConnected() ? "detach" : "abrupt");
      if (kind === "graceful") record.close();
      else if (kind === "abrupt") record.interrupt();
      this.log.debug({ disconnect: kind, state: record.state, buffered: record.buffer.length }, "releasing session");
      this.registry.release(record.toSnapshot(this.attachment));
    }
    this.disconnect();
  }

  get isReady(): boolean {
    return this.ready;
  }

  get isReleased(): boolean {
    return this.phase === "released";
  }

  /** Run `fn` now when attached, after attachment while pending, never once released. */
  protected whenAttached(fn: () => void): void {
    if (this.phase === "attached") fn();
    else if (this.phase === "pending" || this.phase === "idle") this.deferred.push(fn);
    else this.log.debug("inbound data after release dropped");
  }

  /** Write a close frame straight to the wire, leaving the record's state alone. */
  protected writeClose(code: CloseCode): boolean {
    return this.write(encodeClose(code));
  }

  private refuse(err: unknown): void {
    this.phase = "released";
    this.inbox.length = 0;
    this.deferred.length = 0;
    const code = err instanceof SessionBusyError ? closeCodeFor("AlreadyOpen") : closeCodeFor("InternalError");
    this.log.warn({ code: code.code, err: errorMessage(err) }, "session acquire refused");
    this.writeClose(code);
    this.disconnect();
  }

  private attach(snapshot: RecordSnapshot): void {
    const record = SessionRecord.fromSnapshot(snapshot);
    this.record = record;
    this.attachment = snapshot.attachment;
    this.phase = "attached";

    switch (record.state) {
      case "new":
        record.start();
        if (this.transmit(openFrame(), record) === "stop" || this.flush(record) === "stop") {
          this.releaseRequested = true;
        }
        break;
      case "running":
        if (this.flush(record) === "stop") this.releaseRequested = true;
        break;
      case "interrupted":
        this.transmit(closeFrame("Interrupted"), record);
        this.release();
        return;
      case "closed":
        // frames queued ahead of an application close still go out, the close among them
        if (this.flush(record) === "continue") this.transmit(closeFrame("GoAway"), record);
        this.release();
        return;
    }

    for (const item of this.inbox.splice(0)) {
      if (this.phase !== "attached") break;
      this.handle(item);
    }
    for (const fn of this.deferred.splice(0)) {
      if (this.phase !== "attached") break;
      fn();
    }
    if (this.pendingRelease && this.phase === "attached") {
      this.release(this.pendingRelease.disconnect);
    }
  }

  private handle(item: ChannelItem): void {
    if (item.kind === "frame") {
      this.send(item.frame);
      return;
    }
    const record = this.record;
    if (!record) return;
    if (this.flush(record) === "stop") this.releaseRequested = true;
    if (this.releaseRequested) this.release();
    else this.ready = true;
  }

  /** Write the backlog oldest first. A frame popped and not written is not put back. */
  private flush(record: SessionRecord): SendResult {
    while (record.buffer.length > 0) {
      if (!this.isConnected()) return "stop";
      const frame = record.take();
      if (frame === undefined) break;
      if (this.transmit(frame, record) === "stop") return "stop";
    }
    return "continue";
  }

  private transmit(frame: Frame, record: SessionRecord): SendResult {
    const closing = isCloseFrame(frame);
    if (closing) record.close();
    const data = this.encode(frame);
    if (data === undefined) return "continue";
    if (!this.write(data)) return "stop";
    return closing ? "stop" : "continue";
  }
}
