import {
  batchFrame,
  closeFrame,
  cloneFrame,
  isCloseFrame,
  messageFrame,
  type Frame,
} from "../protocol/index.js";
import { RegistryUnavailableError, SessionBusyError } from "../shared/errors.js";
import { componentLogger, type Logger } from "../shared/logging.js";
import { KeyedMailbox } from "../shared/mailbox.js";
import { SessionRecord } from "./record.js";
import type {
  Registry,
  RecordSnapshot,
  SessionContext,
  SessionHandler,
  SessionHandlerFactory,
  SessionId,
  SessionInfo,
  TransportSink,
} from "./types.js";

type HookName = "opened" | "acquired" | "released" | "closed";

interface Entry<H extends SessionHandler> {
  record: SessionRecord;
  handler: H;
  ctx: SessionContext;
  sink: TransportSink | undefined;
  attachment: number;
  closedNotified: boolean;
}

export interface SessionRegistryOptions<H extends SessionHandler> {
  createHandler: SessionHandlerFactory<H>;
  logger?: Logger;
  now?: () => number;
}

/**
 * Owner of every session record. All operations on one sid run through that
 * sid's mailbox, one at a time; different sids never wait on each other.
 */
export class SessionRegistry<H extends SessionHandler = SessionHandler> implements Registry {
  private readonly sessions = new Map<SessionId, Entry<H>>();
  private readonly mailbox: KeyedMailbox;
  private readonly createHandler: SessionHandlerFactory<H>;
  private readonly log: Logger;
  private readonly now: () => number;
  private nextAttachment = 1;
  private available = true;

  constructor(options: SessionRegistryOptions<H>) {
    this.createHandler = options.createHandler;
    this.log = options.logger ?? componentLogger("registry");
    this.now = options.now ?? Date.now;
    this.mailbox = new KeyedMailbox((sid, err) => {
      this.log.error({ sid, err }, "registry task failed");
    });
  }

  /**
   * Bind `sink` to the session, creating it on first use. The returned
   * snapshot carries the state before this acquire and the backlog; the sink
   * then receives live frames and, last of all for this call, a ready signal.
   *
   * A terminal session is never bound: every caller gets a snapshot with
   * attachment 0, so its release is ignored and concurrent acquires all see
   * the same terminal state. The first one takes whatever was buffered
   * ahead of the close.
   */
  acquire(sid: SessionId, sink: TransportSink): Promise<RecordSnapshot> {
    return this.mailbox.run<RecordSnapshot>(sid, async () => {
      if (!this.available) throw new RegistryUnavailableError();

      const entry = this.sessions.get(sid) ?? this.create(sid);
      if (entry.record.isTerminal()) {
        this.log.debug({ sid, sink: sink.id, state: entry.record.state }, "acquire of terminal session");
        const snapshot = entry.record.toSnapshot(0);
        entry.record.drain();
        sink.deliver({ kind: "ready" });
        return snapshot;
      }
      if (entry.sink) {
        this.log.debug({ sid, sink: sink.id, holder: entry.sink.id }, "session busy");
        throw new SessionBusyError(sid);
      }

      const attachment = this.nextAttachment++;
      entry.sink = sink;
      entry.attachment = attachment;

      const snapshot = entry.record.toSnapshot(attachment);
      entry.record.drain();

      if (entry.record.state === "new") {
        entry.record.start();
        this.log.debug({ sid, sink: sink.id }, "session opened");
        await this.runHook(entry, "opened");
      } else {
        this.log.debug({ sid, sink: sink.id, backlog: snapshot.buffer.length }, "session reattached");
        await this.runHook(entry, "acquired");
      }
      entry.record.touch(this.now());

      sink.deliver({ kind: "ready" });
      return snapshot;
    });
  }

  /** Hand a record back. Ignored unless it belongs to the current attachment. */
  release(snapshot: RecordSnapshot): void {
    this.mailbox.post(snapshot.sid, async () => {
      const entry = this.sessions.get(snapshot.sid);
      if (!entry || !entry.sink || entry.attachment !== snapshot.attachment) {
        this.log.debug({ sid: snapshot.sid, attachment: snapshot.attachment }, "stale release ignored");
        return;
      }

      entry.sink = undefined;
      entry.attachment = 0;
      if (!entry.record.isTerminal() && !entry.record.transition(snapshot.state)) {
        this.log.warn(
          { sid: snapshot.sid, from: entry.record.state, to: snapshot.state },
          "release with disallowed state transition; keeping registry state",
        );
      }
      entry.record.prepend(snapshot.buffer.map(cloneFrame));
      entry.record.touch(this.now());

      if (entry.record.isTerminal()) {
        this.log.debug({ sid: snapshot.sid, state: entry.record.state }, "session released (terminal)");
        await this.notifyClosed(entry);
      } else {
        this.log.debug({ sid: snapshot.sid, buffered: entry.record.buffer.length }, "session detached");
        await this.runHook(entry, "released");
      }
    });
  }

  /**
   * Fan a frame out to every running session: to its transport when attached,
   * else to its buffer. Heartbeats for a detached session are dropped.
   */
  broadcast(frame: Frame): void {
    for (const sid of this.sessions.keys()) {
      this.mailbox.post(sid, () => {
        const entry = this.sessions.get(sid);
        if (!entry || entry.record.state !== "running") return;
        this.route(entry, cloneFrame(frame));
      });
    }
  }

  /** Hand an inbound client payload to the session's handler. */
  deliver(sid: SessionId, payload: string): void {
    this.mailbox.post(sid, async () => {
      const entry = this.sessions.get(sid);
      if (!entry) {
        this.log.debug({ sid }, "message for unknown session dropped");
        return;
      }
      if (entry.record.isTerminal()) {
        this.log.debug({ sid, state: entry.record.state }, "message for terminal session dropped");
        return;
      }
      try {
        await entry.handler.message(entry.ctx, payload);
      } catch (err) {
        this.log.error({ sid, err }, "session handler failed on message");
      }
    });
  }

  /**
   * Route a frame to one session. Returns false for unknown or terminal
   * sessions. A close frame marks the session closed right away, even while
   * it still waits in the buffer.
   */
  send(sid: SessionId, frame: Frame): boolean {
    const entry = this.sessions.get(sid);
    if (!entry || entry.record.isTerminal()) return false;
    this.route(entry, frame);
    return true;
  }

  get(sid: SessionId): SessionInfo | undefined {
    const entry = this.sessions.get(sid);
    return entry ? this.info(entry) : undefined;
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values(), (entry) => this.info(entry)).sort(
      (a, b) => b.updatedAt - a.updatedAt,
    );
  }

  /**
   * Drop unattached terminal sessions untouched for `olderThanMs`.
   * Returns how many were removed.
   */
  reclaim(olderThanMs: number): number {
    const cutoff = this.now() - olderThanMs;
    let removed = 0;
    for (const [sid, entry] of this.sessions) {
      if (entry.sink || !entry.record.isTerminal()) continue;
      if (entry.record.updatedAt > cutoff) continue;
      this.sessions.delete(sid);
      removed++;
    }
    if (removed > 0) this.log.debug({ removed }, "reclaimed sessions");
    return removed;
  }

  /** Tell every running session to go away and refuse further acquires. */
  async shutdown(): Promise<void> {
    if (!this.available) return;
    this.broadcast(closeFrame("GoAway"));
    this.available = false;
    await this.drain();
  }

  /** Resolve once every queued operation has run. */
  drain(): Promise<void> {
    return this.mailbox.drain();
  }

  get size(): number {
    return this.sessions.size;
  }

  private create(sid: SessionId): Entry<H> {
    const record = new SessionRecord(sid, this.now());
    const entry: Entry<H> = {
      record,
      handler: this.createHandler(sid),
      ctx: this.contextFor(record),
      sink: undefined,
      attachment: 0,
      closedNotified: false,
    };
    this.sessions.set(sid, entry);
    return entry;
  }

  private contextFor(record: SessionRecord): SessionContext {
    const sid = record.sid;
    const sendFrame = (frame: Frame) => {
      if (!this.send(sid, frame)) {
        this.log.debug({ sid, frame: frame.type }, "send on inactive session ignored");
      }
    };
    return {
      sid,
      get state() {
        return record.state;
      },
      send: (payload) => sendFrame(messageFrame(payload)),
      sendBatch: (payloads) => sendFrame(batchFrame(payloads)),
      close: () => sendFrame(closeFrame("GoAway")),
    };
  }

  private route(entry: Entry<H>, frame: Frame): void {
    const delivered = entry.sink !== undefined && entry.sink.deliver({ kind: "frame", frame });
    if (!delivered && frame.type !== "heartbeat") entry.record.add(frame);
    if (isCloseFrame(frame) && !entry.record.isTerminal()) {
      entry.record.close();
      entry.record.touch(this.now());
      // with a transport bound, its release reports the close
      if (!entry.sink) {
        const sid = entry.record.sid;
        this.mailbox.post(sid, () => this.notifyClosed(entry));
      }
    }
  }

  private async notifyClosed(entry: Entry<H>): Promise<void> {
    if (entry.closedNotified) return;
    entry.closedNotified = true;
    await this.runHook(entry, "closed");
  }

  private async runHook(entry: Entry<H>, name: HookName): Promise<void> {
    const handler: SessionHandler = entry.handler;
    const hook = handler[name];
    if (!hook) return;
    try {
      await hook.call(handler, entry.ctx);
    } catch (err) {
      this.log.error({ sid: entry.record.sid, err, hook: name }, "session handler hook failed");
    }
  }

  private info(entry: Entry<H>): SessionInfo {
    return {
      sid: entry.record.sid,
      state: entry.record.state,
      attached: entry.sink !== undefined,
      buffered: entry.record.buffer.length,
      createdAt: entry.record.createdAt,
      updatedAt: entry.record.updatedAt,
    };
  }
}
