import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import { closeFrame, heartbeatFrame, messageFrame } from "../../src/protocol/index.js";
import {
  SessionRegistry,
  type ChannelItem,
  type SessionHandler,
  type TransportSink,
} from "../../src/session/index.js";
import { RegistryUnavailableError, SessionBusyError } from "../../src/shared/errors.js";

const silent = pino({ level: "silent" });

class FakeSink implements TransportSink {
  readonly items: ChannelItem[] = [];
  accepting = true;

  constructor(readonly id: string) {}

  deliver(item: ChannelItem): boolean {
    if (!this.accepting) return false;
    this.items.push(item);
    return true;
  }
}

function createRegistry(handler: SessionHandler = { message: () => {} }, now?: () => number) {
  return new SessionRegistry({ createHandler: () => handler, logger: silent, now });
}

describe("SessionRegistry acquire", () => {
  it("creates a new session and ends the acquire with a ready signal", async () => {
    const registry = createRegistry();
    const sink = new FakeSink("conn-1");
    const snapshot = await registry.acquire("abc123", sink);

    expect(snapshot.state).toBe("new");
    expect(snapshot.buffer).toEqual([]);
    expect(snapshot.attachment).toBeGreaterThan(0);
    expect(sink.items).toEqual([{ kind: "ready" }]);
    expect(registry.get("abc123")).toMatchObject({ sid: "abc123", state: "running", attached: true });
  });

  it("refuses a second transport while the first holds the session", async () => {
    const registry = createRegistry();
    await registry.acquire("abc123", new FakeSink("conn-1"));
    await expect(registry.acquire("abc123", new FakeSink("conn-2"))).rejects.toBeInstanceOf(SessionBusyError);
  });

  it("hands the backlog to the next transport and empties the registry copy", async () => {
    const registry = createRegistry();
    const first = await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.release({ ...first, state: "running" });
    await registry.drain();

    expect(registry.send("abc123", messageFrame("m1"))).toBe(true);
    expect(registry.send("abc123", messageFrame("m2"))).toBe(true);
    expect(registry.get("abc123")?.buffered).toBe(2);

    const second = await registry.acquire("abc123", new FakeSink("conn-2"));
    expect(second.state).toBe("running");
    expect(second.buffer).toEqual([messageFrame("m1"), messageFrame("m2")]);
    expect(registry.get("abc123")?.buffered).toBe(0);
  });

  it("rejects every acquire after shutdown", async () => {
    const registry = createRegistry();
    await registry.shutdown();
    await expect(registry.acquire("abc123", new FakeSink("conn-1"))).rejects.toBeInstanceOf(
      RegistryUnavailableError,
    );
  });
});

describe("SessionRegistry release", () => {
  it("ignores a release from a stale attachment", async () => {
    const registry = createRegistry();
    const snapshot = await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.release({ ...snapshot, state: "closed", attachment: snapshot.attachment + 100 });
    await registry.drain();
    expect(registry.get("abc123")).toMatchObject({ state: "running", attached: true });
  });

  it("ignores a second release of the same attachment", async () => {
    const registry = createRegistry();
    const snapshot = await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.release({ ...snapshot, state: "running" });
    registry.release({ ...snapshot, state: "closed" });
    await registry.drain();
    expect(registry.get("abc123")).toMatchObject({ state: "running", attached: false });
  });

  it("puts returned frames ahead of frames buffered while the transport was leaving", async () => {
    const registry = createRegistry();
    const sink = new FakeSink("conn-1");
    const snapshot = await registry.acquire("abc123", sink);
    sink.accepting = false;
    registry.send("abc123", messageFrame("later"));
    registry.release({ ...snapshot, state: "running", buffer: [messageFrame("earlier")] });
    await registry.drain();

    const next = await registry.acquire("abc123", new FakeSink("conn-2"));
    expect(next.buffer).toEqual([messageFrame("earlier"), messageFrame("later")]);
  });

  it("hands terminal sessions out unbound, to any number of callers", async () => {
    const registry = createRegistry();
    const first = await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.release({ ...first, state: "interrupted" });

    const results = await Promise.allSettled([
      registry.acquire("abc123", new FakeSink("conn-2")),
      registry.acquire("abc123", new FakeSink("conn-3")),
    ]);
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "fulfilled"]);
    for (const result of results) {
      if (result.status === "fulfilled") {
        expect(result.value).toMatchObject({ state: "interrupted", attachment: 0 });
      }
    }
    expect(registry.get("abc123")).toMatchObject({ state: "interrupted", attached: false });

    const second = results[0];
    if (second.status === "fulfilled") registry.release({ ...second.value, state: "running" });
    await registry.drain();
    expect(registry.get("abc123")?.state).toBe("interrupted");
  });
});

describe("SessionRegistry exclusivity", () => {
  it("lets exactly one of several concurrent acquires through", async () => {
    const registry = createRegistry();
    const results = await Promise.allSettled([
      registry.acquire("abc123", new FakeSink("conn-1")),
      registry.acquire("abc123", new FakeSink("conn-2")),
      registry.acquire("abc123", new FakeSink("conn-3")),
    ]);
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "rejected"]);
    for (const result of results) {
      if (result.status === "rejected") expect(result.reason).toBeInstanceOf(SessionBusyError);
    }
  });
});

describe("SessionRegistry application close", () => {
  it("closes a detached session at once and stops feeding its handler", async () => {
    const seen: string[] = [];
    const closed = vi.fn();
    const registry = createRegistry({
      message: (ctx, payload) => {
        seen.push(payload);
        if (payload === "bye") {
          ctx.send("so long");
          ctx.close();
        }
      },
      closed,
    });
    const snapshot = await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.release({ ...snapshot, state: "running" });

    registry.deliver("abc123", "bye");
    registry.deliver("abc123", "after-close");
    registry.broadcast(messageFrame("news"));
    await registry.drain();

    expect(seen).toEqual(["bye"]);
    expect(registry.get("abc123")).toMatchObject({ state: "closed", buffered: 2 });
    expect(closed).toHaveBeenCalledTimes(1);
    expect(registry.send("abc123", messageFrame("late"))).toBe(false);

    const next = await registry.acquire("abc123", new FakeSink("conn-2"));
    expect(next.buffer).toEqual([messageFrame("so long"), closeFrame("GoAway")]);
    expect(registry.get("abc123")?.buffered).toBe(0);
  });

  it("marks an attached session closed when the close is routed", async () => {
    const registry = createRegistry({ message: (ctx) => ctx.close() });
    const sink = new FakeSink("conn-1");
    await registry.acquire("abc123", sink);
    registry.deliver("abc123", "quit");
    await registry.drain();
    expect(sink.items.at(-1)).toEqual({ kind: "frame", frame: closeFrame("GoAway") });
    expect(registry.get("abc123")).toMatchObject({ state: "closed", attached: true });
  });
});

describe("SessionRegistry handler hooks", () => {
  it("calls opened, released, acquired and closed at the matching points", async () => {
    const handler = {
      message: vi.fn(),
      opened: vi.fn(),
      acquired: vi.fn(),
      released: vi.fn(),
      closed: vi.fn(),
    };
    const registry = createRegistry(handler);

    const first = await registry.acquire("abc123", new FakeSink("conn-1"));
    expect(handler.opened).toHaveBeenCalledTimes(1);
    registry.release({ ...first, state: "running" });
    await registry.drain();
    expect(handler.released).toHaveBeenCalledTimes(1);

    const second = await registry.acquire("abc123", new FakeSink("conn-2"));
    expect(handler.acquired).toHaveBeenCalledTimes(1);
    registry.release({ ...second, state: "interrupted" });
    await registry.drain();
    expect(handler.closed).toHaveBeenCalledTimes(1);

    const third = await registry.acquire("abc123", new FakeSink("conn-3"));
    registry.release(third);
    await registry.drain();
    expect(handler.opened).toHaveBeenCalledTimes(1);
    expect(handler.acquired).toHaveBeenCalledTimes(1);
    expect(handler.closed).toHaveBeenCalledTimes(1);
  });

  it("keeps going when a hook throws", async () => {
    const registry = createRegistry({
      message: () => {},
      opened: () => {
        throw new Error("hook failed");
      },
    });
    const sink = new FakeSink("conn-1");
    await registry.acquire("abc123", sink);
    expect(sink.items).toEqual([{ kind: "ready" }]);
  });
});

describe("SessionRegistry deliver", () => {
  it("passes payloads to the handler in order", async () => {
    const seen: string[] = [];
    const registry = createRegistry({ message: (_ctx, payload) => void seen.push(payload) });
    await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.deliver("abc123", "one");
    registry.deliver("abc123", "two");
    await registry.drain();
    expect(seen).toEqual(["one", "two"]);
  });

  it("drops payloads for unknown or finished sessions", async () => {
    const message = vi.fn();
    const registry = createRegistry({ message });
    const snapshot = await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.release({ ...snapshot, state: "closed" });
    registry.deliver("abc123", "late");
    registry.deliver("nobody", "hello");
    await registry.drain();
    expect(message).not.toHaveBeenCalled();
  });

  it("routes handler replies to the attached sink", async () => {
    const registry = createRegistry({ message: (ctx, payload) => ctx.send(payload.toUpperCase()) });
    const sink = new FakeSink("conn-1");
    await registry.acquire("abc123", sink);
    registry.deliver("abc123", "hi");
    await registry.drain();
    expect(sink.items).toEqual([{ kind: "ready" }, { kind: "frame", frame: messageFrame("HI") }]);
  });

  it("survives a handler that throws", async () => {
    const registry = createRegistry({
      message: () => {
        throw new Error("handler failed");
      },
    });
    await registry.acquire("abc123", new FakeSink("conn-1"));
    registry.deliver("abc123", "x");
    await registry.drain();
    expect(registry.get("abc123")?.state).toBe("running");
  });
});

describe("SessionRegistry broadcast", () => {
  it("reaches running sessions only, buffering for detached ones", async () => {
    const registry = createRegistry();
    const live = new FakeSink("conn-live");
    await registry.acquire("live", live);

    const away = await registry.acquire("away", new FakeSink("conn-away"));
    registry.release({ ...away, state: "running" });

    const done = await registry.acquire("done", new FakeSink("conn-done"));
    registry.release({ ...done, state: "closed" });
    await registry.drain();

    registry.broadcast(messageFrame("news"));
    await registry.drain();

    expect(live.items).toEqual([{ kind: "ready" }, { kind: "frame", frame: messageFrame("news") }]);
    expect(registry.get("away")?.buffered).toBe(1);
    expect(registry.get("done")?.buffered).toBe(0);
  });

  it("does not buffer heartbeats for detached sessions", async () => {
    const registry = createRegistry();
    const live = new FakeSink("conn-live");
    await registry.acquire("live", live);
    const away = await registry.acquire("away", new FakeSink("conn-away"));
    registry.release({ ...away, state: "running" });
    await registry.drain();

    registry.broadcast(heartbeatFrame());
    registry.broadcast(heartbeatFrame());
    await registry.drain();

    expect(live.items).toEqual([
      { kind: "ready" },
      { kind: "frame", frame: heartbeatFrame() },
      { kind: "frame", frame: heartbeatFrame() },
    ]);
    expect(registry.get("away")?.buffered).toBe(0);
  });

  it("sends go away to running sessions on shutdown", async () => {
    const registry = createRegistry();
    const sink = new FakeSink("conn-1");
    await registry.acquire("abc123", sink);
    await registry.shutdown();
    expect(sink.items).toEqual([{ kind: "ready" }, { kind: "frame", frame: closeFrame("GoAway") }]);
  });
});

describe("SessionRegistry inspection", () => {
  it("lists sessions most recently updated first", async () => {
    let clock = 1_000;
    const registry = createRegistry(undefined, () => clock);
    await registry.acquire("older", new FakeSink("conn-1"));
    clock = 2_000;
    await registry.acquire("newer", new FakeSink("conn-2"));
    expect(registry.list().map((s) => s.sid)).toEqual(["newer", "older"]);
    expect(registry.size).toBe(2);
  });

  it("reclaims unattached terminal sessions once they are old enough", async () => {
    let clock = 10_000;
    const registry = createRegistry(undefined, () => clock);
    const done = await registry.acquire("done", new FakeSink("conn-1"));
    registry.release({ ...done, state: "closed" });
    await registry.acquire("live", new FakeSink("conn-2"));
    await registry.drain();

    clock = 10_500;
    expect(registry.reclaim(1_000)).toBe(0);
    clock = 11_000;
    expect(registry.reclaim(1_000)).toBe(1);
    expect(registry.get("done")).toBeUndefined();
    expect(registry.get("live")).toBeDefined();
  });

  it("returns undefined for an unknown session", () => {
    expect(createRegistry().get("missing")).toBeUndefined();
  });
});
