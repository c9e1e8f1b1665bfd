import { createServer, type IncomingMessage, type Server } from "node:http";
import type { Duplex } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { Hono } from "hono";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { RelayConfig } from "../config.js";
import { createHandlerFactory } from "../handlers/index.js";
import { heartbeatFrame } from "../protocol/index.js";
import { SessionRegistry, type SessionId } from "../session/index.js";
import { VERSION } from "../shared/constants.js";
import { errorMessage } from "../shared/errors.js";
import { genEntropy } from "../shared/ids.js";
import { componentLogger, type Logger } from "../shared/logging.js";
import { WebsocketTransport, channelFromSocket } from "../transports/index.js";
import { parseWebsocketPath } from "./routes.js";

export interface RelayAppOptions {
  registry: SessionRegistry;
  prefix: string;
}

export interface RelayHandle {
  host: string;
  port: number;
  registry: SessionRegistry;
  close: () => Promise<void>;
}

/** HTTP side of the relay: info, health and session inspection. */
export function createRelayApp(options: RelayAppOptions): Hono {
  const { registry, prefix } = options;
  const app = new Hono();

  app.get("/", (c) => c.json({ server: "sockrelay", version: VERSION }));
  app.get("/health", (c) => c.json({ ok: true, sessions: registry.size }));
  app.get(`${prefix}/info`, (c) =>
    c.json({
      websocket: true,
      cookie_needed: false,
      origins: ["*:*"],
      entropy: genEntropy(),
    }),
  );
  app.get("/api/sessions", (c) => c.json(registry.list()));
  app.get("/api/sessions/:sid", (c) => {
    const session = registry.get(c.req.param("sid"));
    if (!session) return c.json({ error: "Not found" }, 404);
    return c.json(session);
  });

  return app;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function rawDataSize(data: RawData): number {
  if (Array.isArray(data)) return data.reduce((n, b) => n + b.length, 0);
  return data.byteLength;
}

/** Wire a fresh WebSocket to a transport for `sid` and start acquiring the session. */
export function attachWebsocket(
  ws: WebSocket,
  sid: SessionId,
  registry: SessionRegistry,
  log: Logger = componentLogger("server"),
): WebsocketTransport {
  const transport = new WebsocketTransport(channelFromSocket(ws), { registry, sid });

  ws.on("message", (data, isBinary) => {
    if (isBinary) transport.onBinary(rawDataSize(data));
    else transport.onText(rawDataToString(data));
  });
  ws.on("close", (code) => transport.onPeerClose(code));
  ws.on("error", (err) => transport.onProtocolError(err));

  transport.init().catch((err: unknown) => {
    log.error({ sid, err: errorMessage(err) }, "transport init failed");
  });
  return transport;
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

function listen(server: Server, host: string, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        reject(
          new Error(
            `Cannot listen on ${host}:${port} (EADDRINUSE).\nFix: choose a different port with --listen ${host}:<port>`,
          ),
        );
        return;
      }
      reject(err);
    };
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      resolve(address && typeof address === "object" ? address.port : port);
    });
  });
}

/**
 * Start the relay: HTTP routes plus WebSocket sessions at
 * `<prefix>/<server>/<session>/websocket`, with periodic heartbeats and a
 * sweep that reclaims finished sessions.
 */
export async function startRelayServer(config: RelayConfig): Promise<RelayHandle> {
  const log = componentLogger("server");
  const registry: SessionRegistry = new SessionRegistry({
    createHandler: createHandlerFactory(config.handler, (frame) => registry.broadcast(frame)),
  });
  const app = createRelayApp({ registry, prefix: config.prefix });
  const server = createServer(getRequestListener(app.fetch));
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    const target = parseWebsocketPath(config.prefix, pathname);
    if (!target) {
      log.debug({ path: pathname }, "upgrade for unknown path rejected");
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      log.debug({ sid: target.session, server: target.server }, "websocket connected");
      attachWebsocket(ws, target.session, registry, log);
    });
  });

  const timers: NodeJS.Timeout[] = [];
  if (config.heartbeatMs > 0) {
    const heartbeat = setInterval(() => registry.broadcast(heartbeatFrame()), config.heartbeatMs);
    heartbeat.unref();
    timers.push(heartbeat);
  }
  if (config.sweepMs > 0) {
    const sweep = setInterval(() => registry.reclaim(config.sessionTtlMs), config.sweepMs);
    sweep.unref();
    timers.push(sweep);
  }

  let port: number;
  try {
    port = await listen(server, config.host, config.port);
  } catch (err) {
    for (const t of timers) clearInterval(t);
    throw err;
  }
  log.info({ host: config.host, port, prefix: config.prefix, handler: config.handler }, "relay listening");

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= (async () => {
      for (const t of timers) clearInterval(t);
      await registry.shutdown();
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      log.info("relay stopped");
    })();
    return closing;
  };

  return { host: config.host, port, registry, close };
}
