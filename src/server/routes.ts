/** Target of a WebSocket upgrade request: `<prefix>/<server>/<session>/websocket`. */
export interface WebsocketTarget {
  server: string;
  session: string;
}

function validSegment(segment: string): boolean {
  return segment.length > 0 && !segment.includes(".");
}

/** Match a request path against the WebSocket route; undefined when it does not match. */
export function parseWebsocketPath(prefix: string, pathname: string): WebsocketTarget | undefined {
  if (!pathname.startsWith(`${prefix}/`)) return undefined;
  const parts = pathname.slice(prefix.length + 1).split("/");
  if (parts.length !== 3 || parts[2] !== "websocket") return undefined;
  const [server, session] = parts;
  if (!validSegment(server) || !validSegment(session)) return undefined;
  return { server, session };
}
