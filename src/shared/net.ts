import { DEFAULT_HOST, DEFAULT_PORT } from "./constants.js";

function validPort(port: number): boolean {
  return !Number.isNaN(port) && port > 0 && port <= 65535;
}

/**
 * Parse --listen value (e.g. "127.0.0.1:8081" or "8081") into host and port.
 * An invalid port falls back to the default port; a missing host to the default host.
 */
export function parseListen(listen: string): { host: string; port: number } {
  if (!listen) return { host: DEFAULT_HOST, port: DEFAULT_PORT };
  const colon = listen.lastIndexOf(":");
  if (colon === -1) {
    const port = parseInt(listen, 10);
    return { host: DEFAULT_HOST, port: validPort(port) ? port : DEFAULT_PORT };
  }
  const host = listen.slice(0, colon).trim() || DEFAULT_HOST;
  const port = parseInt(listen.slice(colon + 1), 10);
  return { host, port: validPort(port) ? port : DEFAULT_PORT };
}
