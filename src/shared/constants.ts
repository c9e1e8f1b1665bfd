/** Defaults used when neither the config file, env nor flags say otherwise. */
export const DEFAULT_LISTEN = "127.0.0.1:8081";
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8081;
export const DEFAULT_PREFIX = "/echo";
export const DEFAULT_HANDLER = "echo";
export const DEFAULT_HEARTBEAT_MS = 25_000;
export const DEFAULT_SESSION_TTL_MS = 5 * 60_000;
export const DEFAULT_SWEEP_MS = 60_000;

export const VERSION = "0.1.0";
