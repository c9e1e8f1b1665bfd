import { readFile } from "node:fs/promises";
import path from "node:path";
import { type } from "arktype";
import { HANDLER_NAMES, isHandlerName, type HandlerName } from "./handlers/index.js";
import {
  DEFAULT_HANDLER,
  DEFAULT_HEARTBEAT_MS,
  DEFAULT_LISTEN,
  DEFAULT_PREFIX,
  DEFAULT_SESSION_TTL_MS,
  DEFAULT_SWEEP_MS,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { ConfigError, errorMessage } from "./shared/errors.js";
import { isLogFormat, type LogFormat } from "./shared/logging.js";
import { parseListen } from "./shared/net.js";

/** Shape of the optional JSON config file. */
const ConfigFileSchema = type({
  "listen?": "string",
  "prefix?": "string",
  "handler?": "'echo' | 'chat'",
  "heartbeatMs?": "number >= 0",
  "sessionTtlMs?": "number >= 0",
  "sweepMs?": "number >= 0",
  "log?": {
    "level?": "string",
    "format?": "'text' | 'json' | 'plain'",
  },
});

export type ConfigFile = typeof ConfigFileSchema.infer;

export interface RelayConfig {
  host: string;
  port: number;
  /** URL prefix the protocol is served under; "" for the root. */
  prefix: string;
  handler: HandlerName;
  /** 0 disables heartbeats. */
  heartbeatMs: number;
  sessionTtlMs: number;
  /** 0 disables the reclaim sweep. */
  sweepMs: number;
  logLevel: string;
  logFormat: LogFormat;
}

/** Values given on the command line; they win over everything else. */
export interface ConfigOverrides {
  listen?: string;
  prefix?: string;
  handler?: string;
  heartbeatMs?: number;
  logLevel?: string;
  logFormat?: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/** "/echo/" -> "/echo", "echo" -> "/echo", "/" -> "". */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\/+$/, "");
  if (!trimmed) return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

export function parseConfigFile(data: unknown, source = "config"): ConfigFile {
  const result = ConfigFileSchema(data);
  if (result instanceof type.errors) {
    throw new ConfigError(`Invalid ${source}: ${result.summary}`);
  }
  return result;
}

export async function readConfigFile(configPath: string): Promise<ConfigFile> {
  const resolved = path.resolve(configPath);
  let raw: string;
  try {
    raw = await readFile(resolved, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config ${resolved}: ${errorMessage(err)}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(`Config ${resolved} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseConfigFile(data, resolved);
}

function envNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${value}"`);
  }
  return n;
}

function handlerName(value: string, source: string): HandlerName {
  if (!isHandlerName(value)) {
    throw new ConfigError(`Unknown handler "${value}" in ${source}. Known: ${HANDLER_NAMES.join(", ")}`);
  }
  return value;
}

/** Defaults, then the config file, then SOCKRELAY_* env vars, then overrides. */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RelayConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const file: ConfigFile = options.configPath ? await readConfigFile(options.configPath) : {};

  const listen = overrides.listen ?? getEnv("LISTEN", env) ?? file.listen ?? DEFAULT_LISTEN;
  const { host, port } = parseListen(listen);

  const handler = overrides.handler
    ? handlerName(overrides.handler, "--handler")
    : handlerName(getEnv("HANDLER", env) ?? file.handler ?? DEFAULT_HANDLER, "config");

  const logFormat = overrides.logFormat ?? file.log?.format ?? "text";
  if (!isLogFormat(logFormat)) {
    throw new ConfigError(`Unknown log format "${logFormat}". Known: text, json, plain`);
  }

  return {
    host,
    port,
    prefix: normalizePrefix(overrides.prefix ?? getEnv("PREFIX", env) ?? file.prefix ?? DEFAULT_PREFIX),
    handler,
    heartbeatMs:
      overrides.heartbeatMs ??
      envNumber("SOCKRELAY_HEARTBEAT_MS", getEnv("HEARTBEAT_MS", env)) ??
      file.heartbeatMs ??
      DEFAULT_HEARTBEAT_MS,
    sessionTtlMs: file.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS,
    sweepMs: file.sweepMs ?? DEFAULT_SWEEP_MS,
    logLevel: overrides.logLevel ?? getEnv("LOG_LEVEL", env) ?? file.log?.level ?? "info",
    logFormat,
  };
}
