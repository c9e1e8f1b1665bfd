import { Writable } from "node:stream";
import { pino, type Logger as PinoLogger } from "pino";
import { build as pinoPretty } from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "text" | "json" | "plain";
export type Logger = PinoLogger;

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const LOGGER_NAME = "sockrelay";

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function stderrStream(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      process.stderr.write(chunk);
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        const msg = messageOf(line);
        process.stderr.write((msg ?? line) + "\n");
      }
      cb();
    },
  });
}

function messageOf(line: string): string | undefined {
  try {
    const o: unknown = JSON.parse(line);
    if (o && typeof o === "object" && "msg" in o && typeof o.msg === "string") {
      return o.msg;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

let rootLogger: Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): void {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, plainMessageStderr());
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: stderrStream() });
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, stderrStream());
  }
}

function ensureLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: "info", name: LOGGER_NAME }, plainMessageStderr());
  }
  return rootLogger;
}

export function getLogger(): Logger {
  return ensureLogger();
}

/** Child logger tagged with the component name (and any extra bindings). */
export function componentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return ensureLogger().child({ component, ...bindings });
}

export const log = {
  info: (...args: Parameters<Logger["info"]>) => ensureLogger().info(...args),
  warn: (...args: Parameters<Logger["warn"]>) => ensureLogger().warn(...args),
  error: (...args: Parameters<Logger["error"]>) => ensureLogger().error(...args),
  debug: (...args: Parameters<Logger["debug"]>) => ensureLogger().debug(...args),
  trace: (...args: Parameters<Logger["trace"]>) => ensureLogger().trace(...args),
};
