import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** Another transport is attached to the session and has not released it yet. */
export class SessionBusyError extends Error {
  constructor(readonly sid: string) {
    super(`Session ${sid} is already attached to another connection`);
    this.name = "SessionBusyError";
  }
}

/** The registry has shut down and no longer accepts acquires. */
export class RegistryUnavailableError extends Error {
  constructor(message = "Session registry is not available") {
    super(message);
    this.name = "RegistryUnavailableError";
  }
}

/** Inbound wire text that does not decode to a list of string payloads. */
export class MalformedPayloadError extends Error {
  constructor(message: string, readonly text: string) {
    super(message);
    this.name = "MalformedPayloadError";
  }
}

/** Config file present but unreadable or of the wrong shape. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
