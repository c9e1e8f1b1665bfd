/** Environment variable names. */
export const RELAY_ENV = {
  LISTEN: "SOCKRELAY_LISTEN",
  PREFIX: "SOCKRELAY_PREFIX",
  HANDLER: "SOCKRELAY_HANDLER",
  HEARTBEAT_MS: "SOCKRELAY_HEARTBEAT_MS",
  LOG_LEVEL: "SOCKRELAY_LOG_LEVEL",
} as const;

export type RelayEnvKey = keyof typeof RELAY_ENV;

export function getEnv(key: RelayEnvKey, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[RELAY_ENV[key]];
  return value === "" ? undefined : value;
}
