import chalk from "chalk";
import { loadConfig, type RelayConfig } from "../../config.js";
import { startRelayServer, type RelayHandle } from "../../server/server.js";
import { EXIT, errorMessage, exit } from "../../shared/errors.js";
import { initLogger, log } from "../../shared/logging.js";
import { getPackageJsonVersion, parseMillis } from "../utils.js";

export interface ServeOptions {
  listen?: string;
  prefix?: string;
  handler?: string;
  heartbeat?: string;
  config?: string;
  logLevel?: string;
  logFormat?: string;
  verbose?: boolean;
}

export async function resolveServeConfig(opts: ServeOptions): Promise<RelayConfig> {
  return loadConfig({
    configPath: opts.config,
    overrides: {
      listen: opts.listen,
      prefix: opts.prefix,
      handler: opts.handler,
      heartbeatMs: parseMillis(opts.heartbeat, "--heartbeat"),
      logLevel: opts.verbose ? "debug" : opts.logLevel,
      logFormat: opts.logFormat,
    },
  });
}

function printBanner(config: RelayConfig, port: number): void {
  const base = `http://${config.host}:${port}`;
  const ws = `ws://${config.host}:${port}${config.prefix}/<server>/<session>/websocket`;
  process.stderr.write("\n");
  process.stderr.write(chalk.bold("sockrelay") + "\n");
  process.stderr.write("───────────────────────────────────────────────────────────────\n");
  process.stderr.write(`Version:     v${getPackageJsonVersion()}\n`);
  process.stderr.write(`Info:        ${base}${config.prefix}/info\n`);
  process.stderr.write(`WebSocket:   ${ws}\n`);
  process.stderr.write(`Handler:     ${config.handler}\n`);
  process.stderr.write(
    `Heartbeat:   ${config.heartbeatMs > 0 ? `${config.heartbeatMs} ms` : chalk.dim("off")}\n`,
  );
  process.stderr.write("───────────────────────────────────────────────────────────────\n\n");
}

export async function runServe(opts: ServeOptions): Promise<void> {
  let config: RelayConfig;
  try {
    config = await resolveServeConfig(opts);
  } catch (err) {
    exit(EXIT.INVALID_ARGS, errorMessage(err));
  }
  initLogger(config.logLevel, config.logFormat);

  let handle: RelayHandle;
  try {
    handle = await startRelayServer(config);
  } catch (err) {
    process.stderr.write(`ERROR: ${errorMessage(err)}\n`);
    exit(EXIT.SERVER_FAILURE);
  }
  printBanner(config, handle.port);

  await new Promise<void>((_, reject) => {
    const stop = () => {
      log.info("shutting down");
      handle
        .close()
        .then(() => process.exit(EXIT.SUCCESS))
        .catch(reject);
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });
}
