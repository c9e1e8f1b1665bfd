import { Command } from "commander";
import { HANDLER_NAMES } from "../handlers/index.js";
import { getPackageJsonVersion } from "./utils.js";
import { runConfig, type ConfigCommandOptions } from "./commands/config.js";
import { runServe, type ServeOptions } from "./commands/serve.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("sockrelay")
    .description("Session relay over WebSocket with buffered, resumable sessions")
    .version(getPackageJsonVersion());

  program
    .command("serve", { isDefault: true })
    .description("Start the relay server")
    .option("--listen <host:port>", "Listen address (default 127.0.0.1:8081)")
    .option("--prefix <path>", "URL prefix for the protocol (default /echo)")
    .option("--handler <name>", `Session handler: ${HANDLER_NAMES.join(" or ")}`)
    .option("--heartbeat <ms>", "Heartbeat interval in ms, 0 to disable")
    .option("--config <path>", "JSON config file")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level")
    .option("--log-format <format>", "Log format: text, json or plain")
    .action((opts: ServeOptions) => runServe(opts));

  program
    .command("config")
    .description("Print the effective configuration")
    .option("--config <path>", "JSON config file")
    .action((opts: ConfigCommandOptions) => runConfig(opts));

  return program;
}
