import { loadConfig } from "../../config.js";
import { EXIT, errorMessage, exit } from "../../shared/errors.js";

export interface ConfigCommandOptions {
  config?: string;
}

/** Print the effective configuration (defaults, file and env merged) as JSON. */
export async function runConfig(opts: ConfigCommandOptions): Promise<void> {
  try {
    const config = await loadConfig({ configPath: opts.config });
    process.stdout.write(JSON.stringify(config, null, 2) + "\n");
  } catch (err) {
    exit(EXIT.INVALID_ARGS, errorMessage(err));
  }
}
