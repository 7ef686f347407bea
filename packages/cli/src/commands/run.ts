import { Command } from "commander";
import { errorMessage } from "@respawn/core";
import { startSupervisor } from "@respawn/supervisor";
import { loadConfig, type LoadedConfig } from "../config.js";
import { createReporter } from "../reporter.js";

export const runCommand = new Command("run")
  .description("Run the batch worker, restarting the inference server between batches")
  .option("--config <path>", "Config file (default: .respawn/config.json when present)")
  .action(async (opts: { config?: string }) => {
    let loaded: LoadedConfig;
    try {
      loaded = loadConfig(process.cwd(), opts.config);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }

    if (loaded.source) console.log(`Using config ${loaded.source}`);

    const outcome = await startSupervisor(loaded.config, {
      onEvent: createReporter(),
    });
    process.exit(outcome.exitCode);
  });
