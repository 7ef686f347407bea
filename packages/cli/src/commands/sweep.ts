import { Command } from "commander";
import { errorMessage } from "@respawn/core";
import { serverProcessPattern, sweepServerProcesses } from "@respawn/supervisor";
import { loadConfig } from "../config.js";

export const sweepCommand = new Command("sweep")
  .description("Force-kill leaked inference server processes")
  .option("--config <path>", "Config file (default: .respawn/config.json when present)")
  .action(async (opts: { config?: string }) => {
    let pattern: string;
    try {
      pattern = serverProcessPattern(loadConfig(process.cwd(), opts.config).config.server);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }

    const result = await sweepServerProcesses(pattern);
    if (result.error) {
      console.error(`Error: ${result.error}`);
      process.exit(1);
    }
    if (result.matched) {
      console.log(`Killed processes matching /${pattern}/.`);
    } else {
      console.log(`No processes match /${pattern}/.`);
    }
  });
