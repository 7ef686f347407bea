import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { DEFAULT_CONFIG } from "@respawn/core";
import { defaultConfigPath } from "../config.js";

export const initCommand = new Command("init")
  .description("Write the default configuration to .respawn/config.json")
  .action(() => {
    const configPath = defaultConfigPath(process.cwd());

    if (existsSync(configPath)) {
      console.log(`respawn is already initialized (${configPath}).`);
      return;
    }

    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n");

    const { server, worker } = DEFAULT_CONFIG;
    console.log("Initialized respawn:");
    console.log(`  Server: ${server.command} ${server.model} (port ${server.port})`);
    console.log(`  Worker: ${worker.command}`);
    console.log(`  Max iterations: ${DEFAULT_CONFIG.maxIterations}`);
    console.log(`\nEdit ${configPath}, then run \`respawn run\`.`);
  });
