#!/usr/bin/env tsx
import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { initCommand } from "./commands/init.js";
import { sweepCommand } from "./commands/sweep.js";

const program = new Command();

program
  .name("respawn")
  .description(
    "Run a batch worker against an inference server, restarting the server between batches"
  )
  .version("0.1.0");

program.addCommand(runCommand, { isDefault: true });
program.addCommand(initCommand);
program.addCommand(sweepCommand);

await program.parseAsync();
