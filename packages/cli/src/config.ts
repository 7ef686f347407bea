import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { errorMessage, validateConfig, type SupervisorConfig } from "@respawn/core";

export const CONFIG_DIR = ".respawn";
export const CONFIG_FILE = "config.json";

export interface LoadedConfig {
  config: SupervisorConfig;
  /** File the config came from; null when running on defaults */
  source: string | null;
}

export function defaultConfigPath(cwd: string): string {
  return join(cwd, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Load .respawn/config.json (or `explicitPath`) over the defaults.
 * A missing default file is fine; a missing explicit file is not.
 */
export function loadConfig(cwd: string, explicitPath?: string): LoadedConfig {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : defaultConfigPath(cwd);

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return { config: parseOrThrow({}, "defaults"), source: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new Error(`Cannot read ${configPath}: ${errorMessage(err)}`);
  }

  return { config: parseOrThrow(raw, configPath), source: configPath };
}

function parseOrThrow(raw: unknown, origin: string): SupervisorConfig {
  const result = validateConfig(raw);
  if (!result.ok) {
    throw new Error(`Invalid config in ${origin}:\n  ${result.issues.join("\n  ")}`);
  }
  return result.config;
}
