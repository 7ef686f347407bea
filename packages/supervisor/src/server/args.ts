import type { ServerConfig } from "@respawn/core";

/** Split a configured command line into executable and arguments */
export function splitCommand(command: string): { file: string; args: string[] } {
  const [file, ...args] = command.trim().split(/\s+/);
  if (!file) {
    throw new Error("Command must not be empty");
  }
  return { file, args };
}

/** Arguments appended to the serve command, in the order vllm documents them */
export function buildServeArgs(config: ServerConfig): string[] {
  return [
    config.model,
    "--max-model-len",
    String(config.maxModelLen),
    "--gpu-memory-utilization",
    String(config.gpuMemoryUtilization),
    ...config.extraArgs,
    "--port",
    String(config.port),
  ];
}

/** Command-line signature used to find server processes the handle lost track of */
export function serverProcessPattern(config: ServerConfig): string {
  return config.processPattern ?? `vllm.*${config.model}`;
}

export function healthUrl(config: ServerConfig): string {
  return `http://${config.host}:${config.port}${config.healthPath}`;
}

/** OpenAI-compatible base URL handed to the worker */
export function serverBaseUrl(config: ServerConfig): string {
  return `http://${config.host}:${config.port}/v1`;
}
