/** How the inference server is launched and reached */
export interface ServerConfig {
  /** Command that serves a model, split on whitespace (e.g., "uv run vllm serve") */
  command: string;
  /** Model identifier passed as the first argument after the command */
  model: string;
  /** Maximum context length (--max-model-len) */
  maxModelLen: number;
  /** Fraction of accelerator memory the server may claim, in (0, 1] */
  gpuMemoryUtilization: number;
  /** Port the server listens on */
  port: number;
  /** Host used for liveness probes and the URL handed to the worker */
  host: string;
  /** Path probed for liveness (default: /health) */
  healthPath: string;
  /** Extra flags placed before --port */
  extraArgs: string[];
  /** Regex matched against full command lines when sweeping leaked servers (default: "vllm.*<model>") */
  processPattern?: string;
}

/** Liveness probing after launch */
export interface ReadinessConfig {
  /** Fixed wait before the first probe, while the server loads weights */
  initialDelayMs: number;
  maxProbes: number;
  probeIntervalMs: number;
  /** Per-request timeout for a single probe */
  probeTimeoutMs: number;
}

export interface ShutdownConfig {
  /** How long to wait after SIGTERM before force killing */
  gracePeriodMs: number;
  /** Sweep for leftover server processes even when the server exited within the grace period (default: true) */
  alwaysSweep: boolean;
}

export interface WorkerConfig {
  /** Command for one batch, split on whitespace (e.g., "python ocr/run_batch_ocr.py") */
  command: string;
  /** Working directory for the worker (default: the supervisor's) */
  cwd?: string;
  /** Batch-size hint exported to the worker as RESPAWN_BATCH_SIZE */
  batchSize: number;
}

/** respawn configuration (optionally stored in .respawn/config.json) */
export interface SupervisorConfig {
  server: ServerConfig;
  readiness: ReadinessConfig;
  shutdown: ShutdownConfig;
  worker: WorkerConfig;
  /** Safety limit on restart cycles (default: 100) */
  maxIterations: number;
  /** Pause between iterations so the OS can reclaim released memory */
  iterationDelayMs: number;
  /** Flush filesystem buffers (sync) after each server stop */
  syncBetweenIterations: boolean;
}

export const DEFAULT_CONFIG: SupervisorConfig = {
  server: {
    command: "uv run vllm serve",
    model: "allenai/olmOCR-2-7B-1025-FP8",
    maxModelLen: 16384,
    gpuMemoryUtilization: 0.9,
    port: 8000,
    host: "localhost",
    healthPath: "/health",
    extraArgs: ["--enable-chunked-prefill"],
  },
  readiness: {
    initialDelayMs: 30_000,
    maxProbes: 10,
    probeIntervalMs: 5_000,
    probeTimeoutMs: 2_000,
  },
  shutdown: {
    gracePeriodMs: 15_000,
    alwaysSweep: true,
  },
  worker: {
    command: "python ocr/run_batch_ocr.py",
    batchSize: 100,
  },
  maxIterations: 100,
  iterationDelayMs: 10_000,
  syncBetweenIterations: true,
};
