import { z } from "zod";
import { DEFAULT_CONFIG, type SupervisorConfig } from "../types/config.js";

const defaults = DEFAULT_CONFIG;

const positiveInt = z.number().int().positive();
const durationMs = z.number().int().nonnegative();
const command = z.string().trim().min(1, "must not be empty");

const serverSchema = z
  .object({
    command: command.default(defaults.server.command),
    model: z.string().min(1).default(defaults.server.model),
    maxModelLen: positiveInt.default(defaults.server.maxModelLen),
    gpuMemoryUtilization: z
      .number()
      .gt(0, "must be greater than 0")
      .lte(1, "must be at most 1")
      .default(defaults.server.gpuMemoryUtilization),
    port: z.number().int().min(1).max(65535).default(defaults.server.port),
    host: z.string().min(1).default(defaults.server.host),
    healthPath: z
      .string()
      .startsWith("/", "must start with /")
      .default(defaults.server.healthPath),
    extraArgs: z.array(z.string()).default(() => [...defaults.server.extraArgs]),
    processPattern: z.string().min(1).optional(),
  })
  .strict();

const readinessSchema = z
  .object({
    initialDelayMs: durationMs.default(defaults.readiness.initialDelayMs),
    maxProbes: positiveInt.default(defaults.readiness.maxProbes),
    probeIntervalMs: durationMs.default(defaults.readiness.probeIntervalMs),
    probeTimeoutMs: positiveInt.default(defaults.readiness.probeTimeoutMs),
  })
  .strict();

const shutdownSchema = z
  .object({
    gracePeriodMs: durationMs.default(defaults.shutdown.gracePeriodMs),
    alwaysSweep: z.boolean().default(defaults.shutdown.alwaysSweep),
  })
  .strict();

const workerSchema = z
  .object({
    command: command.default(defaults.worker.command),
    cwd: z.string().min(1).optional(),
    batchSize: positiveInt.default(defaults.worker.batchSize),
  })
  .strict();

/** Partial configs are filled in from DEFAULT_CONFIG; unknown keys are rejected */
export const supervisorConfigSchema = z
  .object({
    server: serverSchema.default({}),
    readiness: readinessSchema.default({}),
    shutdown: shutdownSchema.default({}),
    worker: workerSchema.default({}),
    maxIterations: positiveInt.default(defaults.maxIterations),
    iterationDelayMs: durationMs.default(defaults.iterationDelayMs),
    syncBetweenIterations: z.boolean().default(defaults.syncBetweenIterations),
  })
  .strict();

export type ConfigValidation =
  | { ok: true; config: SupervisorConfig }
  | { ok: false; issues: string[] };

export function validateConfig(raw: unknown): ConfigValidation {
  const result = supervisorConfigSchema.safeParse(raw);
  if (result.success) return { ok: true, config: result.data };
  return { ok: false, issues: formatConfigIssues(result.error) };
}

/** Throws with every issue listed when the config is invalid */
export function parseConfig(raw: unknown): SupervisorConfig {
  const result = validateConfig(raw);
  if (!result.ok) {
    throw new Error(`Invalid configuration:\n  ${result.issues.join("\n  ")}`);
  }
  return result.config;
}

export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
