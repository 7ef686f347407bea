import { constants } from "node:os";
import { execa } from "execa";
import type { EventSink, WorkerConfig, WorkerRun } from "@respawn/core";
import { systemClock, type Clock } from "../clock.js";
import { splitCommand } from "../server/args.js";

export interface BatchRunnerOptions {
  onEvent?: EventSink;
  clock?: Clock;
  /** Exported to the worker as RESPAWN_SERVER_URL */
  serverUrl?: string;
}

/** Shell convention for a process killed by a signal */
export function signalExitCode(signal: string): number {
  const signals: Partial<Record<string, number>> = { ...constants.signals };
  return 128 + (signals[signal] ?? 0);
}

/**
 * Runs the worker once per call and reports its exit code.
 * The worker gets no arguments; it inherits stdio and receives hints via env.
 */
export class BatchRunner {
  private worker: WorkerConfig;
  private clock: Clock;
  private serverUrl: string | undefined;
  private onEvent: EventSink;

  constructor(worker: WorkerConfig, opts: BatchRunnerOptions = {}) {
    this.worker = worker;
    this.clock = opts.clock ?? systemClock;
    this.serverUrl = opts.serverUrl;
    this.onEvent = opts.onEvent ?? (() => {});
  }

  /** Blocks until the worker exits. No timeout, no retries. */
  async run(iteration: number, signal?: AbortSignal): Promise<WorkerRun> {
    const { file, args } = splitCommand(this.worker.command);
    const startedAt = this.clock.now();
    this.onEvent({ type: "batch:started", payload: { iteration } });

    const env: Record<string, string> = {
      RESPAWN_ITERATION: String(iteration),
      RESPAWN_BATCH_SIZE: String(this.worker.batchSize),
    };
    if (this.serverUrl) env.RESPAWN_SERVER_URL = this.serverUrl;

    const result = await execa(file, args, {
      cwd: this.worker.cwd,
      env,
      stdio: "inherit",
      reject: false,
      cancelSignal: signal,
    });

    const run: WorkerRun = {
      iteration,
      startedAt,
      finishedAt: this.clock.now(),
      exitCode: 1,
    };
    if (result.exitCode !== undefined) {
      run.exitCode = result.exitCode;
    } else if (result.signal) {
      run.signal = result.signal;
      run.exitCode = signalExitCode(result.signal);
    } else {
      run.error = `could not launch "${this.worker.command}"`;
    }

    this.onEvent({ type: "batch:exited", payload: run });
    return run;
  }
}
