import type {
  AbortReason,
  ControllerState,
  EventSink,
  IterationState,
  ReadinessConfig,
  ReadyResult,
  RunOutcome,
  ServerConfig,
  ServerHandle,
  SupervisorConfig,
  SupervisorEvent,
  WorkerRun,
} from "@respawn/core";
import { systemClock, type Clock } from "../clock.js";

/** Exit code for an aborted readiness check and for operator interrupts */
export const SERVER_START_FAILED_EXIT_CODE = 1;
export const INTERRUPTED_EXIT_CODE = 1;

export interface ServerLifecycle {
  start(config: ServerConfig): ServerHandle;
  waitReady(handle: ServerHandle, readiness: ReadinessConfig, signal?: AbortSignal): Promise<ReadyResult>;
  stop(handle: ServerHandle, gracePeriodMs?: number): Promise<void>;
}

export interface BatchExecutor {
  run(iteration: number, signal?: AbortSignal): Promise<WorkerRun>;
}

export interface IterationControllerOptions {
  config: SupervisorConfig;
  server: ServerLifecycle;
  batch: BatchExecutor;
  clock?: Clock;
  onEvent?: EventSink;
  /** Run after each server stop when config.syncBetweenIterations is set */
  flush?: () => Promise<void>;
}

/**
 * Drives start server → run batch → stop server → pause, once per iteration,
 * up to config.maxIterations.
 *
 * When `signal` aborts, the controller returns an "interrupted" outcome without
 * touching the server: the signal handler owns that shutdown.
 */
export class IterationController {
  private config: SupervisorConfig;
  private server: ServerLifecycle;
  private batch: BatchExecutor;
  private clock: Clock;
  private onEvent: EventSink;
  private flush: (() => Promise<void>) | undefined;

  private current: ControllerState = "idle";
  private progress: IterationState;
  private iterationsStarted = 0;
  private hasRun = false;

  constructor(opts: IterationControllerOptions) {
    this.config = opts.config;
    this.server = opts.server;
    this.batch = opts.batch;
    this.clock = opts.clock ?? systemClock;
    this.onEvent = opts.onEvent ?? (() => {});
    this.flush = opts.flush;
    this.progress = {
      iteration: 1,
      maxIterations: opts.config.maxIterations,
      lastExitCode: null,
    };
  }

  get state(): ControllerState {
    return this.current;
  }

  getIterationState(): IterationState {
    return { ...this.progress };
  }

  async run(signal?: AbortSignal): Promise<RunOutcome> {
    if (this.hasRun) {
      throw new Error("IterationController.run() may only be called once");
    }
    this.hasRun = true;

    this.emit({ type: "run:started", payload: { maxIterations: this.progress.maxIterations } });

    while (this.progress.iteration <= this.progress.maxIterations) {
      if (signal?.aborted) return this.abort("interrupted", INTERRUPTED_EXIT_CODE);
      const outcome = await this.runIteration(signal);
      if (outcome) return outcome;
    }

    this.transition("completed");
    this.emit({ type: "run:completed", payload: { iterations: this.iterationsStarted } });
    return { status: "completed", iterations: this.iterationsStarted, exitCode: 0 };
  }

  /** One restart cycle. Returns an outcome only when the run must end. */
  private async runIteration(signal?: AbortSignal): Promise<RunOutcome | null> {
    const { iteration, maxIterations } = this.progress;
    const { gracePeriodMs } = this.config.shutdown;

    this.iterationsStarted++;
    this.emit({ type: "iteration:started", payload: { iteration, maxIterations } });

    this.transition("server-starting");
    const handle = this.server.start(this.config.server);
    const ready = await this.server.waitReady(handle, this.config.readiness, signal);
    if (signal?.aborted) return this.abort("interrupted", INTERRUPTED_EXIT_CODE);

    if (ready === "failed") {
      // Not retried; a half-started server is still torn down
      this.transition("server-stopping");
      await this.server.stop(handle, gracePeriodMs);
      return this.abort("server failed to start", SERVER_START_FAILED_EXIT_CODE);
    }

    this.transition("server-ready");
    this.transition("batch-running");
    const run = await this.batch.run(iteration, signal);
    this.progress.lastExitCode = run.exitCode;
    if (signal?.aborted) return this.abort("interrupted", INTERRUPTED_EXIT_CODE);

    // Always stop before looking at the exit code so a failed batch never orphans the server
    this.transition("server-stopping");
    await this.server.stop(handle, gracePeriodMs);

    if (run.exitCode !== 0) return this.abort("worker failed", run.exitCode);

    if (this.config.syncBetweenIterations && this.flush) {
      await this.flush();
    }

    const isLast = iteration >= maxIterations;
    const delayMs = isLast ? 0 : this.config.iterationDelayMs;
    this.emit({ type: "iteration:completed", payload: { iteration, delayMs } });

    this.progress.iteration++;
    this.transition("idle");

    if (delayMs > 0) await this.clock.sleep(delayMs, signal);
    return null;
  }

  private abort(reason: AbortReason, exitCode: number): RunOutcome {
    this.transition("aborted");
    const iterations = this.iterationsStarted;
    this.emit({ type: "run:aborted", payload: { reason, exitCode, iterations } });
    return { status: "aborted", reason, iterations, exitCode };
  }

  private transition(to: ControllerState): void {
    const from = this.current;
    this.current = to;
    this.emit({ type: "controller:state", payload: { from, to } });
  }

  private emit(event: SupervisorEvent): void {
    this.onEvent(event);
  }
}
