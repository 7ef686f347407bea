import type { EventSink, RunOutcome, SupervisorConfig } from "@respawn/core";
import { systemClock, type Clock } from "./clock.js";
import { ServerManager } from "./server/manager.js";
import { serverBaseUrl } from "./server/args.js";
import { BatchRunner } from "./batch/runner.js";
import { IterationController } from "./loop/controller.js";
import { installSignalHandlers, type SignalTarget } from "./signals/handler.js";
import { flushFilesystem } from "./system/sync.js";

export { systemClock, type Clock } from "./clock.js";
export { ServerManager, type ServerManagerOptions } from "./server/manager.js";
export {
  buildServeArgs,
  healthUrl,
  serverBaseUrl,
  serverProcessPattern,
  splitCommand,
} from "./server/args.js";
export { httpProbe, type HealthProbe } from "./server/probe.js";
export {
  sweepServerProcesses,
  type ProcessSweeper,
  type SweepResult,
} from "./server/sweep.js";
export { BatchRunner, signalExitCode, type BatchRunnerOptions } from "./batch/runner.js";
export {
  IterationController,
  INTERRUPTED_EXIT_CODE,
  SERVER_START_FAILED_EXIT_CODE,
  type BatchExecutor,
  type IterationControllerOptions,
  type ServerLifecycle,
} from "./loop/controller.js";
export {
  installSignalHandlers,
  type SignalHandlerOptions,
  type SignalListener,
  type SignalTarget,
} from "./signals/handler.js";
export { flushFilesystem } from "./system/sync.js";

export interface SupervisorOptions {
  onEvent?: EventSink;
  clock?: Clock;
  /** Where SIGINT/SIGTERM are received (default: process) */
  signalTarget?: SignalTarget;
  /** Called by the interrupt path (default: process.exit) */
  exit?: (code: number) => void;
}

/** Run the restart loop to completion and report how it ended */
export async function startSupervisor(
  config: SupervisorConfig,
  opts: SupervisorOptions = {}
): Promise<RunOutcome> {
  const onEvent = opts.onEvent ?? (() => {});
  const clock = opts.clock ?? systemClock;

  const manager = new ServerManager({ shutdown: config.shutdown, onEvent, clock });
  const batch = new BatchRunner(config.worker, {
    onEvent,
    clock,
    serverUrl: serverBaseUrl(config.server),
  });
  const controller = new IterationController({
    config,
    server: manager,
    batch,
    clock,
    onEvent,
    flush: () => flushFilesystem(onEvent),
  });

  const abort = new AbortController();
  const uninstall = installSignalHandlers({
    server: manager,
    abort,
    onEvent,
    exit: opts.exit,
    target: opts.signalTarget,
  });

  try {
    return await controller.run(abort.signal);
  } finally {
    // Joins an interrupt-path shutdown that may still be in flight
    await manager.stopActive();
    uninstall();
  }
}
