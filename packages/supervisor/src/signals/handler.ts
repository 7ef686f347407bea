import { errorMessage, type EventSink } from "@respawn/core";
import { INTERRUPTED_EXIT_CODE } from "../loop/controller.js";

export type SignalListener = (signal: NodeJS.Signals) => void;

/** The subset of `process` the handler needs; tests pass an EventEmitter */
export interface SignalTarget {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface SignalHandlerOptions {
  server: { stopActive(): Promise<void> };
  /** Aborted on the first signal so the loop stops mid-probe or mid-batch */
  abort: AbortController;
  onEvent?: EventSink;
  exit?: (code: number) => void;
  target?: SignalTarget;
  signals?: NodeJS.Signals[];
}

const installedTargets = new WeakSet<SignalTarget>();

/**
 * On SIGINT/SIGTERM: abort the loop, stop the live server, exit non-zero.
 * Repeated signals during shutdown are ignored. Returns an uninstaller.
 */
export function installSignalHandlers(opts: SignalHandlerOptions): () => void {
  const target: SignalTarget = opts.target ?? process;
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];
  const onEvent = opts.onEvent ?? (() => {});
  const exit = opts.exit ?? ((code: number) => process.exit(code));

  if (installedTargets.has(target)) {
    throw new Error("Signal handlers are already installed");
  }
  installedTargets.add(target);

  // Guard against double invocation
  let isShuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    onEvent({ type: "signal:received", payload: { signal } });
    opts.abort.abort();
    try {
      await opts.server.stopActive();
    } catch (err) {
      onEvent({ type: "server:cleanup-error", payload: { step: "stop", message: errorMessage(err) } });
    }
    exit(INTERRUPTED_EXIT_CODE);
  };

  const listener: SignalListener = (signal) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    void shutdown(signal);
  };

  for (const signal of signals) target.on(signal, listener);

  return () => {
    for (const signal of signals) target.off(signal, listener);
    installedTargets.delete(target);
  };
}
