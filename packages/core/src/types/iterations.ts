/** Liveness of the current server process */
export type ServerState = "starting" | "ready" | "failed" | "stopped";

/** A launched server. Owned by the server manager; callers only read it. */
export interface ServerHandle {
  /** Sequence number, unique per supervisor run */
  readonly id: number;
  readonly pid: number | undefined;
  readonly port: number;
  readonly startedAt: number;
  state: ServerState;
}

/** Steps of one restart cycle, plus the two terminal states */
export type ControllerState =
  | "idle"
  | "server-starting"
  | "server-ready"
  | "batch-running"
  | "server-stopping"
  | "aborted"
  | "completed";

export interface IterationState {
  /** 1-based; exceeds maxIterations once the loop is done */
  iteration: number;
  maxIterations: number;
  lastExitCode: number | null;
}

/** One worker invocation */
export interface WorkerRun {
  iteration: number;
  startedAt: number;
  finishedAt: number;
  exitCode: number;
  /** Set when the worker was killed by a signal */
  signal?: string;
  /** Set when the worker could not be launched at all */
  error?: string;
}

export type ReadyResult = "ready" | "failed";

export type AbortReason = "server failed to start" | "worker failed" | "interrupted";

export type RunOutcome =
  | { status: "completed"; iterations: number; exitCode: 0 }
  | { status: "aborted"; reason: AbortReason; iterations: number; exitCode: number };
