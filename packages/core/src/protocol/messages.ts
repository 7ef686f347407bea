import type {
  AbortReason,
  ControllerState,
  WorkerRun,
} from "../types/iterations.js";

/** Cleanup steps whose failures are logged and then ignored */
export type CleanupStep = "SIGTERM" | "SIGKILL" | "sweep" | "stop" | "exit-wait";

// --- Supervisor → reporter events ---

export type SupervisorEvent =
  | { type: "run:started"; payload: { maxIterations: number } }
  | { type: "run:completed"; payload: { iterations: number } }
  | { type: "run:aborted"; payload: { reason: AbortReason; exitCode: number; iterations: number } }
  | { type: "iteration:started"; payload: { iteration: number; maxIterations: number } }
  | { type: "iteration:completed"; payload: { iteration: number; delayMs: number } }
  | { type: "controller:state"; payload: { from: ControllerState; to: ControllerState } }
  | { type: "server:spawned"; payload: { id: number; pid: number | undefined; port: number } }
  | { type: "server:waiting"; payload: { delayMs: number } }
  | { type: "server:probe"; payload: { attempt: number; maxProbes: number; ok: boolean } }
  | { type: "server:ready"; payload: { pid: number | undefined } }
  | { type: "server:failed"; payload: { reason: string } }
  | { type: "server:output"; payload: { stream: "stdout" | "stderr"; line: string } }
  | { type: "server:exited"; payload: { pid: number | undefined; exitCode: number | undefined; signal: string | undefined } }
  | { type: "server:stopping"; payload: { pid: number | undefined } }
  | { type: "server:force-kill"; payload: { pid: number | undefined; gracePeriodMs: number } }
  | { type: "server:swept"; payload: { pattern: string; matched: boolean } }
  | { type: "server:cleanup-error"; payload: { step: CleanupStep; message: string } }
  | { type: "server:stopped"; payload: { pid: number | undefined } }
  | { type: "batch:started"; payload: { iteration: number } }
  | { type: "batch:exited"; payload: WorkerRun }
  | { type: "system:sync"; payload: { ok: boolean; message?: string } }
  | { type: "signal:received"; payload: { signal: string } };

export type SupervisorEventType = SupervisorEvent["type"];

export type EventSink = (event: SupervisorEvent) => void;
