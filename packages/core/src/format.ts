import type { SupervisorEvent } from "./protocol/messages.js";
import type { AbortReason } from "./types/iterations.js";

const BANNER_LINE = "=".repeat(40);

/** Render milliseconds as seconds, keeping one decimal only when needed */
export function formatSeconds(ms: number): string {
  return String(Math.round(ms / 100) / 10);
}

export function formatDuration(ms: number): string {
  const secs = Math.floor(ms / 1000);
  if (secs < 60) return `${secs}s`;
  const mins = Math.floor(secs / 60);
  if (mins < 60) return `${mins}m ${secs % 60}s`;
  return `${Math.floor(mins / 60)}h ${mins % 60}m`;
}

/** Events that go to stderr */
export function isFailureEvent(event: SupervisorEvent): boolean {
  switch (event.type) {
    case "server:failed":
    case "server:cleanup-error":
    case "run:aborted":
      return true;
    case "system:sync":
      return !event.payload.ok;
    default:
      return false;
  }
}

/**
 * Format a supervisor event as operator-facing log lines.
 * Returns an empty array for events that are only meant for programmatic sinks.
 */
export function formatEvent(event: SupervisorEvent): string[] {
  switch (event.type) {
    case "run:started":
      return [
        "Starting server + batch processing with periodic server restarts...",
        `Safety limit: ${event.payload.maxIterations} iterations`,
        "Press Ctrl+C to stop",
        "",
      ];

    case "run:completed":
      return ["", `All iterations complete! (${event.payload.iterations})`];

    case "run:aborted":
      return [abortLine(event.payload.reason, event.payload.exitCode, event.payload.iterations)];

    case "iteration:started":
      return [
        "",
        BANNER_LINE,
        `Iteration ${event.payload.iteration}/${event.payload.maxIterations} - Starting server`,
        BANNER_LINE,
      ];

    case "iteration:completed":
      if (event.payload.delayMs > 0) {
        return [
          "",
          `Iteration ${event.payload.iteration} complete. Waiting ${formatSeconds(event.payload.delayMs)} seconds before next iteration...`,
        ];
      }
      return ["", `Iteration ${event.payload.iteration} complete.`];

    case "controller:state":
      return [];

    case "server:spawned":
      return [`Server started with PID: ${event.payload.pid ?? "unknown"}`];

    case "server:waiting":
      return [`Waiting ${formatSeconds(event.payload.delayMs)}s for the server to load...`];

    case "server:probe":
      if (event.payload.ok) return [];
      return [`Waiting for server... (${event.payload.attempt}/${event.payload.maxProbes})`];

    case "server:ready":
      return ["Server is ready!"];

    case "server:failed":
      return [`ERROR: server failed to start or is not responding (${event.payload.reason})`];

    case "server:output":
      return [`[server] ${event.payload.line}`];

    case "server:exited": {
      const { exitCode, signal } = event.payload;
      const how = signal ? `signal ${signal}` : `code ${exitCode ?? "unknown"}`;
      return [`Server process exited unexpectedly (${how})`];
    }

    case "server:stopping":
      return [`Stopping server (PID: ${event.payload.pid ?? "unknown"})...`];

    case "server:force-kill":
      return [
        `Server still running after ${formatSeconds(event.payload.gracePeriodMs)}s, force killing`,
      ];

    case "server:swept":
      if (!event.payload.matched) return [];
      return [`Killed leftover processes matching /${event.payload.pattern}/`];

    case "server:cleanup-error":
      return [`Warning: ${event.payload.step} failed: ${event.payload.message}`];

    case "server:stopped":
      return ["Server stopped"];

    case "batch:started":
      return ["", `Running batch for iteration ${event.payload.iteration}...`];

    case "batch:exited": {
      const run = event.payload;
      const took = formatDuration(run.finishedAt - run.startedAt);
      if (run.error) return [`Batch could not run: ${run.error}`];
      if (run.signal) return [`Batch killed by ${run.signal} after ${took} (exit code ${run.exitCode})`];
      return [`Batch exited with code ${run.exitCode} after ${took}`];
    }

    case "system:sync":
      if (event.payload.ok) return ["Flushed filesystem buffers"];
      return [`Warning: sync failed: ${event.payload.message ?? "unknown error"}`];

    case "signal:received":
      return ["", `Interrupted! (${event.payload.signal})`];
  }
}

function abortLine(reason: AbortReason, exitCode: number, iteration: number): string {
  switch (reason) {
    case "server failed to start":
      return "Failed to start server, exiting";
    case "worker failed":
      return `Worker exited with error code ${exitCode}`;
    case "interrupted":
      return `Interrupted during iteration ${iteration}, exiting`;
  }
}
