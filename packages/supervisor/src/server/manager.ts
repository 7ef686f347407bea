import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { execa } from "execa";
import {
  errorMessage,
  type CleanupStep,
  type EventSink,
  type ReadinessConfig,
  type ReadyResult,
  type ServerConfig,
  type ServerHandle,
  type ShutdownConfig,
  type SupervisorEvent,
} from "@respawn/core";
import { systemClock, type Clock } from "../clock.js";
import {
  buildServeArgs,
  healthUrl,
  serverProcessPattern,
  splitCommand,
} from "./args.js";
import { httpProbe, type HealthProbe } from "./probe.js";
import { sweepServerProcesses, type ProcessSweeper } from "./sweep.js";

function launchServer(config: ServerConfig) {
  const { file, args } = splitCommand(config.command);
  return execa(file, [...args, ...buildServeArgs(config)], {
    stdout: "pipe",
    stderr: "pipe",
    // Output is relayed as it arrives; keeping it would grow without bound
    // and trip maxBuffer on a long-lived server
    buffer: false,
    reject: false,
  });
}

type ServerChild = ReturnType<typeof launchServer>;

interface ManagedServer {
  handle: ServerHandle;
  config: ServerConfig;
  process: ServerChild;
  exited: Promise<void>;
  hasExited: boolean;
  exitCode: number | undefined;
  /** Shared by every caller of stop() so shutdown runs once */
  stopping: Promise<void> | null;
}

export interface ServerManagerOptions {
  shutdown: ShutdownConfig;
  onEvent?: EventSink;
  clock?: Clock;
  probe?: HealthProbe;
  sweep?: ProcessSweeper;
}

/**
 * Owns the single inference server slot.
 *
 * - start() refuses to launch while a previous server still occupies the slot
 * - stop() is idempotent: concurrent and repeated calls share one shutdown,
 *   and the slot is cleared only once that shutdown has finished
 * - stop() never rejects; cleanup failures are reported as events
 */
export class ServerManager {
  private active: ManagedServer | null = null;
  private nextId = 1;
  private shutdown: ShutdownConfig;
  private clock: Clock;
  private probe: HealthProbe;
  private sweeper: ProcessSweeper;
  private onEvent: EventSink;

  constructor(opts: ServerManagerOptions) {
    this.shutdown = opts.shutdown;
    this.clock = opts.clock ?? systemClock;
    this.probe = opts.probe ?? httpProbe;
    this.sweeper = opts.sweep ?? sweepServerProcesses;
    this.onEvent = opts.onEvent ?? (() => {});
  }

  /** Launch the server. Returns right after spawn; readiness is waitReady's job. */
  start(config: ServerConfig): ServerHandle {
    if (this.active) {
      const { id, pid, state } = this.active.handle;
      throw new Error(
        `Server ${id} (PID ${pid ?? "unknown"}) is still ${state}; stop it before starting another`
      );
    }

    const child = launchServer(config);
    const handle: ServerHandle = {
      id: this.nextId++,
      pid: child.pid,
      port: config.port,
      startedAt: this.clock.now(),
      state: "starting",
    };

    const managed: ManagedServer = {
      handle,
      config,
      process: child,
      exited: Promise.resolve(),
      hasExited: false,
      exitCode: undefined,
      stopping: null,
    };

    this.relayOutput(child.stdout, "stdout");
    this.relayOutput(child.stderr, "stderr");

    const onExit = (result: { exitCode?: number; signal?: string }) => {
      managed.hasExited = true;
      managed.exitCode = result.exitCode;
      if (!managed.stopping) {
        this.emit({
          type: "server:exited",
          payload: { pid: handle.pid, exitCode: result.exitCode, signal: result.signal },
        });
      }
    };
    managed.exited = child.then(onExit, (err: unknown) =>
      onExit({ exitCode: undefined, signal: undefined, ...exitFields(err) })
    );

    this.active = managed;
    this.emit({ type: "server:spawned", payload: { id: handle.id, pid: handle.pid, port: config.port } });
    return handle;
  }

  /**
   * Wait `initialDelayMs`, then probe the health endpoint up to `maxProbes` times.
   * Fails early if the process exits or `signal` aborts. Never relaunches.
   */
  async waitReady(
    handle: ServerHandle,
    readiness: ReadinessConfig,
    signal?: AbortSignal
  ): Promise<ReadyResult> {
    const managed = this.lookup(handle);
    if (!managed) return "failed";

    const url = healthUrl(managed.config);
    const deadline =
      this.clock.now() + readiness.initialDelayMs + readiness.maxProbes * readiness.probeIntervalMs;

    this.emit({ type: "server:waiting", payload: { delayMs: readiness.initialDelayMs } });
    await this.clock.sleep(readiness.initialDelayMs, signal);

    for (let attempt = 1; attempt <= readiness.maxProbes; attempt++) {
      // The interrupt path owns shutdown; nothing to report here
      if (signal?.aborted) return "failed";
      if (managed.hasExited) {
        return this.markFailed(managed, `process exited with code ${managed.exitCode ?? "unknown"}`);
      }
      if (this.clock.now() > deadline) break;

      const ok = await this.probe(url, readiness.probeTimeoutMs);
      this.emit({ type: "server:probe", payload: { attempt, maxProbes: readiness.maxProbes, ok } });
      if (ok) {
        handle.state = "ready";
        this.emit({ type: "server:ready", payload: { pid: handle.pid } });
        return "ready";
      }

      if (attempt < readiness.maxProbes) {
        await this.clock.sleep(readiness.probeIntervalMs, signal);
      }
    }

    return this.markFailed(managed, `no healthy response from ${url} after ${readiness.maxProbes} probes`);
  }

  /**
   * SIGTERM, wait up to `gracePeriodMs`, then SIGKILL the handle and sweep any
   * process matching the server's command-line signature. The sweep also runs
   * after a clean exit unless `shutdown.alwaysSweep` is off.
   */
  stop(handle: ServerHandle, gracePeriodMs: number = this.shutdown.gracePeriodMs): Promise<void> {
    const managed = this.active;
    if (!managed || managed.handle !== handle) return Promise.resolve();

    if (!managed.stopping) {
      managed.stopping = this.terminate(managed, gracePeriodMs).finally(() => {
        if (this.active === managed) this.active = null;
      });
    }
    return managed.stopping;
  }

  /** Stop whatever server occupies the slot, if any */
  stopActive(): Promise<void> {
    if (!this.active) return Promise.resolve();
    return this.stop(this.active.handle);
  }

  /** The server currently occupying the slot */
  getActive(): ServerHandle | null {
    return this.active?.handle ?? null;
  }

  /** Re-emit whole lines; a line split across chunks is joined first */
  private relayOutput(stream: Readable | null, name: "stdout" | "stderr"): void {
    if (!stream) return;
    createInterface({ input: stream, crlfDelay: Infinity }).on("line", (line: string) => {
      if (line) this.emit({ type: "server:output", payload: { stream: name, line } });
    });
  }

  private lookup(handle: ServerHandle): ManagedServer | null {
    return this.active?.handle === handle ? this.active : null;
  }

  private markFailed(managed: ManagedServer, reason: string): ReadyResult {
    if (managed.handle.state !== "stopped") managed.handle.state = "failed";
    this.emit({ type: "server:failed", payload: { reason } });
    return "failed";
  }

  private async terminate(managed: ManagedServer, gracePeriodMs: number): Promise<void> {
    const { handle } = managed;
    this.emit({ type: "server:stopping", payload: { pid: handle.pid } });

    try {
      if (!managed.hasExited) this.sendSignal(managed, "SIGTERM");

      if (await this.waitForExit(managed, gracePeriodMs)) {
        // Servers fork engine workers that can outlive the parent
        if (this.shutdown.alwaysSweep) await this.sweep(managed);
      } else {
        this.emit({ type: "server:force-kill", payload: { pid: handle.pid, gracePeriodMs } });
        this.sendSignal(managed, "SIGKILL");
        await this.sweep(managed);
        if (!(await this.waitForExit(managed, gracePeriodMs))) {
          this.cleanupError("exit-wait", `PID ${handle.pid ?? "unknown"} still running after SIGKILL`);
        }
      }
    } catch (err) {
      this.cleanupError("stop", errorMessage(err));
    }

    handle.state = "stopped";
    this.emit({ type: "server:stopped", payload: { pid: handle.pid } });
  }

  private sendSignal(managed: ManagedServer, signal: "SIGTERM" | "SIGKILL"): void {
    try {
      if (!managed.process.kill(signal)) {
        this.cleanupError(signal, "signal not delivered (process already gone)");
      }
    } catch (err) {
      this.cleanupError(signal, errorMessage(err));
    }
  }

  /** Resolves true if the process exited within `ms` */
  private async waitForExit(managed: ManagedServer, ms: number): Promise<boolean> {
    if (managed.hasExited) return true;
    const timer = new AbortController();
    const exited = await Promise.race([
      managed.exited.then(() => true),
      this.clock.sleep(ms, timer.signal).then(() => false),
    ]);
    timer.abort();
    return exited || managed.hasExited;
  }

  private async sweep(managed: ManagedServer): Promise<void> {
    const result = await this.sweeper(serverProcessPattern(managed.config));
    if (result.error) {
      this.cleanupError("sweep", result.error);
      return;
    }
    this.emit({ type: "server:swept", payload: { pattern: result.pattern, matched: result.matched } });
  }

  private cleanupError(step: CleanupStep, message: string): void {
    this.emit({ type: "server:cleanup-error", payload: { step, message } });
  }

  private emit(event: SupervisorEvent): void {
    this.onEvent(event);
  }
}

/** exitCode/signal carried by an execa error, when present */
function exitFields(err: unknown): { exitCode?: number; signal?: string } {
  if (typeof err !== "object" || err === null) return {};
  const fields: { exitCode?: number; signal?: string } = {};
  if ("exitCode" in err && typeof err.exitCode === "number") fields.exitCode = err.exitCode;
  if ("signal" in err && typeof err.signal === "string") fields.signal = err.signal;
  return fields;
}
