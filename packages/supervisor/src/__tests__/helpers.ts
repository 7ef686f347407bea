import { PassThrough } from "node:stream";
import { vi } from "vitest";
import { DEFAULT_CONFIG, type SupervisorConfig, type SupervisorEvent } from "@respawn/core";
import type { Clock } from "../clock.js";

/**
 * Clock whose sleeps advance virtual time and resolve on the next macrotask,
 * after every already-settled promise chain has run.
 */
export function createManualClock(start = 0) {
  let now = start;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => now,
    async sleep(ms, signal) {
      sleeps.push(ms);
      if (!signal?.aborted) now += ms;
      await new Promise<void>((resolve) => setImmediate(resolve));
    },
  };
  return { clock, sleeps, elapsed: () => now - start };
}

export interface FakeResult {
  exitCode?: number;
  signal?: string;
  failed: boolean;
  stderr: string;
}

/** Stand-in for an execa ResultPromise */
export function createFakeChild(
  pid: number,
  { exitOn = ["SIGTERM", "SIGKILL"] }: { exitOn?: string[] } = {}
) {
  let settle: (result: FakeResult) => void = () => {};
  const promise = new Promise<FakeResult>((resolve) => {
    settle = resolve;
  });
  let exited = false;

  const exit = (result: FakeResult) => {
    if (exited) return;
    exited = true;
    settle(result);
  };

  const kill = vi.fn((signal: string = "SIGTERM") => {
    if (exited) return false;
    if (exitOn.includes(signal)) exit({ signal, failed: true, stderr: "" });
    return true;
  });

  return Object.assign(promise, {
    pid,
    kill,
    exit,
    stdout: new PassThrough(),
    stderr: new PassThrough(),
  });
}

export type FakeChild = ReturnType<typeof createFakeChild>;

export function recordEvents() {
  const events: SupervisorEvent[] = [];
  const onEvent = (event: SupervisorEvent) => {
    events.push(event);
  };
  const types = () => events.map((e) => e.type);
  return { events, onEvent, types };
}

export function testConfig(overrides: Partial<SupervisorConfig> = {}): SupervisorConfig {
  return {
    ...DEFAULT_CONFIG,
    server: { ...DEFAULT_CONFIG.server, extraArgs: [...DEFAULT_CONFIG.server.extraArgs] },
    worker: { ...DEFAULT_CONFIG.worker },
    ...overrides,
  };
}

/** Let pending promise chains settle */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
