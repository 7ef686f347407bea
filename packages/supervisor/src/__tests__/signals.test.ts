import { EventEmitter } from "node:events";
import { describe, it, expect, vi } from "vitest";
import { installSignalHandlers } from "../signals/handler.js";
import { flushPromises, recordEvents } from "./helpers.js";

function setup(stopActive: () => Promise<void> = async () => {}) {
  const target = new EventEmitter();
  const abort = new AbortController();
  const server = { stopActive: vi.fn(stopActive) };
  const exit = vi.fn();
  const recorder = recordEvents();
  const uninstall = installSignalHandlers({
    server,
    abort,
    exit,
    target,
    onEvent: recorder.onEvent,
  });
  return { target, abort, server, exit, uninstall, ...recorder };
}

describe("installSignalHandlers", () => {
  it("aborts the loop, stops the server and exits 1", async () => {
    const { target, abort, server, exit, events } = setup();

    target.emit("SIGINT", "SIGINT");
    await flushPromises();

    expect(abort.signal.aborted).toBe(true);
    expect(server.stopActive).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
    expect(events).toEqual([{ type: "signal:received", payload: { signal: "SIGINT" } }]);
  });

  it("handles SIGTERM the same way", async () => {
    const { target, exit } = setup();

    target.emit("SIGTERM", "SIGTERM");
    await flushPromises();

    expect(exit).toHaveBeenCalledWith(1);
  });

  it("ignores repeated signals during shutdown", async () => {
    const { target, server, exit } = setup();

    target.emit("SIGINT", "SIGINT");
    target.emit("SIGINT", "SIGINT");
    target.emit("SIGTERM", "SIGTERM");
    await flushPromises();

    expect(server.stopActive).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it("waits for the server to stop before exiting", async () => {
    let finishStop: () => void = () => {};
    const { target, exit } = setup(
      () =>
        new Promise<void>((resolve) => {
          finishStop = resolve;
        })
    );

    target.emit("SIGINT", "SIGINT");
    await flushPromises();
    expect(exit).not.toHaveBeenCalled();

    finishStop();
    await flushPromises();
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("still exits when stopping the server fails", async () => {
    const { target, exit, events } = setup(async () => {
      throw new Error("kill failed");
    });

    target.emit("SIGINT", "SIGINT");
    await flushPromises();

    expect(events).toContainEqual({
      type: "server:cleanup-error",
      payload: { step: "stop", message: "kill failed" },
    });
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("refuses a second install on the same target", () => {
    const { target, uninstall } = setup();

    expect(() =>
      installSignalHandlers({
        server: { stopActive: async () => {} },
        abort: new AbortController(),
        target,
        exit: vi.fn(),
      })
    ).toThrow("Signal handlers are already installed");
    uninstall();
  });

  it("removes its listeners on uninstall", () => {
    const { target, uninstall } = setup();
    expect(target.listenerCount("SIGINT")).toBe(1);

    uninstall();

    expect(target.listenerCount("SIGINT")).toBe(0);
    expect(target.listenerCount("SIGTERM")).toBe(0);
  });
});
