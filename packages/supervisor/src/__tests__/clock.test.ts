import { describe, it, expect, vi, afterEach } from "vitest";
import { systemClock } from "../clock.js";

describe("systemClock.sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the given time", async () => {
    vi.useFakeTimers();
    let done = false;
    const sleeping = systemClock.sleep(5_000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(4_999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toBe(true);
  });

  it("resolves immediately for an aborted signal", async () => {
    const abort = new AbortController();
    abort.abort();
    await expect(systemClock.sleep(60_000, abort.signal)).resolves.toBeUndefined();
  });

  it("wakes up early when the signal aborts", async () => {
    vi.useFakeTimers();
    const abort = new AbortController();
    const sleeping = systemClock.sleep(60_000, abort.signal);

    abort.abort();

    await expect(sleeping).resolves.toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
  });
});
