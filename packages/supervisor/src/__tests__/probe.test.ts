import { describe, it, expect, vi, afterEach } from "vitest";
import { httpProbe } from "../server/probe.js";

describe("httpProbe", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("is healthy on a 2xx response", async () => {
    const fetchMock = vi.fn(async () => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(httpProbe("http://localhost:8000/health", 2_000)).resolves.toBe(true);
    expect(fetchMock).toHaveBeenCalledWith("http://localhost:8000/health", {
      signal: expect.any(AbortSignal),
    });
  });

  it("is unhealthy on an error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("loading", { status: 503 })));
    await expect(httpProbe("http://localhost:8000/health", 2_000)).resolves.toBe(false);
  });

  it("is unhealthy while the port refuses connections", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    await expect(httpProbe("http://localhost:8000/health", 2_000)).resolves.toBe(false);
  });
});
