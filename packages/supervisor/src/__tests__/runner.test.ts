import { describe, it, expect, vi, beforeEach } from "vitest";
import { execa } from "execa";
import { BatchRunner, signalExitCode } from "../batch/runner.js";
import { createManualClock, recordEvents } from "./helpers.js";

vi.mock("execa", () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

const worker = { command: "python ocr/run_batch_ocr.py", batchSize: 100 };

describe("signalExitCode", () => {
  it("follows the 128 + signal number convention", () => {
    expect(signalExitCode("SIGTERM")).toBe(143);
    expect(signalExitCode("SIGKILL")).toBe(137);
  });
});

describe("BatchRunner", () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it("runs the worker with inherited stdio and env hints", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 0 } as never);
    const runner = new BatchRunner(
      { ...worker, cwd: "/data/jobs" },
      { serverUrl: "http://localhost:8000/v1" }
    );

    const run = await runner.run(3);

    expect(execaMock).toHaveBeenCalledWith("python", ["ocr/run_batch_ocr.py"], {
      cwd: "/data/jobs",
      env: {
        RESPAWN_ITERATION: "3",
        RESPAWN_BATCH_SIZE: "100",
        RESPAWN_SERVER_URL: "http://localhost:8000/v1",
      },
      stdio: "inherit",
      reject: false,
      cancelSignal: undefined,
    });
    expect(run.exitCode).toBe(0);
    expect(run.iteration).toBe(3);
  });

  it("returns the worker's exit code and timing", async () => {
    const { clock } = createManualClock(1_000);
    const { events, onEvent } = recordEvents();
    execaMock.mockResolvedValueOnce({ exitCode: 2 } as never);
    const runner = new BatchRunner(worker, { clock, onEvent });

    const run = await runner.run(1);

    expect(run).toEqual({ iteration: 1, startedAt: 1_000, finishedAt: 1_000, exitCode: 2 });
    expect(events).toEqual([
      { type: "batch:started", payload: { iteration: 1 } },
      { type: "batch:exited", payload: run },
    ]);
  });

  it("maps a signal death to 128 + n", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: undefined, signal: "SIGTERM" } as never);

    const run = await new BatchRunner(worker).run(1);

    expect(run.exitCode).toBe(143);
    expect(run.signal).toBe("SIGTERM");
  });

  it("reports a worker that cannot be launched as exit code 1", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: undefined, failed: true } as never);

    const run = await new BatchRunner(worker).run(1);

    expect(run.exitCode).toBe(1);
    expect(run.error).toBe('could not launch "python ocr/run_batch_ocr.py"');
  });

  it("hands the abort signal to execa", async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 0 } as never);
    const abort = new AbortController();

    await new BatchRunner(worker).run(1, abort.signal);

    expect(execaMock.mock.calls[0]?.[2]).toMatchObject({ cancelSignal: abort.signal });
  });
});
