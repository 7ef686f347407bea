import { execa } from "execa";

export interface SweepResult {
  pattern: string;
  /** At least one process matched and was sent SIGKILL */
  matched: boolean;
  /** Set when pkill itself failed */
  error?: string;
}

export type ProcessSweeper = (pattern: string) => Promise<SweepResult>;

/** SIGKILL every process whose full command line matches `pattern` */
export const sweepServerProcesses: ProcessSweeper = async (pattern) => {
  const result = await execa("pkill", ["-9", "-f", pattern], { reject: false });

  // pkill exits 1 when nothing matched
  if (result.exitCode === 0) return { pattern, matched: true };
  if (result.exitCode === 1) return { pattern, matched: false };

  const stderr = typeof result.stderr === "string" ? result.stderr.trim() : "";
  const reason =
    result.exitCode === undefined
      ? "pkill could not be run"
      : `pkill exited with code ${result.exitCode}`;
  return { pattern, matched: false, error: stderr ? `${reason}: ${stderr}` : reason };
};
