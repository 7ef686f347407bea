import { execa } from "execa";
import type { EventSink } from "@respawn/core";

/** Flush filesystem buffers so the next server starts against clean page cache accounting */
export async function flushFilesystem(onEvent: EventSink): Promise<void> {
  const result = await execa("sync", [], { reject: false });
  if (result.failed) {
    onEvent({
      type: "system:sync",
      payload: { ok: false, message: `sync exited with code ${result.exitCode ?? "unknown"}` },
    });
    return;
  }
  onEvent({ type: "system:sync", payload: { ok: true } });
}
