import { formatEvent, isFailureEvent, type EventSink } from "@respawn/core";

export interface ReporterOutput {
  log(line: string): void;
  error(line: string): void;
}

/** Event sink that prints each event as log lines; failures go to stderr */
export function createReporter(out: ReporterOutput = console): EventSink {
  return (event) => {
    const write = isFailureEvent(event) ? out.error : out.log;
    for (const line of formatEvent(event)) {
      write.call(out, line);
    }
  };
}
