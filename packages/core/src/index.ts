// Types
export type {
  SupervisorConfig,
  ServerConfig,
  ReadinessConfig,
  ShutdownConfig,
  WorkerConfig,
} from "./types/config.js";
export { DEFAULT_CONFIG } from "./types/config.js";
export type {
  ServerState,
  ServerHandle,
  ControllerState,
  IterationState,
  WorkerRun,
  ReadyResult,
  AbortReason,
  RunOutcome,
} from "./types/iterations.js";

// Protocol
export type {
  SupervisorEvent,
  SupervisorEventType,
  EventSink,
  CleanupStep,
} from "./protocol/messages.js";

// Config validation
export {
  supervisorConfigSchema,
  validateConfig,
  parseConfig,
  formatConfigIssues,
} from "./config/schema.js";
export type { ConfigValidation } from "./config/schema.js";

// Formatting
export { formatEvent, formatSeconds, formatDuration, isFailureEvent } from "./format.js";

export { errorMessage } from "./errors.js";
