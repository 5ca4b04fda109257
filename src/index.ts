/**
 * procwarden public API barrel.
 *
 * Re-exports the supervisor, its process-manager seam, the loggers, config
 * helpers and the error hierarchy.
 * @module
 */

export { NodeProcessManager, toReturnCode } from "./adapters/node-process-manager.js";
export type { LogLevelName, StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { ProcessConfigInput } from "./config/config-schema.js";
export { processConfigSchema } from "./config/config-schema.js";
export type { ProcessState } from "./core/process-state.js";
export { isProcessTransitionAllowed, isTerminalState, PROCESS_STATES } from "./core/process-state.js";
export type {
  SupervisedProcessEventMap,
  SupervisedProcessOptions,
} from "./core/supervised-process.js";
export { SupervisedProcess } from "./core/supervised-process.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
export type { SignalHandlerOptions } from "./daemon/signal-handler.js";
export { registerSignalHandlers, terminateAll } from "./daemon/signal-handler.js";
export {
  ConfigError,
  errorMessage,
  isErrnoException,
  KilledProcessError,
  ProcwardenError,
  SpawnError,
  toProcwardenError,
} from "./errors.js";
export type { Logger } from "./interfaces/logger.js";
export type {
  ProcessHandle,
  ProcessManager,
  ProcessSignal,
  SignalOptions,
  SpawnOptions,
} from "./interfaces/process-manager.js";
export type { ProcessConfig, ResolvedProcessConfig } from "./types/config.js";
export { DEFAULT_PROCESS_CONFIG, loadProcessConfig, resolveProcessConfig } from "./types/config.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
