/**
 * Public test utilities — exported from the `"procwarden/testing"` entry point.
 * Consumers can drive a SupervisedProcess deterministically without real children.
 */
export type { MockProcessHandle } from "./testing/mock-process-manager.js";
export { MockProcessManager } from "./testing/mock-process-manager.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
