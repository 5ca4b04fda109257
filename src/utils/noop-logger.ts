import type { Logger } from "../interfaces/logger.js";

/** Discards everything; the default when a caller injects no logger. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
