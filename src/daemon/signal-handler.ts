import type { SupervisedProcess } from "../core/supervised-process.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;
const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
  /** Exit code used once cleanup has finished. */
  exitCode?: number;
}

/**
 * Register SIGTERM and SIGINT handlers that run a cleanup function before exiting.
 * Force-exits with 1 after `timeoutMs` if cleanup stalls. Returns a function that
 * removes the handlers again.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const exitCode = options.exitCode ?? 0;
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown cleanup timed out", { timeoutMs });
      process.exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup()
      .catch((err) => {
        logger.error("Shutdown cleanup failed", { error: err });
      })
      .finally(() => {
        clearTimeout(forceTimer);
        process.exit(exitCode);
      });
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, handler);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, handler);
    }
  };
}

/** Terminate every supervised process that is still running or restarting. */
export async function terminateAll(processes: Iterable<SupervisedProcess>): Promise<void> {
  const pending: Promise<void>[] = [];
  for (const proc of processes) {
    if (proc.state === "running") pending.push(proc.terminate());
  }
  await Promise.all(pending);
}
