import { type ChildProcess, spawn as nodeSpawn } from "node:child_process";
import { constants } from "node:os";
import { isErrnoException, SpawnError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  ProcessHandle,
  ProcessManager,
  ProcessSignal,
  SignalOptions,
  SpawnOptions,
} from "../interfaces/process-manager.js";
import { noopLogger } from "../utils/noop-logger.js";

const IS_WINDOWS = process.platform === "win32";

/** Signed return code: the exit status, or the negated signal number. */
export function toReturnCode(code: number | null, signal: NodeJS.Signals | null): number {
  if (signal) return -constants.signals[signal];
  return code ?? 0;
}

/**
 * Node.js process manager using child_process.spawn.
 *
 * Children are spawned detached so each one leads its own process group; a
 * group-wide signal then reaches descendants the child started.
 */
export class NodeProcessManager implements ProcessManager {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  async spawn(options: SpawnOptions): Promise<ProcessHandle> {
    const child = nodeSpawn(options.command, options.args, {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio ?? "inherit",
      detached: !IS_WINDOWS,
    });

    // Subscribe before the spawn event so a fast exit cannot be missed.
    const exited = new Promise<number>((resolve) => {
      child.once("exit", (code, signal) => resolve(toReturnCode(code, signal)));
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        child.off("spawn", onSpawn);
        reject(new SpawnError(options.command, { cause: err }));
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    const pid = child.pid;
    if (typeof pid !== "number") {
      throw new SpawnError(options.command);
    }

    // Post-spawn errors come from failed signal delivery; signal() reports those itself.
    child.on("error", (err) => {
      this.logger.warn("Child process error", { pid, error: err });
    });

    return {
      pid,
      exited,
      signal: (signal: ProcessSignal, signalOptions?: SignalOptions) =>
        this.deliver(child, pid, signal, signalOptions?.group ?? false),
    };
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: the process exists but belongs to someone else.
      return isErrnoException(err) && err.code === "EPERM";
    }
  }

  private deliver(
    child: ChildProcess,
    pid: number,
    signal: ProcessSignal,
    group: boolean,
  ): boolean {
    if (IS_WINDOWS) {
      return child.kill(signal);
    }
    try {
      process.kill(group ? -pid : pid, signal);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ESRCH") {
        return false;
      }
      throw err;
    }
  }
}
