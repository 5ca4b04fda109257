import { NodeProcessManager } from "../adapters/node-process-manager.js";
import { KilledProcessError, ProcwardenError, SpawnError, toProcwardenError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  ProcessHandle,
  ProcessManager,
  ProcessSignal,
  SpawnOptions,
} from "../interfaces/process-manager.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { ProcessState } from "./process-state.js";
import { isProcessTransitionAllowed } from "./process-state.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface SupervisedProcessEventMap {
  "process:spawned": { name: string; pid: number };
  "process:exited": { name: string; pid: number; returncode: number; uptimeMs: number };
  "process:restarting": { name: string; previousPid: number; returncode: number };
  "state:changed": { name: string; from: ProcessState; to: ProcessState };
  error: { source: string; error: Error; name: string };
}

export interface SupervisedProcessOptions {
  /** Identity used in logs and event payloads. */
  name: string;
  command: string;
  args?: readonly string[];
  /** Relaunch the command whenever it exits on its own, whatever its exit status. */
  alwaysRestart?: boolean;
  cwd?: string;
  /** Merged over the parent's environment. */
  env?: Record<string, string | undefined>;
  stdio?: "inherit" | "ignore";
  processManager?: ProcessManager;
  logger?: Logger;
}

interface KillRequest {
  signal: ProcessSignal;
  group: boolean;
}

const TERMINATE: KillRequest = { signal: "SIGTERM", group: true };
const KILL: KillRequest = { signal: "SIGKILL", group: false };

/**
 * Supervises one external process.
 *
 * `start()` spawns the command and hands the child to a detached monitor that
 * awaits its exit. On exit the monitor either relaunches it (`alwaysRestart`)
 * or settles in "exited". `terminate()` and `kill()` mark the exit as
 * requested, signal the child and wait for the monitor to settle in "killed",
 * from which no operation succeeds again.
 *
 * There is at most one live child at a time; a relaunch only happens after
 * the previous child has been reaped.
 */
export class SupervisedProcess extends TypedEventEmitter<SupervisedProcessEventMap> {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly alwaysRestart: boolean;

  private readonly spawnOptions: SpawnOptions;
  private readonly processManager: ProcessManager;
  private readonly logger: Logger;

  private _state: ProcessState = "not_started";
  private _pid: number | undefined;
  private _returncode: number | undefined;
  private handle: ProcessHandle | null = null;
  private spawnedAt = 0;
  private killRequest: KillRequest | null = null;
  private starting: Promise<void> | null = null;
  private respawning: Promise<ProcessHandle> | null = null;
  private monitor: Promise<void> | null = null;

  constructor(options: SupervisedProcessOptions) {
    super();
    this.name = options.name;
    this.command = options.command;
    this.args = [...(options.args ?? [])];
    this.alwaysRestart = options.alwaysRestart ?? false;
    this.logger = options.logger ?? noopLogger;
    this.processManager =
      options.processManager ?? new NodeProcessManager({ logger: this.logger });
    this.spawnOptions = {
      command: this.command,
      args: [...this.args],
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : undefined,
      stdio: options.stdio ?? "inherit",
    };
  }

  get state(): ProcessState {
    return this._state;
  }

  /** True while a child is alive and has not been observed to exit. */
  get running(): boolean {
    return this._state === "running" && this.handle !== null;
  }

  /** Pid of the current child, or of the last one once it has exited. */
  get pid(): number | undefined {
    return this._pid;
  }

  /** Last observed return code; `-N` when the child died from signal N. */
  get returncode(): number | undefined {
    return this._returncode;
  }

  get killRequested(): boolean {
    return this.killRequest !== null;
  }

  /**
   * Spawn the command. Resolves once the child is alive; a no-op while it
   * already runs. Rejects with `SpawnError` when the command cannot be
   * started, leaving the state unchanged.
   */
  async start(): Promise<void> {
    this.assertNotKilled();
    if (this._state === "running") {
      // Between an exit and the relaunch there is no child yet; wait for the replacement.
      if (this.handle === null && this.respawning) {
        await Promise.allSettled([this.respawning]);
        return this.start();
      }
      return;
    }

    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  /** SIGTERM to the child's process group, then wait until it is reaped. */
  terminate(): Promise<void> {
    return this.signalAndWait(TERMINATE);
  }

  /** SIGKILL to the child, then wait until it is reaped. */
  kill(): Promise<void> {
    return this.signalAndWait(KILL);
  }

  private async launch(): Promise<void> {
    const handle = await this.spawnChild();
    this.transition("running");
    this.monitor = this.monitorExit(handle).catch((err) => this.onMonitorFailure(err));
  }

  private assertNotKilled(): void {
    if (this._state === "killed") throw new KilledProcessError(this.name);
  }

  private async signalAndWait(request: KillRequest): Promise<void> {
    this.assertNotKilled();

    if (this.starting) {
      await Promise.allSettled([this.starting]);
      this.assertNotKilled();
    }
    if (this._state !== "running") return;

    const previous = this.killRequest;
    this.killRequest = request;
    this.logger.info("Stopping supervised process", {
      name: this.name,
      pid: this._pid,
      signal: request.signal,
    });

    // No handle means the monitor is between exit and respawn; it will see the request.
    if (this.handle) {
      try {
        this.deliver(this.handle, request);
      } catch (err) {
        this.killRequest = previous;
        throw toProcwardenError(err);
      }
    }
    await this.monitor;
  }

  private deliver(handle: ProcessHandle, request: KillRequest): void {
    const delivered = handle.signal(request.signal, { group: request.group });
    if (!delivered) {
      this.logger.debug?.("Signal target already exited", {
        name: this.name,
        pid: handle.pid,
        signal: request.signal,
      });
    }
  }

  private async spawnChild(): Promise<ProcessHandle> {
    this.logger.info("Spawning supervised process", {
      name: this.name,
      command: this.command,
      args: this.args.join(" "),
    });

    let handle: ProcessHandle;
    try {
      handle = await this.processManager.spawn(this.spawnOptions);
    } catch (err) {
      const error = err instanceof SpawnError ? err : new SpawnError(this.command, { cause: err });
      this.logger.error("Failed to spawn supervised process", { name: this.name, error });
      throw error;
    }

    this.handle = handle;
    this._pid = handle.pid;
    this.spawnedAt = Date.now();
    this.notify("process:spawned", { name: this.name, pid: handle.pid });
    return handle;
  }

  // ---------------------------------------------------------------------------
  // Exit monitoring
  // ---------------------------------------------------------------------------

  private async monitorExit(first: ProcessHandle): Promise<void> {
    let handle = first;

    for (;;) {
      const returncode = await handle.exited;
      const uptimeMs = Date.now() - this.spawnedAt;
      this._returncode = returncode;
      this.handle = null;

      this.logger.info("Supervised process exited", {
        name: this.name,
        pid: handle.pid,
        returncode,
        uptimeMs,
      });
      this.notify("process:exited", { name: this.name, pid: handle.pid, returncode, uptimeMs });

      if (this.killRequest) {
        this.transition("killed");
        return;
      }
      if (!this.alwaysRestart) {
        this.transition("exited");
        return;
      }

      this.logger.info("Restarting supervised process", {
        name: this.name,
        previousPid: handle.pid,
        returncode,
      });
      this.notify("process:restarting", { name: this.name, previousPid: handle.pid, returncode });

      // A listener above may already have asked for the process to stop.
      if (this.killRequest) {
        this.transition("killed");
        return;
      }

      const respawn = this.spawnChild();
      this.respawning = respawn;
      try {
        handle = await respawn;
      } catch (err) {
        this.reportError("monitor:respawn", err);
        // A stop requested while the respawn was in flight still ends in "killed".
        this.transition(this.killRequest ? "killed" : "exited");
        return;
      } finally {
        this.respawning = null;
      }

      // terminate()/kill() landed while the spawn was in flight.
      const pending = this.killRequest;
      if (pending) {
        try {
          this.deliver(handle, pending);
        } catch (err) {
          this.reportError("monitor:signal", err);
        }
      }
      this.transition("running");
    }
  }

  private onMonitorFailure(err: unknown): void {
    this.reportError("monitor", err);
    this.handle = null;
    if (this._state === "running") {
      this.transition(this.killRequest ? "killed" : "exited");
    }
  }

  private transition(to: ProcessState): void {
    const from = this._state;
    if (!isProcessTransitionAllowed(from, to)) {
      throw new ProcwardenError(
        `Invalid state transition for "${this.name}": ${from} -> ${to}`,
        "INVALID_TRANSITION",
      );
    }
    this._state = to;
    if (from !== to) {
      this.notify("state:changed", { name: this.name, from, to });
    }
  }

  private reportError(source: string, err: unknown): void {
    const error = toProcwardenError(err);
    this.logger.error("Supervised process error", { name: this.name, source, error });
    if (this.listenerCount("error") > 0) {
      this.notify("error", { source, error, name: this.name });
    }
  }

  /** Emit without letting a throwing listener break the control loop. */
  private notify<K extends keyof SupervisedProcessEventMap & string>(
    event: K,
    payload: SupervisedProcessEventMap[K],
  ): void {
    try {
      this.emit(event, payload);
    } catch (err) {
      this.logger.error("Event listener failed", { name: this.name, event, error: err });
    }
  }
}
