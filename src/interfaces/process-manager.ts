/** Signals the supervisor delivers to a child. */
export type ProcessSignal = "SIGTERM" | "SIGKILL" | "SIGINT" | "SIGHUP";

export interface SignalOptions {
  /** Deliver to the whole process group headed by the child. */
  group?: boolean;
}

/** A handle to a spawned process — abstracts Node ChildProcess. */
export interface ProcessHandle {
  readonly pid: number;
  /**
   * Resolves when the process exits with its return code: the exit status when
   * it exited normally, `-N` when it was killed by signal N.
   */
  readonly exited: Promise<number>;
  /** Returns false when the target no longer exists. */
  signal(signal: ProcessSignal, options?: SignalOptions): boolean;
}

export interface SpawnOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
  stdio?: "inherit" | "ignore";
}

export interface ProcessManager {
  /** Resolves once the OS reports the process alive; rejects when it cannot be started. */
  spawn(options: SpawnOptions): Promise<ProcessHandle>;
  /** Check if a PID is alive (signal 0). */
  isAlive(pid: number): boolean;
}
