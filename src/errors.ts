export class ProcwardenError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProcwardenError";
    this.code = code;
  }
}

// ── Domain errors ──

/** A lifecycle operation was invoked on a process that has already been killed. */
export class KilledProcessError extends ProcwardenError {
  readonly processName: string;

  constructor(processName: string, options?: ErrorOptions) {
    super(`Process "${processName}" has already been killed`, "KILLED", options);
    this.name = "KilledProcessError";
    this.processName = processName;
  }
}

export class SpawnError extends ProcwardenError {
  readonly command: string;

  constructor(command: string, options?: ErrorOptions) {
    const reason = options?.cause === undefined ? "" : `: ${errorMessage(options.cause)}`;
    super(`Failed to spawn ${command}${reason}`, "SPAWN", options);
    this.name = "SpawnError";
    this.command = command;
  }
}

export class ConfigError extends ProcwardenError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to ProcwardenError (preserves cause chain). */
export function toProcwardenError(value: unknown): ProcwardenError {
  if (value instanceof ProcwardenError) return value;
  if (value instanceof Error) return new ProcwardenError(value.message, "UNKNOWN", { cause: value });
  return new ProcwardenError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Narrow an unknown thrown value to a Node system error carrying an errno code. */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}
