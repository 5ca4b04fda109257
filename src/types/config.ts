import { readFile } from "node:fs/promises";
import { processConfigSchema } from "../config/config-schema.js";
import { ConfigError, errorMessage } from "../errors.js";

/** Configuration for one supervised process, as read from a config file or CLI flags */
export interface ProcessConfig {
  /** Identity used in logs (required) */
  name: string;
  /** Program to run (required) */
  command: string;
  args?: string[]; // default: []
  alwaysRestart?: boolean; // default: false
  cwd?: string; // default: the supervisor's cwd
  env?: Record<string, string>; // merged over the supervisor's environment
  stdio?: "inherit" | "ignore"; // default: "inherit"
  logLevel?: "debug" | "info" | "warn" | "error"; // default: "info"
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedProcessConfig = Required<Omit<ProcessConfig, "cwd" | "env">> &
  Pick<ProcessConfig, "cwd" | "env">;

export const DEFAULT_PROCESS_CONFIG: Omit<ResolvedProcessConfig, "name" | "command"> = {
  args: [],
  alwaysRestart: false,
  stdio: "inherit",
  logLevel: "info",
};

export function resolveProcessConfig(config: unknown): ResolvedProcessConfig {
  const validation = processConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`, {
      cause: validation.error,
    });
  }

  const { args, alwaysRestart, stdio, logLevel, ...rest } = validation.data;
  return {
    ...rest,
    args: args ?? [...DEFAULT_PROCESS_CONFIG.args],
    alwaysRestart: alwaysRestart ?? DEFAULT_PROCESS_CONFIG.alwaysRestart,
    stdio: stdio ?? DEFAULT_PROCESS_CONFIG.stdio,
    logLevel: logLevel ?? DEFAULT_PROCESS_CONFIG.logLevel,
  };
}

/** Read a JSON config file; `overrides` win over the file's values. */
export async function loadProcessConfig(
  path: string,
  overrides: Partial<ProcessConfig> = {},
): Promise<ResolvedProcessConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }
  return resolveProcessConfig({ ...parsed, ...definedOnly(overrides) });
}

function definedOnly(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
