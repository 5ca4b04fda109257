import { basename } from "node:path";
import { ConfigError } from "../errors.js";
import type { ProcessConfig } from "../types/config.js";

export interface CliArgs {
  help: boolean;
  configPath?: string;
  verbose: boolean;
  quiet: boolean;
  /** Values given on the command line; undefined means "not given". */
  overrides: Partial<ProcessConfig>;
}

export const HELP_TEXT = `
  procwarden — run a command and keep an eye on it

  Usage: procwarden [options] -- <command> [args...]

  Options:
    --name <name>          Name used in logs (default: command basename)
    --always-restart       Relaunch the command whenever it exits
    --cwd <path>           Working directory for the command
    --config <file>        JSON config file; flags override its values
    --verbose, -v          Debug logging
    --quiet, -q            Only log warnings and errors
    --help, -h             Show this help
`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith("-")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

/** Parse `process.argv` (node and script path included). */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = { help: false, verbose: false, quiet: false, overrides: {} };
  const { overrides } = result;

  let i = 2;
  for (; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      i++;
      break;
    }
    if (!arg.startsWith("-")) break;

    switch (arg) {
      case "--name":
        overrides.name = requireValue(argv, ++i, arg);
        break;
      case "--always-restart":
        overrides.alwaysRestart = true;
        break;
      case "--cwd":
        overrides.cwd = requireValue(argv, ++i, arg);
        break;
      case "--config":
        result.configPath = requireValue(argv, ++i, arg);
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      case "--quiet":
      case "-q":
        result.quiet = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  const [command, ...args] = argv.slice(i);
  if (command !== undefined) {
    overrides.command = command;
    overrides.args = args;
    // A config file supplies its own name; the flag still overrides it.
    if (result.configPath === undefined) overrides.name ??= basename(command);
  }
  if (result.verbose && result.quiet) {
    throw new ConfigError("--verbose and --quiet cannot be combined");
  }
  return result;
}

/** Shell-style exit status for a supervised return code. */
export function exitStatusFor(returncode: number | undefined): number {
  if (returncode === undefined) return 1;
  return returncode < 0 ? 128 - returncode : returncode;
}
