#!/usr/bin/env node
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { SupervisedProcess } from "../core/supervised-process.js";
import { registerSignalHandlers, terminateAll } from "../daemon/signal-handler.js";
import { errorMessage } from "../errors.js";
import type { ResolvedProcessConfig } from "../types/config.js";
import { loadProcessConfig, resolveProcessConfig } from "../types/config.js";
import type { CliArgs } from "./cli-args.js";
import { exitStatusFor, HELP_TEXT, parseCliArgs } from "./cli-args.js";

async function resolveConfig(cli: CliArgs): Promise<ResolvedProcessConfig> {
  if (cli.configPath) {
    return loadProcessConfig(cli.configPath, cli.overrides);
  }
  if (!cli.overrides.command) {
    throw new Error("No command given.\nRun with --help for usage.");
  }
  return resolveProcessConfig(cli.overrides);
}

function logLevelFor(cli: CliArgs, config: ResolvedProcessConfig): LogLevel {
  if (cli.verbose) return LogLevel.DEBUG;
  if (cli.quiet) return LogLevel.WARN;
  return parseLogLevel(config.logLevel);
}

async function main(): Promise<void> {
  let cli: CliArgs;
  let config: ResolvedProcessConfig;
  try {
    cli = parseCliArgs(process.argv);
    if (cli.help) {
      console.log(HELP_TEXT);
      process.exit(0);
    }
    config = await resolveConfig(cli);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  const logger = new StructuredLogger({ component: "procwarden", level: logLevelFor(cli, config) });
  const proc = new SupervisedProcess({
    name: config.name,
    command: config.command,
    args: config.args,
    alwaysRestart: config.alwaysRestart,
    cwd: config.cwd,
    env: config.env,
    stdio: config.stdio,
    logger: logger.child(config.name),
  });

  // Exit alongside a child that stopped on its own; signal-driven shutdown exits from the handler.
  proc.on("state:changed", ({ to }) => {
    if (to === "exited") {
      process.exit(exitStatusFor(proc.returncode));
    }
  });

  registerSignalHandlers(() => terminateAll([proc]), { logger });

  await proc.start();
  logger.info("Supervising process", {
    name: proc.name,
    pid: proc.pid,
    alwaysRestart: proc.alwaysRestart,
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
