import os from "node:os";
import { CommanderError } from "commander";
import type { FilemapConfig } from "../config/schema.js";
import type { LogSink } from "../logging/logger.js";
import type { FileSystemBackend } from "../mapping/fs-backend.js";
import type { MappingSummary } from "../mapping/types.js";
import type { ParsedCli } from "./program.js";
import { createConfigIO } from "../config/io.js";
import { createLogger, levelFromVerbosity } from "../logging/logger.js";
import { MappingError } from "../mapping/errors.js";
import { createEventReporter, formatSummary } from "../mapping/report.js";
import { runMapping } from "../mapping/run.js";
import { buildProgram, parseCliArgs, resolveRunConfig } from "./program.js";

export type CliRuntime = {
  stdout: LogSink;
  stderr: LogSink;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  backend?: FileSystemBackend;
};

/**
 * Run the CLI and resolve to a process exit code.
 */
export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
  const { stdout, stderr } = runtime;
  const env = runtime.env ?? process.env;

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(str),
    });

  let cli: ParsedCli;
  try {
    cli = await parseCliArgs(program, argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  // Errors before the configured level is known go out at the default level
  const bootLogger = createLogger({ stream: stderr, env });

  let config: FilemapConfig;
  try {
    config = createConfigIO({
      cliPath: cli.options.config,
      env,
      homedir: runtime.homedir ?? os.homedir,
    }).loadConfig();
  } catch (err) {
    if (err instanceof MappingError) {
      bootLogger.error(err.message);
      return 1;
    }
    throw err;
  }

  const resolved = resolveRunConfig(cli, config);
  if (!resolved.ok) {
    bootLogger.error(resolved.error);
    return 1;
  }

  const logger = createLogger({
    level: levelFromVerbosity(resolved.verbosity),
    stream: stderr,
    env,
  });

  let summary: MappingSummary;
  try {
    summary = await runMapping(resolved.params, {
      onEvent: createEventReporter(logger, stdout),
      backend: runtime.backend,
    });
  } catch (err) {
    if (err instanceof MappingError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }

  if (!summary.result.ok) {
    logger.error(summary.result.error.message);
    stdout.write(`${formatSummary(summary)}\n`);
    return 1;
  }

  stdout.write(`${formatSummary(summary)}\n`);
  return 0;
}
