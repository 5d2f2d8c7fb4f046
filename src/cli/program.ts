import { Command } from "commander";
import type { FilemapConfig } from "../config/schema.js";
import type { MappingParams } from "../mapping/types.js";
import { VERSION } from "../version.js";

export type CliOptions = {
  rules?: string;
  sourceDir?: string;
  destDir?: string;
  dryRun?: boolean;
  verbose: number;
  exclusive?: boolean;
  config?: string;
};

export type ParsedCli = {
  rule: string | undefined;
  options: CliOptions;
};

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(): Command {
  return new Command("filemap")
    .description("Copy or move files into folders based on file name matches")
    .version(VERSION, "-V, --version", "print the version")
    .argument("[rule]", "a single rule, e.g. 'c /\\.pdf$/Books' (instead of --rules)")
    .option("-r, --rules <file>", "file of mapping rules, one per line")
    .option("-s, --source-dir <dir>", "directory to take files from (default: .)")
    .option("-d, --dest-dir <dir>", "root under which rule destinations are created (default: .)")
    .option("-n, --dry-run", "report what would be done without touching the filesystem")
    .option("-v, --verbose", "increase verbosity (-v, -vv, -vvv)", increaseVerbosity, 0)
    .option("--exclusive", "fail when a file matches more than one rule")
    .option("--config <file>", "config file (default: ~/.filemap/filemap.json5)")
    .allowExcessArguments(false)
    .showHelpAfterError();
}

/**
 * Parse argv (node, script, ...args). Commander errors surface as thrown
 * CommanderError when the program has exitOverride() set.
 */
export async function parseCliArgs(program: Command, argv: string[]): Promise<ParsedCli> {
  let rule: string | undefined;
  program.action((ruleArg: string | undefined) => {
    rule = ruleArg;
  });
  await program.parseAsync(argv);
  return { rule, options: program.opts<CliOptions>() };
}

export type RunConfigResult =
  | { ok: true; params: MappingParams; verbosity: number }
  | { ok: false; error: string };

/**
 * Merge CLI flags over config-file defaults. Exactly one of the inline rule
 * and --rules must be given.
 */
export function resolveRunConfig(cli: ParsedCli, config: FilemapConfig = {}): RunConfigResult {
  const { rule, options } = cli;
  const rulesFile = options.rules?.trim() || undefined;
  const inlineRule = rule?.trim() ? rule : undefined;

  if (rulesFile && inlineRule !== undefined) {
    return { ok: false, error: "Specify either a rule argument or --rules <file>, not both" };
  }

  const base = {
    source_dir: options.sourceDir ?? config.sourceDir ?? ".",
    dest_dir: options.destDir ?? config.destDir ?? ".",
    dry_run: options.dryRun === true,
    exclusive: options.exclusive ?? config.exclusive ?? false,
  };
  const verbosity = (config.verbosity ?? 0) + options.verbose;

  if (rulesFile) {
    return { ok: true, params: { ...base, rules_file: rulesFile }, verbosity };
  }
  if (inlineRule !== undefined) {
    return { ok: true, params: { ...base, rule: inlineRule }, verbosity };
  }
  return { ok: false, error: "A rule argument or --rules <file> is required" };
}
