import type { Logger, LogSink } from "../logging/logger.js";
import type { Action, MappingEvent, MappingSummary, OnEvent } from "./types.js";

const VERBS = {
  copy: { past: "Copied", conditional: "would copy" },
  move: { past: "Moved", conditional: "would move" },
} as const;

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
}

export function formatAction(action: Action): string {
  return `${action.source_path} -> ${action.dest_path}`;
}

function countKinds(actions: readonly Action[]): string {
  const copies = actions.filter((a) => a.kind === "copy").length;
  return `${copies} copy, ${actions.length - copies} move`;
}

/**
 * One-line outcome of a run, for stdout.
 */
export function formatSummary(summary: MappingSummary): string {
  const { actions, result } = summary;
  if (!result.ok) {
    return `Stopped after ${result.completed} of ${plural(actions.length, "action")}; completed actions were not rolled back`;
  }
  if (actions.length === 0) {
    return "No files matched any rule";
  }
  if (summary.dry_run) {
    return `Dry run: ${plural(actions.length, "action")} would be performed (${countKinds(actions)})`;
  }
  return `Done: ${plural(result.completed, "action")} performed (${countKinds(actions)})`;
}

/**
 * Route run events to the logger. Dry-run listings go to `out` regardless of
 * verbosity.
 */
export function createEventReporter(logger: Logger, out: LogSink): OnEvent {
  return (event: MappingEvent) => {
    switch (event.type) {
      case "rules.parsed":
        logger.info(`Loaded ${plural(event.count, "rule")} from ${event.origin}`);
        return;
      case "plan.scanned":
        logger.debug(`Found ${plural(event.file_count, "regular file")} in ${event.source_dir}`);
        return;
      case "plan.unmatched":
        logger.debug(`No rule matches file: ${event.name}`);
        return;
      case "action.planned":
        logger.trace(
          `Planned #${event.index + 1} (line ${event.action.rule_line}) ${event.action.kind} ${formatAction(event.action)}`,
        );
        return;
      case "action.dir_ready":
        logger.trace(`Destination directory ready: ${event.path}`);
        return;
      case "action.performed":
        logger.info(`${VERBS[event.action.kind].past} ${formatAction(event.action)}`);
        return;
      case "action.skipped":
        out.write(`${VERBS[event.action.kind].conditional} ${formatAction(event.action)}\n`);
        return;
      case "run.done":
        logger.debug(`Finished in ${formatElapsed(event.elapsed_ms)}`);
        return;
      case "rules.invalid":
      case "plan.failed":
      case "run.failed":
        // Surfaced by the caller, which owns the exit status
        return;
    }
  };
}
