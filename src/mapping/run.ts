import path from "node:path";
import type { FileSystemBackend } from "./fs-backend.js";
import type {
  Action,
  MappingParams,
  MappingSummary,
  OnEvent,
  ParseRulesResult,
} from "./types.js";
import { expandHomePrefix, resolveRequiredHomeDir } from "../infra/home-dir.js";
import { PlanningError, RuleSetError } from "./errors.js";
import { executeActions } from "./executor.js";
import { buildPlan } from "./planner.js";
import { parseRule } from "./rule-parser.js";
import { loadRulesFile } from "./rules-file.js";

export type RunOptions = {
  onEvent?: OnEvent;
  backend?: FileSystemBackend;
};

function expandTilde(p: string): string {
  return p.startsWith("~") ? expandHomePrefix(p, resolveRequiredHomeDir()) : p;
}

async function readRules(params: MappingParams): Promise<{ result: ParseRulesResult; origin: string }> {
  if (params.rules_file !== undefined) {
    const rulesFile = expandTilde(params.rules_file);
    return { result: await loadRulesFile(rulesFile), origin: rulesFile };
  }
  const parsed = parseRule(params.rule, 1);
  return {
    result: parsed.ok ? { ok: true, rules: [parsed.rule] } : { ok: false, errors: [parsed.error] },
    origin: "inline rule",
  };
}

/**
 * Parse every rule, plan every action, then execute them in order.
 *
 * Parse and planning failures throw before anything on disk changes. An
 * execution failure does not throw: it is reported in `result` together with
 * how many actions had already been applied.
 */
export async function runMapping(
  params: MappingParams,
  options: RunOptions = {},
): Promise<MappingSummary> {
  const { onEvent, backend } = options;
  const startedAt = new Date().toISOString();
  const startMs = Date.now();

  const sourceDir = path.resolve(expandTilde(params.source_dir));
  const destDir = path.resolve(expandTilde(params.dest_dir));

  // ── Phase 1: rules ──
  const { result: parsed, origin } = await readRules(params);
  if (!parsed.ok) {
    onEvent?.({ type: "rules.invalid", errors: parsed.errors });
    throw new RuleSetError(origin, parsed.errors);
  }
  const rules = parsed.rules;
  onEvent?.({ type: "rules.parsed", count: rules.length, origin });

  // ── Phase 2: plan ──
  let actions: Action[];
  try {
    actions = await buildPlan(
      { rules, sourceDir, destDir, exclusive: params.exclusive === true },
      onEvent,
    );
  } catch (err) {
    if (err instanceof PlanningError) {
      onEvent?.({ type: "plan.failed", error: err });
    }
    throw err;
  }

  // ── Phase 3: execute ──
  const result = await executeActions(actions, {
    dryRun: params.dry_run,
    backend,
    onEvent,
  });

  if (result.ok) {
    onEvent?.({
      type: "run.done",
      completed: result.completed,
      dry_run: params.dry_run,
      elapsed_ms: Date.now() - startMs,
    });
  }

  return {
    source_dir: sourceDir,
    dest_dir: destDir,
    dry_run: params.dry_run,
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    rules,
    actions,
    result,
  };
}
