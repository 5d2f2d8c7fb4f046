import path from "node:path";
import type { Action, MatchedFile, OnEvent, Rule } from "./types.js";
import { PlanningError } from "./errors.js";
import { compareNames, listSourceFiles } from "./scan.js";

export type PlanInput = {
  rules: readonly Rule[];
  files: readonly string[]; // bare names of regular files in sourceDir
  sourceDir: string;
  destDir: string;
  exclusive?: boolean;
};

/**
 * Pair every file with the rules its name satisfies, in rule declaration
 * order. Files that match nothing are left out.
 */
export function matchFiles(rules: readonly Rule[], files: readonly string[]): MatchedFile[] {
  const matched: MatchedFile[] = [];
  for (const name of files.toSorted(compareNames)) {
    const hits = rules.filter((rule) => rule.pattern.test(name));
    if (hits.length > 0) {
      matched.push({ name, rules: hits });
    }
  }
  return matched;
}

function assertNoOverlap(rules: readonly Rule[], files: readonly string[]): void {
  for (const file of matchFiles(rules, files)) {
    if (file.rules.length > 1) {
      const lines = file.rules.map((r) => r.line).join(", ");
      throw new PlanningError(
        "OverlappingRules",
        `File ${file.name} matches more than one rule (lines ${lines})`,
      );
    }
  }
}

/**
 * Compute the ordered action list. Rules are visited in declaration order and,
 * for each rule, files in name order; a file matching several rules gets one
 * action per rule. Nothing touches the filesystem here.
 */
export function planActions(input: PlanInput): Action[] {
  const { rules, sourceDir, destDir } = input;
  const files = input.files.toSorted(compareNames);

  if (input.exclusive) {
    assertNoOverlap(rules, files);
  }

  const actions: Action[] = [];
  for (const rule of rules) {
    for (const name of files) {
      if (!rule.pattern.test(name)) {
        continue;
      }
      actions.push(
        Object.freeze({
          kind: rule.kind,
          source_path: path.resolve(sourceDir, name),
          dest_path: path.resolve(destDir, rule.destination, name),
          rule_line: rule.line,
        }),
      );
    }
  }
  return actions;
}

/**
 * List the source directory and plan against it.
 * Throws PlanningError before any action is produced when the listing fails.
 */
export async function buildPlan(
  params: Omit<PlanInput, "files">,
  onEvent?: OnEvent,
): Promise<Action[]> {
  const files = await listSourceFiles(params.sourceDir);
  onEvent?.({ type: "plan.scanned", source_dir: params.sourceDir, file_count: files.length });

  const actions = planActions({ ...params, files });

  if (onEvent) {
    const matched = new Set(matchFiles(params.rules, files).map((f) => f.name));
    for (const name of files) {
      if (!matched.has(name)) {
        onEvent({ type: "plan.unmatched", name });
      }
    }
    actions.forEach((action, index) => onEvent({ type: "action.planned", index, action }));
  }

  return actions;
}
