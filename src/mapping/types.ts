import type { ExecutionError, ParseError, PlanningError } from "./errors.js";

export type RuleKind = "copy" | "move";

export type Rule = {
  readonly kind: RuleKind;
  readonly pattern: RegExp;
  readonly source: string; // raw pattern text between the slashes
  readonly destination: string; // relative to the destination root
  readonly line: number; // 1-based
};

export type MatchedFile = {
  name: string;
  rules: Rule[];
};

export type Action = {
  readonly kind: RuleKind;
  readonly source_path: string; // absolute
  readonly dest_path: string; // absolute, includes the file name
  readonly rule_line: number;
};

export type ParseRuleResult = { ok: true; rule: Rule } | { ok: false; error: ParseError };

export type ParseRulesResult = { ok: true; rules: Rule[] } | { ok: false; errors: ParseError[] };

// `completed` counts actions actually performed: always 0 for a dry run
export type ExecutionResult =
  | { ok: true; completed: number; dryRun: boolean }
  | {
      ok: false;
      error: ExecutionError;
      completed: number;
      lastCompletedIndex: number; // -1 when nothing completed
    };

export type MappingParams = {
  source_dir: string;
  dest_dir: string;
  dry_run: boolean;
  exclusive?: boolean;
} & ({ rules_file: string; rule?: undefined } | { rule: string; rules_file?: undefined });

export type MappingSummary = {
  source_dir: string;
  dest_dir: string;
  dry_run: boolean;
  started_at: string; // ISO 8601
  finished_at: string;
  rules: Rule[];
  actions: Action[];
  result: ExecutionResult;
};

// Events emitted via onEvent callback
export type MappingEvent =
  | { type: "rules.parsed"; count: number; origin: string }
  | { type: "rules.invalid"; errors: ParseError[] }
  | { type: "plan.scanned"; source_dir: string; file_count: number }
  | { type: "plan.unmatched"; name: string }
  | { type: "action.planned"; index: number; action: Action }
  | { type: "plan.failed"; error: PlanningError }
  | { type: "action.dir_ready"; index: number; path: string }
  | { type: "action.performed"; index: number; total: number; action: Action }
  | { type: "action.skipped"; index: number; total: number; action: Action }
  | { type: "run.failed"; error: ExecutionError; completed: number }
  | { type: "run.done"; completed: number; dry_run: boolean; elapsed_ms: number };

export type OnEvent = (event: MappingEvent) => void;
