import type { Action } from "./types.js";

export type ParseErrorCode = "UnknownRuleKind" | "InvalidRegex" | "InvalidDestination";
export type RulesFileErrorCode = "RulesFileUnreadable";
export type PlanningErrorCode = "SourceUnreadable" | "OverlappingRules";
export type ExecutionErrorCode = "DirectoryCreateFailed" | "CopyFailed" | "DeleteFailed";
export type ConfigErrorCode = "ConfigUnreadable" | "ConfigInvalid";

export type MappingErrorCode =
  | ParseErrorCode
  | RulesFileErrorCode
  | PlanningErrorCode
  | ExecutionErrorCode
  | ConfigErrorCode;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class MappingError extends Error {
  readonly code: MappingErrorCode;

  constructor(code: MappingErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MappingError";
    this.code = code;
  }
}

export class ParseError extends MappingError {
  declare readonly code: ParseErrorCode;
  readonly line: number;

  constructor(code: ParseErrorCode, line: number, detail: string, options?: ErrorOptions) {
    super(code, `line ${line}: ${detail}`, options);
    this.name = "ParseError";
    this.line = line;
  }
}

export class RulesFileError extends MappingError {
  declare readonly code: RulesFileErrorCode;
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super("RulesFileUnreadable", `Unable to read rules file ${path}: ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "RulesFileError";
    this.path = path;
  }
}

export class PlanningError extends MappingError {
  declare readonly code: PlanningErrorCode;

  constructor(code: PlanningErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "PlanningError";
  }
}

const EXECUTION_VERBS: Record<ExecutionErrorCode, string> = {
  DirectoryCreateFailed: "unable to create destination directory",
  CopyFailed: "unable to copy",
  DeleteFailed: "unable to remove source after copy",
};

export class ExecutionError extends MappingError {
  declare readonly code: ExecutionErrorCode;
  readonly index: number; // 0-based position in the action list
  readonly action: Action;
  readonly path: string;

  constructor(
    code: ExecutionErrorCode,
    index: number,
    action: Action,
    path: string,
    cause: unknown,
  ) {
    const target =
      code === "CopyFailed" ? `${action.source_path} -> ${action.dest_path}` : path;
    super(
      code,
      `action #${index + 1} (${action.kind}) failed: ${EXECUTION_VERBS[code]} ${target}: ${errorMessage(cause)}`,
      { cause },
    );
    this.name = "ExecutionError";
    this.index = index;
    this.action = action;
    this.path = path;
  }
}

export class ConfigError extends MappingError {
  declare readonly code: ConfigErrorCode;
  readonly path: string;

  constructor(code: ConfigErrorCode, path: string, detail: string, options?: ErrorOptions) {
    super(code, `Config ${path}: ${detail}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

/**
 * Every parse failure in a rule set, raised as one error before planning.
 * `code` is the code of the first failing line.
 */
export class RuleSetError extends MappingError {
  declare readonly code: ParseErrorCode;
  readonly errors: ParseError[];

  constructor(origin: string, errors: ParseError[]) {
    const first = errors[0];
    const details = errors.map((e) => `  ${e.message}`).join("\n");
    super(
      first?.code ?? "InvalidRegex",
      `${errors.length} invalid rule${errors.length === 1 ? "" : "s"} in ${origin}:\n${details}`,
    );
    this.name = "RuleSetError";
    this.errors = errors;
  }
}
