import path from "node:path";
import type { ParseRuleResult, ParseRulesResult, Rule, RuleKind } from "./types.js";
import { ParseError, errorMessage } from "./errors.js";

const RULE_KINDS: Record<string, RuleKind> = {
  c: "copy",
  m: "move",
};

const KIND_TOKEN_RE = /^[^\s/]*/;

/**
 * Find the index of the first `/` in `text` (after `start`) that is not
 * preceded by a backslash escape. Returns -1 when there is none.
 */
function findClosingSlash(text: string, start: number): number {
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch === "/") {
      return i;
    }
  }
  return -1;
}

function isAbsoluteDestination(dest: string): boolean {
  return path.isAbsolute(dest) || path.win32.isAbsolute(dest);
}

function escapesRoot(dest: string): boolean {
  const normalized = path.normalize(dest);
  return normalized === ".." || normalized.startsWith(`..${path.sep}`);
}

function fail(
  code: ParseError["code"],
  lineNumber: number,
  detail: string,
  cause?: unknown,
): ParseRuleResult {
  return {
    ok: false,
    error: new ParseError(code, lineNumber, detail, cause === undefined ? undefined : { cause }),
  };
}

/**
 * Parse a single rule line of the form `c /<regex>/<destination>` or
 * `m /<regex>/<destination>`.
 */
export function parseRule(line: string, lineNumber: number): ParseRuleResult {
  const text = line.trim();
  const token = KIND_TOKEN_RE.exec(text)?.[0] ?? "";
  const kind = Object.hasOwn(RULE_KINDS, token) ? RULE_KINDS[token] : undefined;
  if (!kind) {
    return fail(
      "UnknownRuleKind",
      lineNumber,
      token
        ? `unknown rule kind '${token}' (expected 'c' or 'm')`
        : "missing rule kind (expected 'c' or 'm')",
    );
  }

  const rest = text.slice(token.length).trimStart();
  if (!rest.startsWith("/")) {
    return fail("InvalidRegex", lineNumber, "expected '/' to open the pattern");
  }
  const close = findClosingSlash(rest, 1);
  if (close === -1) {
    return fail("InvalidRegex", lineNumber, "unterminated pattern (missing closing '/')");
  }

  const source = rest.slice(1, close);
  let pattern: RegExp;
  try {
    pattern = new RegExp(source, "u");
  } catch (err) {
    return fail("InvalidRegex", lineNumber, `invalid pattern /${source}/: ${errorMessage(err)}`, err);
  }

  const destination = rest.slice(close + 1).trim();
  if (!destination) {
    return fail("InvalidDestination", lineNumber, "destination is empty");
  }
  if (isAbsoluteDestination(destination)) {
    return fail(
      "InvalidDestination",
      lineNumber,
      `destination must be a relative path: ${destination}`,
    );
  }
  if (escapesRoot(destination)) {
    return fail(
      "InvalidDestination",
      lineNumber,
      `destination must stay inside the destination root: ${destination}`,
    );
  }

  const rule: Rule = Object.freeze({ kind, pattern, source, destination, line: lineNumber });
  return { ok: true, rule };
}

/**
 * Parse a whole rule set, one rule per line. Blank lines are ignored.
 * Every line is checked so all problems are reported together; any failure
 * invalidates the set and no rules are returned.
 */
export function parseRules(text: string): ParseRulesResult {
  const rules: Rule[] = [];
  const errors: ParseError[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) {
      continue;
    }
    const result = parseRule(line, i + 1);
    if (result.ok) {
      rules.push(result.rule);
    } else {
      errors.push(result.error);
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, rules };
}
