import fs from "node:fs/promises";
import type { ParseRulesResult } from "./types.js";
import { RulesFileError } from "./errors.js";
import { parseRules } from "./rule-parser.js";

/**
 * Read and parse a rule file. Throws RulesFileError when the file cannot be
 * read; parse problems are returned, not thrown.
 */
export async function loadRulesFile(filePath: string): Promise<ParseRulesResult> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new RulesFileError(filePath, err);
  }
  // Strip a UTF-8 BOM so it is not read as part of the first kind marker
  return parseRules(text.startsWith("\uFEFF") ? text.slice(1) : text);
}
