import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import { PlanningError, errorMessage } from "./errors.js";

/**
 * Code-unit ordering, independent of the host locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/**
 * List the regular files directly inside `sourceDir`, sorted by name.
 * Subdirectories, symlinks and other special entries are left out.
 */
export async function listSourceFiles(sourceDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(sourceDir, { withFileTypes: true });
  } catch (err) {
    throw new PlanningError(
      "SourceUnreadable",
      `Unable to read entries of source directory ${sourceDir}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const names: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    names.push(entry.name);
  }

  // Sort for deterministic plans
  names.sort(compareNames);
  return names;
}
