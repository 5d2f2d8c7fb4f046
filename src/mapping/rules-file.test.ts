import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RulesFileError } from "./errors.js";
import { loadRulesFile } from "./rules-file.js";

describe("loadRulesFile", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "filemap-rules-test-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("parses every rule in the file", async () => {
    const file = path.join(tmpDir, "rules.txt");
    await fs.writeFile(file, "c /\\.pdf$/Books\n\nm /lime/Lime Files\n");

    const res = await loadRulesFile(file);
    if (!res.ok) {
      throw new Error(res.errors[0].message);
    }
    expect(res.rules.map((r) => `${r.line}:${r.kind}:${r.destination}`)).toEqual([
      "1:copy:Books",
      "3:move:Lime Files",
    ]);
  });

  it("ignores a leading byte order mark", async () => {
    const file = path.join(tmpDir, "bom.txt");
    await fs.writeFile(file, "\uFEFFm /a/A\n");

    const res = await loadRulesFile(file);
    expect(res.ok).toBe(true);
  });

  it("returns parse errors instead of throwing", async () => {
    const file = path.join(tmpDir, "bad.txt");
    await fs.writeFile(file, "c /ok/Fine\nc /[/Broken\n");

    const res = await loadRulesFile(file);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.errors.map((e) => e.code)).toEqual(["InvalidRegex"]);
      expect(res.errors[0].line).toBe(2);
    }
  });

  it("throws RulesFileError for a missing file", async () => {
    const file = path.join(tmpDir, "missing.txt");
    const promise = loadRulesFile(file);
    await expect(promise).rejects.toBeInstanceOf(RulesFileError);
    await expect(promise).rejects.toMatchObject({ code: "RulesFileUnreadable", path: file });
  });
});
