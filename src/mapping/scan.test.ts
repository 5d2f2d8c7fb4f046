import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { PlanningError } from "./errors.js";
import { compareNames, listSourceFiles } from "./scan.js";

describe("compareNames", () => {
  it("orders by code unit, not locale", () => {
    expect(["b", "B", "a", ".x", "A"].toSorted(compareNames)).toEqual([".x", "A", "B", "a", "b"]);
  });

  it("returns 0 for equal names", () => {
    expect(compareNames("same", "same")).toBe(0);
  });
});

describe("listSourceFiles", () => {
  let tmpDir: string;
  let sourceDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "filemap-scan-test-"));
    sourceDir = path.join(tmpDir, "source");
    await fs.mkdir(path.join(sourceDir, "nested"), { recursive: true });

    await fs.writeFile(path.join(sourceDir, "b.txt"), "b");
    await fs.writeFile(path.join(sourceDir, "a.txt"), "a");
    await fs.writeFile(path.join(sourceDir, "B.txt"), "B");
    await fs.writeFile(path.join(sourceDir, ".hidden"), "dot");
    await fs.writeFile(path.join(sourceDir, "nested", "inner.txt"), "inner");
    await fs.symlink(path.join(sourceDir, "a.txt"), path.join(sourceDir, "link.txt"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("lists only regular files, sorted, without recursing", async () => {
    expect(await listSourceFiles(sourceDir)).toEqual([".hidden", "B.txt", "a.txt", "b.txt"]);
  });

  it("returns an empty list for an empty directory", async () => {
    const empty = path.join(tmpDir, "empty");
    await fs.mkdir(empty);
    expect(await listSourceFiles(empty)).toEqual([]);
  });

  it("fails with SourceUnreadable when the directory does not exist", async () => {
    const promise = listSourceFiles(path.join(tmpDir, "does-not-exist"));
    await expect(promise).rejects.toBeInstanceOf(PlanningError);
    await expect(promise).rejects.toMatchObject({ code: "SourceUnreadable" });
  });

  it("fails with SourceUnreadable when given a file", async () => {
    await expect(listSourceFiles(path.join(sourceDir, "a.txt"))).rejects.toMatchObject({
      code: "SourceUnreadable",
    });
  });
});
