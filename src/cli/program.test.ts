import { describe, expect, it } from "vitest";
import type { ParsedCli } from "./program.js";
import { buildProgram, parseCliArgs, resolveRunConfig } from "./program.js";

async function parse(...args: string[]): Promise<ParsedCli> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
  return parseCliArgs(program, ["node", "filemap", ...args]);
}

describe("parseCliArgs", () => {
  it("reads the inline rule and flags", async () => {
    const cli = await parse("-s", "in", "-d", "out", "-n", "--exclusive", "m/lime/Lime Files");
    expect(cli.rule).toBe("m/lime/Lime Files");
    expect(cli.options).toMatchObject({
      sourceDir: "in",
      destDir: "out",
      dryRun: true,
      exclusive: true,
      verbose: 0,
    });
  });

  it("counts repeated -v", async () => {
    expect((await parse("-vvv", "-r", "rules.txt")).options.verbose).toBe(3);
    expect((await parse("-v", "--verbose", "-r", "rules.txt")).options.verbose).toBe(2);
  });

  it("rejects unknown options", async () => {
    await expect(parse("--bogus")).rejects.toMatchObject({ exitCode: 1 });
  });
});

describe("resolveRunConfig", () => {
  const noFlags = { verbose: 0 };

  it("defaults both directories to the working directory", () => {
    expect(resolveRunConfig({ rule: "c /a/A", options: noFlags })).toEqual({
      ok: true,
      params: { source_dir: ".", dest_dir: ".", dry_run: false, exclusive: false, rule: "c /a/A" },
      verbosity: 0,
    });
  });

  it("lets flags override config defaults", () => {
    const res = resolveRunConfig(
      { rule: undefined, options: { rules: "r.txt", sourceDir: "cli-in", verbose: 1, exclusive: false } },
      { sourceDir: "/cfg/in", destDir: "/cfg/out", verbosity: 1, exclusive: true },
    );
    expect(res).toEqual({
      ok: true,
      params: {
        source_dir: "cli-in",
        dest_dir: "/cfg/out",
        dry_run: false,
        exclusive: false,
        rules_file: "r.txt",
      },
      verbosity: 2,
    });
  });

  it("requires a rule source", () => {
    expect(resolveRunConfig({ rule: undefined, options: noFlags })).toEqual({
      ok: false,
      error: "A rule argument or --rules <file> is required",
    });
  });

  it("refuses both a rule and a rules file", () => {
    expect(resolveRunConfig({ rule: "c /a/A", options: { rules: "r.txt", verbose: 0 } })).toEqual({
      ok: false,
      error: "Specify either a rule argument or --rules <file>, not both",
    });
  });
});
