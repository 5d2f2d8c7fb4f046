import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Value } from "@sinclair/typebox/value";
import JSON5 from "json5";
import { ConfigError, errorMessage } from "../mapping/errors.js";
import { resolveConfigPath, resolveUserPath } from "./paths.js";
import { type FilemapConfig, FilemapConfigSchema } from "./schema.js";

export type ConfigIO = {
  configPath: string;
  loadConfig(): FilemapConfig;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Validate a parsed config value. Directory entries are resolved against the
 * directory holding the config file.
 */
export function validateConfig(
  raw: unknown,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): FilemapConfig {
  if (!Value.Check(FilemapConfigSchema, raw)) {
    const problems = [...Value.Errors(FilemapConfigSchema, raw)].map(
      (e) => `${e.path || "/"} ${e.message}`,
    );
    throw new ConfigError("ConfigInvalid", configPath, problems.join("; "));
  }

  const baseDir = path.dirname(configPath);
  const config: FilemapConfig = { ...raw };
  if (config.sourceDir !== undefined) {
    config.sourceDir = resolveUserPath(config.sourceDir, env, homedir, baseDir);
  }
  if (config.destDir !== undefined) {
    config.destDir = resolveUserPath(config.destDir, env, homedir, baseDir);
  }
  return config;
}

export function createConfigIO(
  opts: {
    cliPath?: string;
    env?: NodeJS.ProcessEnv;
    homedir?: () => string;
  } = {},
): ConfigIO {
  const env = opts.env ?? process.env;
  const homedir = opts.homedir ?? os.homedir;
  const resolved = resolveConfigPath({ cliPath: opts.cliPath, env, homedir });

  return {
    configPath: resolved.path,
    loadConfig: () => {
      let text: string;
      try {
        text = fs.readFileSync(resolved.path, "utf-8");
      } catch (err) {
        // Only a config the user named must exist
        if (!resolved.explicit && isMissingFile(err)) {
          return {};
        }
        throw new ConfigError("ConfigUnreadable", resolved.path, errorMessage(err), {
          cause: err,
        });
      }

      let raw: unknown;
      try {
        raw = JSON5.parse(text);
      } catch (err) {
        throw new ConfigError("ConfigInvalid", resolved.path, errorMessage(err), { cause: err });
      }
      return validateConfig(raw, resolved.path, env, homedir);
    },
  };
}
