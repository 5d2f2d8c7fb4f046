import os from "node:os";
import path from "node:path";
import { expandHomePrefix, resolveRequiredHomeDir } from "../infra/home-dir.js";

const STATE_DIRNAME = ".filemap";
const CONFIG_FILENAME = "filemap.json5";

/** Build a homedir thunk that respects FILEMAP_HOME for the given env. */
function envHomedir(env: NodeJS.ProcessEnv): () => string {
  return () => resolveRequiredHomeDir(env, os.homedir);
}

/**
 * Resolve a user-supplied path: expand `~`, then make it absolute against `baseDir`.
 */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = envHomedir(env),
  baseDir: string = process.cwd(),
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed.startsWith("~")) {
    return path.resolve(expandHomePrefix(trimmed, resolveRequiredHomeDir(env, homedir)));
  }
  return path.resolve(baseDir, trimmed);
}

/**
 * State directory holding the default config file.
 * Default: ~/.filemap
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = envHomedir(env),
): string {
  return path.join(resolveRequiredHomeDir(env, homedir), STATE_DIRNAME);
}

export type ConfigPathResolution = {
  path: string;
  explicit: boolean; // true when named by --config or FILEMAP_CONFIG_PATH
};

/**
 * Config file path (JSON5).
 * Precedence: `--config` → FILEMAP_CONFIG_PATH → ~/.filemap/filemap.json5
 */
export function resolveConfigPath(
  opts: {
    cliPath?: string;
    env?: NodeJS.ProcessEnv;
    homedir?: () => string;
  } = {},
): ConfigPathResolution {
  const env = opts.env ?? process.env;
  const homedir = opts.homedir ?? envHomedir(env);
  const cliPath = opts.cliPath?.trim();
  if (cliPath) {
    return { path: resolveUserPath(cliPath, env, homedir), explicit: true };
  }
  const override = env.FILEMAP_CONFIG_PATH?.trim();
  if (override) {
    return { path: resolveUserPath(override, env, homedir), explicit: true };
  }
  return { path: path.join(resolveStateDir(env, homedir), CONFIG_FILENAME), explicit: false };
}
