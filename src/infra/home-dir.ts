import os from "node:os";
import path from "node:path";

/**
 * Home directory, honoring FILEMAP_HOME. Throws when neither is available.
 */
export function resolveRequiredHomeDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.FILEMAP_HOME?.trim();
  if (override) {
    return path.resolve(override);
  }
  const home = homedir();
  if (!home) {
    throw new Error("Unable to determine the home directory; set FILEMAP_HOME");
  }
  return path.resolve(home);
}

/**
 * Replace a leading `~` (alone or followed by a separator) with `home`.
 */
export function expandHomePrefix(input: string, home: string): string {
  if (input === "~") {
    return home;
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(home, input.slice(2));
  }
  return input;
}
