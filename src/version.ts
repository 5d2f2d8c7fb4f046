import { createRequire } from "node:module";

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require("../package.json");
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION = readVersion();
