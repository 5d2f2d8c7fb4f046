import crypto from "node:crypto";
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";

/**
 * Filesystem primitives the executor mutates through. Each call rejects with
 * the underlying OS error.
 */
export type FileSystemBackend = {
  copy(src: string, dst: string): Promise<void>;
  remove(filePath: string): Promise<void>;
  createDirAll(dirPath: string): Promise<void>;
};

/**
 * Copy `src` to `dst` through a uniquely named `.partial` sibling that is
 * renamed into place, so a failed copy never leaves a truncated file at `dst`.
 * The partial file is created exclusively and never replaces an existing entry.
 */
export async function copyFileAtomic(src: string, dst: string): Promise<void> {
  const stat = await fs.stat(src);
  if (!stat.isFile()) {
    throw new Error(`not a regular file: ${src}`);
  }

  const partial = `${dst}.${crypto.randomBytes(6).toString("hex")}.partial`;
  // Rejects with EEXIST rather than truncating an existing file
  const handle = await fs.open(partial, "wx", stat.mode & 0o777);
  try {
    await pipeline(createReadStream(src), handle.createWriteStream());
    await fs.rename(partial, dst);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
}

export const nodeFileSystem: FileSystemBackend = {
  copy: copyFileAtomic,
  remove: async (filePath) => {
    await fs.unlink(filePath);
  },
  createDirAll: async (dirPath) => {
    await fs.mkdir(dirPath, { recursive: true });
  },
};
