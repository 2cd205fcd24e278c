import fs from "node:fs/promises";
import path from "node:path";
import { FilesystemError, errorMessage } from "../core/errors.js";

/** Delete each path recursively; already-absent paths are fine. */
export async function removePaths(paths: readonly string[], cwd: string): Promise<string[]> {
  const removed: string[] = [];
  for (const p of paths) {
    const target = path.resolve(cwd, p);
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (e) {
      throw new FilesystemError("RMDIR_FAILED", `Failed to remove ${target}: ${errorMessage(e)}`, target);
    }
    removed.push(target);
  }
  return removed;
}

/** Create each directory recursively; already-present directories are fine. */
export async function createDirectories(paths: readonly string[], cwd: string): Promise<void> {
  for (const p of paths) {
    const target = path.resolve(cwd, p);
    try {
      await fs.mkdir(target, { recursive: true });
    } catch (e) {
      throw new FilesystemError("MKDIR_FAILED", `Failed to create ${target}: ${errorMessage(e)}`, target);
    }
  }
}

/** rmdirs strictly before mkdirs. */
export async function prepareDirectories(rmdirs: readonly string[], mkdirs: readonly string[], cwd: string): Promise<void> {
  await removePaths(rmdirs, cwd);
  await createDirectories(mkdirs, cwd);
}
