/**
 * Atomic File Operations
 *
 * A file is written to a temporary sibling and renamed into place, so a
 * reader (or an interrupted run) never sees a partially written file.
 */

import { Dirent, promises as fs } from "fs";
import path from "path";
import { log } from "../../lib/log";
import { ErrorFactory } from "../../shared/errors";

let sequence = 0;

const byName = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

const isNotFound = (error: unknown): boolean => error instanceof Error && "code" in error && error.code === "ENOENT";

export const tempPathFor = (filePath: string): string => `${filePath}.tmp-${process.pid}-${++sequence}`;

export const writeFileAtomic = async (filePath: string, data: string | Uint8Array): Promise<void> => {
  const tempPath = tempPathFor(filePath);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      log.debug(`Could not remove temporary file ${tempPath}`, { error: cleanupError });
    });
    throw ErrorFactory.fromFileSystemError(error, "write", filePath);
  }
};

/**
 * Removes every entry of `dir` whose name is not in `keep`. A missing
 * directory has nothing to prune.
 *
 * @returns The removed paths.
 */
export const pruneDirectory = async (dir: string, keep: ReadonlySet<string>): Promise<string[]> => {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw ErrorFactory.fromFileSystemError(error, "prune", dir);
  }

  const removed: string[] = [];
  for (const entry of entries.sort(byName)) {
    if (keep.has(entry.name)) {
      continue;
    }

    const target = path.join(dir, entry.name);
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      throw ErrorFactory.fromFileSystemError(error, "prune", target);
    }
    removed.push(target);
  }

  return removed;
};

/**
 * Lists every file below `dir` as paths relative to it, using `/` as the
 * separator, in sorted order.
 */
export const listFiles = async (dir: string): Promise<string[]> => {
  const files: string[] = [];

  const walk = async (current: string, prefix: string): Promise<void> => {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries.sort(byName)) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(current, entry.name), relative);
      } else if (entry.isFile()) {
        files.push(relative);
      }
    }
  };

  try {
    await walk(dir, "");
  } catch (error) {
    throw ErrorFactory.fromFileSystemError(error, "list", dir);
  }

  return files;
};
