/**
 * Zip packaging of the export tree, using fflate.
 */

import { promises as fs } from "fs";
import path from "path";
import { zipSync, type Zippable } from "fflate";
import { ErrorFactory } from "../../shared/errors";
import { listFiles, writeFileAtomic } from "./atomic-operations";

/**
 * Fixed entry timestamp, so archiving an unchanged tree yields identical bytes.
 */
const ENTRY_MTIME = new Date("2000-01-01T00:00:00Z");

export type ArchiveResult = {
  path: string;
  entries: string[];
  bytes: number;
};

/**
 * Packs every file below `sourceDir` (entry names relative to it) into a zip
 * at `targetPath`, replacing any previous archive atomically.
 */
export const createArchive = async (sourceDir: string, targetPath: string): Promise<ArchiveResult> => {
  const entries = await listFiles(sourceDir);
  const zippable: Zippable = {};

  for (const entry of entries) {
    const filePath = path.join(sourceDir, ...entry.split("/"));
    try {
      zippable[entry] = [new Uint8Array(await fs.readFile(filePath)), { mtime: ENTRY_MTIME }];
    } catch (error) {
      throw ErrorFactory.fromFileSystemError(error, "archive", filePath);
    }
  }

  let archive: Uint8Array;
  try {
    archive = zipSync(zippable, { level: 6 });
  } catch (error) {
    throw ErrorFactory.fromFileSystemError(error, "archive", targetPath);
  }

  await writeFileAtomic(targetPath, archive);

  return { path: targetPath, entries, bytes: archive.byteLength };
};
