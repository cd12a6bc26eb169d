/**
 * JSON file helpers for the cache
 */

import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { dirname } from "path";
import * as logger from "@/logger";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read and parse a JSON file
 *
 * @returns undefined when the file does not exist
 * @throws {SyntaxError} When the content is not valid JSON
 */
export async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
  return JSON.parse(content);
}

/**
 * Write JSON through a temp file and rename, so readers never see a
 * half-written file. Concurrent writers: last rename wins.
 */
export async function writeJsonFileAtomic(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`;
  await writeFile(tempPath, JSON.stringify(value), "utf-8");
  try {
    await rename(tempPath, path);
  } catch (error) {
    await removeFile(tempPath);
    throw error;
  }
}

/**
 * Delete a file, ignoring "already gone"
 */
export async function removeFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }
    logger.warn("Failed to delete cache file", { path, error: logger.errorMessage(error) });
  }
}
