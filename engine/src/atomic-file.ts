import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import { storageError } from "./errors.ts";

export const TEMPORARY_FILE_SUFFIX = ".tmp";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Writes to a sibling temporary file and renames it over `path`, so readers
 * see either the previous content or the new content, never a partial file.
 */
export function writeFileAtomically(path: string, content: string, identity?: string): void {
  const directory = dirname(path);
  const temporaryPath = join(directory, `.${basename(path)}.${randomUUID()}${TEMPORARY_FILE_SUFFIX}`);

  try {
    mkdirSync(directory, { recursive: true });
    writeFileSync(temporaryPath, content, "utf8");
    renameSync(temporaryPath, path);
  } catch (error) {
    if (existsSync(temporaryPath)) {
      rmSync(temporaryPath, { force: true });
    }
    throw storageError("write", path, error, identity);
  }
}

/** Returns undefined when the file does not exist. */
export function readTextFileIfPresent(path: string, identity?: string): string | undefined {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw storageError("read", path, error, identity);
  }
}

/** Returns whether a file was removed. */
export function removeFileIfPresent(path: string, identity?: string): boolean {
  try {
    rmSync(path);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw storageError("remove", path, error, identity);
  }
}
