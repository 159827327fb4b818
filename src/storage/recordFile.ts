import { randomBytes } from "node:crypto";
import {
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { describeError, type StorageError } from "../domain/errors";
import { err, ok, type Result } from "../domain/result";

// fs errors may come from another realm (e.g. a test VM), so no instanceof.
function isMissingFileError(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

function toStorageError(error: unknown, fallback: string): StorageError {
  return { type: "IO", message: describeError(error, fallback) };
}

/**
 * Reads a whole text file. A missing file resolves to null.
 */
export function readTextFile(
  filePath: string,
): Result<string | null, StorageError> {
  try {
    return ok(readFileSync(filePath, "utf8"));
  } catch (error) {
    if (isMissingFileError(error)) {
      return ok(null);
    }
    return err(toStorageError(error, `Failed to read ${filePath}.`));
  }
}

/**
 * Replaces a file by writing a sibling temp file and renaming it over the
 * target, so readers see either the old or the new content in full.
 */
export function writeTextFileAtomic(
  filePath: string,
  contents: string,
): Result<void, StorageError> {
  const directory = dirname(filePath);
  const tempPath = join(
    directory,
    `.${basename(filePath)}.${randomBytes(6).toString("hex")}.tmp`,
  );

  try {
    mkdirSync(directory, { recursive: true });
    writeFileSync(tempPath, contents, "utf8");
    renameSync(tempPath, filePath);
    return ok(undefined);
  } catch (error) {
    try {
      rmSync(tempPath, { force: true });
    } catch (cleanupError) {
      console.warn("Failed to remove temp file:", cleanupError);
    }
    return err(toStorageError(error, `Failed to write ${filePath}.`));
  }
}
