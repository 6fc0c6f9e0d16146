/**
 * File reader for the source tree.
 *
 * Walks the source directory recursively and returns every file that is not
 * ignored, with its path rebased onto the source root. Ignored directories
 * are pruned before they are descended into.
 *
 * Acceptance scenarios:
 * - Nested files are returned as `dir/sub/file.ext` regardless of platform
 * - `.git/`, `.github/` and `.gitignore` are skipped by the default patterns
 * - A missing or non-directory source path fails with LocalIOError
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Dirent, Stats } from "node:fs";
import { LocalIOError } from "../errors.js";
import type { LocalFolder, SourceFile } from "../types.js";
import { isIgnored } from "./ignore.js";

/**
 * Scans a directory recursively for files to upload.
 *
 * Symlinks are followed for files only; symlinked directories are skipped.
 * Results are sorted by relative path.
 *
 * @param sourcePath - Directory to scan
 * @param ignorePatterns - Shell-style patterns matched against each relative path and basename
 * @throws LocalIOError if the directory is missing, not a directory, or unreadable
 *
 * @example
 * ```ts
 * const folder = await scanSourceTree("./space", ["*.git*"]);
 * // folder.files:
 * // [
 * //   { relativePath: "app.py", absolutePath: "/abs/space/app.py", size: 120 },
 * //   { relativePath: "assets/logo.png", absolutePath: "/abs/space/assets/logo.png", size: 5120 },
 * // ]
 * ```
 */
export async function scanSourceTree(
  sourcePath: string,
  ignorePatterns: readonly string[]
): Promise<LocalFolder> {
  const root = path.resolve(sourcePath);

  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch (error) {
    throw new LocalIOError(
      `Source directory ${root} cannot be read: ${describeFsError(error)}`,
      root,
      { cause: error }
    );
  }

  if (!stats.isDirectory()) {
    throw new LocalIOError(`Source path ${root} is not a directory`, root);
  }

  const files: SourceFile[] = [];
  await walk(root, "", ignorePatterns, files);
  files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));

  return { root, files };
}

async function walk(
  root: string,
  relativeDir: string,
  ignorePatterns: readonly string[],
  out: SourceFile[]
): Promise<void> {
  const absoluteDir = relativeDir ? path.join(root, ...relativeDir.split("/")) : root;

  let entries: Dirent[];
  try {
    entries = await fs.readdir(absoluteDir, { withFileTypes: true });
  } catch (error) {
    throw new LocalIOError(
      `Cannot list ${absoluteDir}: ${describeFsError(error)}`,
      absoluteDir,
      { cause: error }
    );
  }

  for (const entry of entries) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    if (isIgnored(relativePath, ignorePatterns)) {
      continue;
    }

    const absolutePath = path.join(absoluteDir, entry.name);

    if (entry.isDirectory()) {
      await walk(root, relativePath, ignorePatterns, out);
    } else if (entry.isFile()) {
      out.push({ relativePath, absolutePath, size: await fileSize(absolutePath) });
    } else if (entry.isSymbolicLink()) {
      // Dangling links and links to directories are skipped
      const target = await fs.stat(absolutePath).catch(() => null);
      if (target?.isFile()) {
        out.push({ relativePath, absolutePath, size: target.size });
      }
    }
  }
}

async function fileSize(absolutePath: string): Promise<number> {
  try {
    const stats = await fs.stat(absolutePath);
    return stats.size;
  } catch (error) {
    throw new LocalIOError(
      `Cannot read ${absolutePath}: ${describeFsError(error)}`,
      absolutePath,
      { cause: error }
    );
  }
}

function describeFsError(error: unknown): string {
  const code = (error as NodeJS.ErrnoException | undefined)?.code;
  const message = error instanceof Error ? error.message : String(error);
  return code ? `${code}` : message;
}
