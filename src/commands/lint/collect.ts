/**
 * Migration file discovery.
 */

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import picomatch from "picomatch";
import { PathNotFoundError } from "../../core/errors.js";
import { debug } from "../../core/logger.js";

const isSqlFile = picomatch("*.sql", { dot: true });

async function statOrNull(path: string) {
  try {
    return await stat(path);
  } catch (error) {
    debug(`stat failed for ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(path, out);
    } else if (!isSqlFile(entry.name)) {
      continue;
    } else if (entry.isFile()) {
      out.push(path);
    } else if (entry.isSymbolicLink()) {
      // symlinked files count; symlinked directories are not walked
      const target = await statOrNull(path);
      if (target?.isFile()) {
        out.push(path);
      }
    }
  }
}

/**
 * Expand file and directory arguments into the list of files to lint.
 *
 * Directories contribute every `*.sql` beneath them, sorted; files are
 * taken as given whatever their extension.
 *
 * @throws PathNotFoundError when an argument is neither a file nor a directory
 */
export async function collectSqlFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const path of paths) {
    const stats = await statOrNull(path);

    if (stats?.isDirectory()) {
      const found: string[] = [];
      await walk(path, found);
      files.push(...found.sort());
    } else if (stats?.isFile()) {
      files.push(path);
    } else {
      throw new PathNotFoundError(path);
    }
  }

  return files;
}
