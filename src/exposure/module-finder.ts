/**
 * Locate module source files under a set of roots.
 *
 * Roots may be files or directories. Directories are walked recursively,
 * skipping ignored directory names; only files with a configured
 * extension are kept. Each file remembers the root it was found under so
 * its module name can be derived relative to it.
 *
 * @module exposure/module-finder
 */

import { readdir, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { dirname, extname, join, resolve } from 'node:path';

export interface ModuleFile {
  /** Absolute path to the source file */
  path: string;
  /** Directory the module name is relative to */
  sourceDir: string;
}

export interface FindOptions {
  extensions: readonly string[];
  ignoreDirs: readonly string[];
}

export interface FindResult {
  files: ModuleFile[];
  /** Roots that do not exist */
  missing: string[];
}

async function walk(
  dir: string,
  sourceDir: string,
  options: FindOptions,
  out: ModuleFile[],
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (options.ignoreDirs.includes(entry.name)) continue;
      await walk(full, sourceDir, options, out);
    } else if (entry.isFile() && options.extensions.includes(extname(entry.name))) {
      out.push({ path: full, sourceDir });
    }
  }
}

/**
 * Find module files under the given roots.
 *
 * A file given directly as a root is kept whatever its extension, with its
 * own directory as source dir. Results are sorted by path and deduplicated.
 */
export async function findModuleFiles(
  roots: readonly string[],
  options: FindOptions,
): Promise<FindResult> {
  const files: ModuleFile[] = [];
  const missing: string[] = [];

  for (const root of roots) {
    const absolute = resolve(root);
    let info: Stats;
    try {
      info = await stat(absolute);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        missing.push(root);
        continue;
      }
      throw err;
    }

    if (info.isDirectory()) {
      await walk(absolute, absolute, options, files);
    } else {
      files.push({ path: absolute, sourceDir: dirname(absolute) });
    }
  }

  const seen = new Set<string>();
  const unique = files.filter((file) => {
    if (seen.has(file.path)) return false;
    seen.add(file.path);
    return true;
  });
  unique.sort((a, b) => a.path.localeCompare(b.path));

  return { files: unique, missing };
}
