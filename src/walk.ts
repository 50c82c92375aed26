/**
 * Directory traversal
 *
 * Entries are visited depth first in byte order of their names, which fixes
 * the scan order (and with it chapter numbering). Hidden entries below the
 * root are skipped and symbolic links are followed; a link back to a
 * directory that is still being visited is not entered again.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

/** True for names starting with a dot */
export function isHidden(name: string): boolean {
  return name.startsWith(".");
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export interface WalkOptions {
  /** Skip files for which this returns true */
  exclude?: (filePath: string) => boolean;
  /** Do not enter directories for which this returns true */
  prune?: (dirPath: string) => boolean;
}

/**
 * List every file below `root`, in scan order.
 *
 * @param root - Directory to scan
 * @returns File paths joined onto `root`
 */
export async function walkFiles(root: string, options: WalkOptions = {}): Promise<string[]> {
  const files: string[] = [];
  // real paths of the directories currently being visited
  const ancestors = new Set<string>();

  async function visit(dir: string): Promise<void> {
    const real = await fs.realpath(dir);
    if (ancestors.has(real)) {
      console.warn(`Warning: skipping ${dir}, it links back to ${real}`);
      return;
    }
    ancestors.add(real);

    const names = (await fs.readdir(dir)).filter((name) => !isHidden(name)).sort(compareNames);
    for (const name of names) {
      const entryPath = path.join(dir, name);
      // stat follows symbolic links
      const stats = await fs.stat(entryPath);
      if (stats.isDirectory()) {
        if (!options.prune?.(entryPath)) await visit(entryPath);
      } else if (stats.isFile() && !options.exclude?.(entryPath)) {
        files.push(entryPath);
      }
    }

    ancestors.delete(real);
  }

  await visit(root);
  return files;
}

/**
 * Copy every non-hidden file below `source` into `dest`, keeping relative paths.
 *
 * @param omitExtensions - File extensions (with dot) that are not copied
 * @returns Number of files copied
 */
export async function copyTree(source: string, dest: string, omitExtensions: string[] = []): Promise<number> {
  const files = await walkFiles(source, {
    exclude: (filePath) => omitExtensions.includes(path.extname(filePath)),
  });
  for (const file of files) {
    const target = path.join(dest, path.relative(source, file));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(file, target);
  }
  return files.length;
}
