import { realpath, stat } from 'fs/promises';
import { resolve } from 'path';
import fg from 'fast-glob';
import { Logger, errorMessage } from './logger.js';

const logger = new Logger({ context: 'scanner' });

export interface ScanOptions {
  /** Glob patterns, relative to each root, to leave out */
  exclude?: readonly string[];
}

export interface ScanResult {
  /** Absolute file paths in discovery order, each listed once */
  files: string[];
  /** Roots that were skipped because they do not exist or are not directories */
  missingRoots: string[];
}

async function canonicalPath(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch {
    return path;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Enumerate regular files under each root. Roots are visited in the order
 * given and each root's files are sorted, so discovery order is stable
 * across filesystems. A physical file reachable under several roots, or
 * through a symlinked root, is listed once, under the first path found.
 */
export async function scanRoots(roots: readonly string[], options: ScanOptions = {}): Promise<ScanResult> {
  const files: string[] = [];
  const missingRoots: string[] = [];
  const seen = new Set<string>();

  for (const root of roots) {
    const rootPath = resolve(root);
    if (!(await isDirectory(rootPath))) {
      logger.warn(`Directory not found: ${root}`);
      missingRoots.push(root);
      continue;
    }

    let entries: string[];
    try {
      entries = await fg('**/*', {
        cwd: rootPath,
        onlyFiles: true,
        dot: true,
        followSymbolicLinks: false,
        absolute: true,
        unique: true,
        ignore: [...(options.exclude ?? [])],
        suppressErrors: true,
      });
    } catch (error) {
      logger.warn(`Cannot read directory: ${root}`, { error: errorMessage(error) });
      missingRoots.push(root);
      continue;
    }

    for (const entry of entries.map(entry => resolve(entry)).sort()) {
      const key = await canonicalPath(entry);
      if (!seen.has(key)) {
        seen.add(key);
        files.push(entry);
      }
    }
  }

  return { files, missingRoots };
}
