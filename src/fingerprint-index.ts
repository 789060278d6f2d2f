/**
 * Fingerprint index: groups discovered files by content fingerprint
 */

import pLimit from 'p-limit';
import { DuplicateGroup, Fingerprint, FingerprintFn } from './types.js';

export interface IndexFilesOptions {
  /** Maximum fingerprints computed at once */
  concurrency?: number;
  /** Called once per file after its fingerprint settles */
  onProgress?: (completed: number, total: number) => void;
}

export class FingerprintIndex {
  private buckets = new Map<Fingerprint, string[]>();
  private indexed = 0;
  private rejected = 0;

  /**
   * Append a path to its fingerprint's group. A missing fingerprint keeps
   * the path out of the index altogether.
   */
  add(path: string, fingerprint: Fingerprint | null): void {
    if (!fingerprint) {
      this.rejected++;
      return;
    }

    const bucket = this.buckets.get(fingerprint);
    if (bucket) {
      bucket.push(path);
    } else {
      this.buckets.set(fingerprint, [path]);
    }
    this.indexed++;
  }

  /**
   * Groups with at least two members. Each call starts a fresh pass.
   */
  *groups(): Generator<DuplicateGroup> {
    for (const [fingerprint, members] of this.buckets) {
      if (members.length > 1) {
        yield { fingerprint, members: [...members] };
      }
    }
  }

  /** Number of distinct fingerprints */
  get size(): number {
    return this.buckets.size;
  }

  get fileCount(): number {
    return this.indexed;
  }

  get rejectedCount(): number {
    return this.rejected;
  }
}

/**
 * Fingerprint files with bounded parallelism, then add them to the index
 * one at a time in discovery order.
 */
export async function indexFiles(
  index: FingerprintIndex,
  paths: readonly string[],
  fingerprint: FingerprintFn,
  options: IndexFilesOptions = {}
): Promise<FingerprintIndex> {
  const limit = pLimit(Math.max(1, options.concurrency ?? 1));
  let completed = 0;

  const fingerprints = await Promise.all(
    paths.map((path) =>
      limit(async () => {
        const result = await fingerprint(path);
        completed++;
        options.onProgress?.(completed, paths.length);
        return result;
      })
    )
  );

  paths.forEach((path, i) => index.add(path, fingerprints[i] ?? null));
  return index;
}
