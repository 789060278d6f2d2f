/**
 * Run-level counters and end-of-run summary
 */

import { DecisionKind } from './types.js';

export interface SessionStats {
  filesScanned: number;
  unreadableFiles: number;
  missingRoots: number;
  duplicateGroups: number;
  kept: number;
  skipped: number;
  simulated: number;
  failed: number;
  filesRemoved: number;
  elapsedSeconds: number;
}

/**
 * Seconds as h,mm,ss, e.g. 0h,01m,05s
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  return `${h}h,${String(m).padStart(2, '0')}m,${String(s).padStart(2, '0')}s`;
}

export class SessionReport {
  private stats: Omit<SessionStats, 'elapsedSeconds'> = {
    filesScanned: 0,
    unreadableFiles: 0,
    missingRoots: 0,
    duplicateGroups: 0,
    kept: 0,
    skipped: 0,
    simulated: 0,
    failed: 0,
    filesRemoved: 0,
  };
  private startedAt: number;
  private finishedAt?: number;
  logPath?: string;

  constructor(private clock: () => number = Date.now) {
    this.startedAt = clock();
  }

  recordScan(filesScanned: number, unreadableFiles: number, missingRoots: number): void {
    this.stats.filesScanned += filesScanned;
    this.stats.unreadableFiles += unreadableFiles;
    this.stats.missingRoots += missingRoots;
  }

  recordGroup(): void {
    this.stats.duplicateGroups++;
  }

  /**
   * Count one recorded outcome. Only an applied deletion counts as removed.
   */
  recordOutcome(kind: DecisionKind, simulated = false): void {
    switch (kind) {
      case 'keep':
        this.stats.kept++;
        break;
      case 'skip':
        this.stats.skipped++;
        break;
      case 'failed':
        this.stats.failed++;
        break;
      case 'delete':
        if (simulated) {
          this.stats.simulated++;
        } else {
          this.stats.filesRemoved++;
        }
        break;
    }
  }

  finish(): void {
    this.finishedAt = this.clock();
  }

  get filesRemoved(): number {
    return this.stats.filesRemoved;
  }

  getStats(): SessionStats {
    const end = this.finishedAt ?? this.clock();
    return { ...this.stats, elapsedSeconds: Math.round((end - this.startedAt) / 1000) };
  }

  summary(): string[] {
    const stats = this.getStats();
    const lines = [
      `Files scanned: ${stats.filesScanned}`,
      `Duplicate groups: ${stats.duplicateGroups}`,
      `Kept: ${stats.kept}, Skipped: ${stats.skipped}, Would delete: ${stats.simulated}, Failed: ${stats.failed}`,
    ];
    if (stats.unreadableFiles > 0) {
      lines.push(`Unreadable files: ${stats.unreadableFiles}`);
    }
    if (stats.missingRoots > 0) {
      lines.push(`Missing directories: ${stats.missingRoots}`);
    }
    lines.push(`Elapsed: ${formatDuration(stats.elapsedSeconds)}`);
    lines.push(`${stats.filesRemoved} Dup Files processed.`);
    lines.push(this.logPath ? `Done. Check ${this.logPath} for details.` : 'Done.');
    return lines;
  }
}
