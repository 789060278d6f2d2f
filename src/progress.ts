/**
 * Progress line for the hashing phase
 */

import { formatDuration } from './session-report.js';

export interface ProgressOptions {
  total: number;
  label?: string;
  /** Where the progress line goes; defaults to stdout */
  write?: (text: string) => void;
  clock?: () => number;
  updateIntervalMs?: number;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  estimatedTotal: number;
  isComplete: boolean;
}

/**
 * Simple progress tracker for CLI operations
 */
export class ProgressTracker {
  private current = 0;
  private total: number;
  private label: string;
  private write: (text: string) => void;
  private clock: () => number;
  private startTime: number;
  private lastUpdate = Number.NEGATIVE_INFINITY;
  private updateIntervalMs: number;

  constructor(options: ProgressOptions) {
    this.total = options.total;
    this.label = options.label || 'Progress';
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.clock = options.clock ?? Date.now;
    this.startTime = this.clock();
    this.updateIntervalMs = options.updateIntervalMs ?? 100;
  }

  /**
   * Set progress to specific value
   */
  set(value: number): void {
    this.current = Math.min(Math.max(value, 0), this.total);
    this.updateDisplay();
  }

  /**
   * Mark as complete
   */
  complete(): void {
    this.current = this.total;
    this.updateDisplay();
    this.write('\n');
  }

  getStats(): ProgressStats {
    const elapsed = Math.floor((this.clock() - this.startTime) / 1000);
    const estimatedTotal = this.current > 0 ? Math.floor((elapsed * this.total) / this.current) : 0;

    return {
      current: this.current,
      total: this.total,
      percent: this.total > 0 ? Math.floor((this.current * 100) / this.total) : 100,
      elapsed,
      estimatedTotal,
      isComplete: this.current >= this.total
    };
  }

  format(): string {
    const stats = this.getStats();
    return (
      `${this.label}: ${stats.current}/${stats.total} (${stats.percent}%)` +
      ` Elapsed: ${formatDuration(stats.elapsed)}` +
      ` Estimated Total: ${formatDuration(stats.estimatedTotal)}`
    );
  }

  private updateDisplay(): void {
    const now = this.clock();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;
    this.write(`\r${this.format()}`);
  }
}
