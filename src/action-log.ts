/**
 * Append-only audit trail of every decision made during a run.
 */

import { closeSync, existsSync, mkdirSync, openSync, writeSync } from 'fs';
import { join, resolve } from 'path';
import { AppError } from './logger.js';
import { DeletionDecision, HashAlgorithm, Policy } from './types.js';

export interface ActionLogHeader {
  algorithm: HashAlgorithm;
  policy: Policy;
  dryRun: boolean;
  scanRoots: readonly string[];
  deleteRoots: readonly string[];
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as YYYYMMDDHHMMSS
 */
export function formatLogTimestamp(date: Date): string {
  return (
    String(date.getFullYear()) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * `log_<timestamp>.txt`, or `log_<timestamp>_<n>.txt` for the n-th run
 * started in the same second
 */
export function logFileName(date: Date, attempt = 0): string {
  const suffix = attempt > 0 ? `_${attempt}` : '';
  return `log_${formatLogTimestamp(date)}${suffix}.txt`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

// Each run gets a file of its own; an existing log is never appended to.
function openNewLogFile(dir: string, date: Date): { path: string; fd: number } {
  for (let attempt = 0; ; attempt++) {
    const path = join(dir, logFileName(date, attempt));
    try {
      return { path, fd: openSync(path, 'wx') };
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
    }
  }
}

export function formatDecision(decision: DeletionDecision): string {
  const details = `(Hash: ${decision.fingerprint}, Duplicates: ${decision.members.join(', ')})`;

  switch (decision.kind) {
    case 'keep':
      return `Kept ${decision.path} ${details}`;
    case 'delete':
      return decision.simulated
        ? `DRY run: Would delete ${decision.path} ${details}`
        : `Deleted ${decision.path} ${details}`;
    case 'skip':
      return `Skipped ${decision.path} ${details}`;
    case 'failed':
      return `Failed to delete ${decision.path} - ${decision.cause}`;
  }
}

export function formatHeader(header: ActionLogHeader, date: Date): string[] {
  const mode = `${header.policy}${header.dryRun ? ' (dry run)' : ''}`;
  const authorized = header.deleteRoots.length > 0 ? header.deleteRoots.map(dir => `- ${dir}`) : ['- (none)'];

  return [
    'Log for the duplicate sweep',
    `Date: ${formatLogTimestamp(date)}`,
    `Using algorithm: ${header.algorithm}`,
    `Mode: ${mode}`,
    'Directories:',
    ...header.scanRoots.map(dir => `- ${dir}`),
    'Delete from:',
    ...authorized,
    '-------------------',
  ];
}

export class ActionLog {
  private fd: number | null;
  private lines = 0;

  private constructor(readonly path: string, fd: number) {
    this.fd = fd;
  }

  /**
   * Create the run's log file inside `dir` and write its header
   */
  static create(dir: string, header: ActionLogHeader, now: Date = new Date()): ActionLog {
    const logDir = resolve(dir);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }

    const { path, fd } = openNewLogFile(logDir, now);
    const log = new ActionLog(path, fd);
    for (const line of formatHeader(header, now)) {
      log.writeLine(line);
    }
    return log;
  }

  record(decision: DeletionDecision): void {
    this.writeLine(formatDecision(decision));
    this.lines++;
  }

  /** Decisions recorded so far */
  get recordCount(): number {
    return this.lines;
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  // One write per line keeps an interrupted run's log readable.
  private writeLine(line: string): void {
    if (this.fd === null) {
      throw new AppError(`Action log already closed: ${this.path}`, 'LOG_CLOSED', 500);
    }
    writeSync(this.fd, `${line}\n`);
  }
}
