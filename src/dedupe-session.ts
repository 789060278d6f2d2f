/**
 * One duplicate sweep: scan, fingerprint, group, then decide and apply
 * group by group.
 */

import { ActionLog } from './action-log.js';
import { DecisionExecutor } from './decision-executor.js';
import { plan } from './deletion-planner.js';
import { FsFileRemover } from './file-remover.js';
import { scanRoots } from './file-scanner.js';
import { createFingerprinter } from './fingerprint.js';
import { FingerprintIndex, indexFiles } from './fingerprint-index.js';
import { AppError, Logger } from './logger.js';
import { ProgressTracker } from './progress.js';
import { collapseAliases, partition } from './scope-classifier.js';
import { SessionReport } from './session-report.js';
import { DeletionDecision, DuplicateGroup, FileRemover, FingerprintFn, KeepIndexPrompt, RunConfig } from './types.js';

const logger = new Logger({ context: 'session' });

export interface SessionDependencies {
  fingerprint?: FingerprintFn;
  remover?: FileRemover;
  /** Needed when the policy is manual */
  promptForKeepIndex?: KeepIndexPrompt;
  /** Sink for the hashing progress line; progress is not shown without one */
  progressOutput?: (text: string) => void;
  /** Called with every recorded outcome of a group */
  onGroup?: (group: DuplicateGroup, outcomes: readonly DeletionDecision[]) => void;
  clock?: () => number;
  now?: () => Date;
}

export interface SessionResult {
  report: SessionReport;
  logPath: string;
}

export async function runDedupeSession(config: RunConfig, deps: SessionDependencies = {}): Promise<SessionResult> {
  if (config.policy === 'manual' && !deps.promptForKeepIndex) {
    throw new AppError('Manual policy requires a keep-index prompt', 'INVALID_OPTION', 400);
  }

  const clock = deps.clock ?? Date.now;
  const report = new SessionReport(clock);
  const fingerprint = deps.fingerprint ?? createFingerprinter(config.algorithm);
  const remover = deps.remover ?? new FsFileRemover();

  const log = ActionLog.create(
    config.logDir,
    {
      algorithm: config.algorithm,
      policy: config.policy,
      dryRun: config.dryRun,
      scanRoots: config.scanRoots,
      deleteRoots: config.deleteRoots,
    },
    deps.now ? deps.now() : new Date(clock())
  );
  report.logPath = log.path;

  try {
    const scan = await scanRoots(config.scanRoots, { exclude: config.exclude });
    logger.debug(`Discovered ${scan.files.length} files`, { missingRoots: scan.missingRoots });

    const progress = deps.progressOutput
      ? new ProgressTracker({
          total: scan.files.length,
          label: `Calculating ${config.algorithm} hashes`,
          write: deps.progressOutput,
          clock,
        })
      : undefined;

    const index = await indexFiles(new FingerprintIndex(), scan.files, fingerprint, {
      concurrency: config.hashConcurrency,
      onProgress: (completed) => progress?.set(completed),
    });
    progress?.complete();
    report.recordScan(scan.files.length, index.rejectedCount, scan.missingRoots.length);

    const executor = new DecisionExecutor(log, report, remover, config.dryRun);

    for (const indexed of index.groups()) {
      const group = collapseAliases(indexed);
      if (group.members.length < 2) {
        logger.warn(`Ignoring group ${group.fingerprint}: every member is the same file`, {
          paths: [...indexed.members],
        });
        continue;
      }

      report.recordGroup();
      const scope = partition(group, config.deleteRoots);
      const decisions = await plan(group, scope, {
        policy: config.policy,
        dryRun: config.dryRun,
        promptForKeepIndex: deps.promptForKeepIndex,
      });
      const outcomes = await executor.applyAll(decisions);
      deps.onGroup?.(group, outcomes);
    }
  } finally {
    log.close();
    report.finish();
  }

  return { report, logPath: log.path };
}
