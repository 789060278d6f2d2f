/**
 * Applies planned decisions, or simulates them in a dry run, and hands each
 * outcome to the action log and the session report.
 */

import { ActionLog } from './action-log.js';
import { Logger } from './logger.js';
import { SessionReport } from './session-report.js';
import { DeletionDecision, FileRemover } from './types.js';

const logger = new Logger({ context: 'executor' });

export class DecisionExecutor {
  constructor(
    private log: ActionLog,
    private report: SessionReport,
    private remover: FileRemover,
    private dryRun: boolean
  ) {}

  /**
   * Returns the outcome that was recorded
   */
  async apply(decision: DeletionDecision): Promise<DeletionDecision> {
    const outcome = await this.resolve(decision);
    this.log.record(outcome);
    this.report.recordOutcome(outcome.kind, outcome.kind === 'delete' && outcome.simulated);
    return outcome;
  }

  async applyAll(decisions: readonly DeletionDecision[]): Promise<DeletionDecision[]> {
    const outcomes: DeletionDecision[] = [];
    for (const decision of decisions) {
      outcomes.push(await this.apply(decision));
    }
    return outcomes;
  }

  private async resolve(decision: DeletionDecision): Promise<DeletionDecision> {
    if (decision.kind !== 'delete') {
      return decision;
    }
    if (decision.simulated || this.dryRun) {
      return { ...decision, simulated: true };
    }

    const result = await this.remover.remove(decision.path);
    if (result.ok) {
      return decision;
    }

    logger.warn(`Error deleting file: ${decision.path} - ${result.cause}`);
    return {
      kind: 'failed',
      path: decision.path,
      fingerprint: decision.fingerprint,
      members: decision.members,
      cause: result.cause,
    };
  }
}
