/**
 * Deletion planner
 *
 * Turns a duplicate group and its scope partition into keep/delete/skip
 * decisions. A group never loses its last copy:
 * - nothing is deletable when no copy sits inside an authorized root;
 * - manual mode keeps the copy the operator picks, or touches nothing;
 * - automatic mode keeps the first copy when every copy is deletable, and
 *   otherwise relies on the copies outside the authorized roots.
 */

import { AppError } from './logger.js';
import { DeletionDecision, DuplicateGroup, KeepIndexPrompt, Policy, ScopePartition } from './types.js';

export interface PlanOptions {
  policy: Policy;
  dryRun: boolean;
  /** Required by the manual policy */
  promptForKeepIndex?: KeepIndexPrompt;
}

function skipAll(group: DuplicateGroup, paths: readonly string[]): DeletionDecision[] {
  return paths.map((path): DeletionDecision => ({
    kind: 'skip',
    path,
    fingerprint: group.fingerprint,
    members: group.members,
  }));
}

function keepOne(
  group: DuplicateGroup,
  candidates: readonly string[],
  keepIndex: number,
  dryRun: boolean
): DeletionDecision[] {
  const decisions: DeletionDecision[] = [
    { kind: 'keep', path: candidates[keepIndex], fingerprint: group.fingerprint, members: group.members },
  ];
  candidates.forEach((path, i) => {
    if (i !== keepIndex) {
      decisions.push(deleteDecision(group, path, dryRun));
    }
  });
  return decisions;
}

function deleteDecision(group: DuplicateGroup, path: string, dryRun: boolean): DeletionDecision {
  return { kind: 'delete', path, fingerprint: group.fingerprint, members: group.members, simulated: dryRun };
}

/**
 * A 1-based selection is valid when it is an integer naming one of the candidates
 */
export function isValidKeepIndex(selection: number, candidateCount: number): boolean {
  return Number.isInteger(selection) && selection >= 1 && selection <= candidateCount;
}

/**
 * Plan the decisions for one group. The keep decision, if any, comes first.
 */
export async function plan(
  group: DuplicateGroup,
  scope: ScopePartition,
  options: PlanOptions
): Promise<DeletionDecision[]> {
  const { eligible } = scope;

  if (eligible.length === 0) {
    return skipAll(group, group.members);
  }

  if (options.policy === 'manual') {
    if (!options.promptForKeepIndex) {
      throw new AppError('Manual policy requires a keep-index prompt', 'INVALID_OPTION', 400);
    }
    const selection = await options.promptForKeepIndex(eligible, group.fingerprint);
    if (!isValidKeepIndex(selection, eligible.length)) {
      return skipAll(group, eligible);
    }
    return keepOne(group, eligible, selection - 1, options.dryRun);
  }

  if (eligible.length === group.members.length) {
    return keepOne(group, eligible, 0, options.dryRun);
  }

  return eligible.map(path => deleteDecision(group, path, options.dryRun));
}
