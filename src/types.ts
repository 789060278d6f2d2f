/**
 * Core types for the duplicate sweep pipeline
 */

export type HashAlgorithm = 'MD5' | 'SHA-256';

export type Policy = 'manual' | 'automatic';

/**
 * Opaque content fingerprint, rendered as hex text
 */
export type Fingerprint = string;

/**
 * Files sharing one fingerprint, in discovery order
 */
export interface DuplicateGroup {
  fingerprint: Fingerprint;
  members: readonly string[];
}

/**
 * Group membership split by the authorized deletion roots
 */
export interface ScopePartition {
  /** Members inside at least one authorized root, in group order */
  eligible: readonly string[];
  /** Every other member */
  ineligible: readonly string[];
}

interface DecisionBase {
  path: string;
  fingerprint: Fingerprint;
  /** Full duplicate membership, kept for the audit trail */
  members: readonly string[];
}

export interface KeepDecision extends DecisionBase {
  kind: 'keep';
}

export interface DeleteDecision extends DecisionBase {
  kind: 'delete';
  /** Dry-run deletions are logged but never applied */
  simulated: boolean;
}

export interface SkipDecision extends DecisionBase {
  kind: 'skip';
}

export interface FailedDecision extends DecisionBase {
  kind: 'failed';
  cause: string;
}

export type DeletionDecision = KeepDecision | DeleteDecision | SkipDecision | FailedDecision;

export type DecisionKind = DeletionDecision['kind'];

/**
 * Fingerprinting collaborator: null when the file cannot be fingerprinted
 */
export type FingerprintFn = (path: string) => Promise<Fingerprint | null>;

/**
 * Interactive decision collaborator. Receives the eligible members and
 * returns a 1-based index of the copy to keep; 0 or out of range abstains.
 */
export type KeepIndexPrompt = (candidates: readonly string[], fingerprint: Fingerprint) => Promise<number>;

export type RemoveResult = { ok: true } | { ok: false; cause: string };

export interface FileRemover {
  remove(path: string): Promise<RemoveResult>;
}

/**
 * Immutable settings for one run
 */
export interface RunConfig {
  readonly algorithm: HashAlgorithm;
  readonly scanRoots: readonly string[];
  readonly deleteRoots: readonly string[];
  readonly dryRun: boolean;
  readonly policy: Policy;
  readonly logDir: string;
  readonly hashConcurrency: number;
  readonly exclude: readonly string[];
}
