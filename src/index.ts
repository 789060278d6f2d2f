/**
 * Library entry point for the duplicate sweep pipeline
 */

export * from './types.js';
export { FingerprintIndex, indexFiles } from './fingerprint-index.js';
export type { IndexFilesOptions } from './fingerprint-index.js';
export { collapseAliases, isWithin, partition } from './scope-classifier.js';
export { plan, isValidKeepIndex } from './deletion-planner.js';
export type { PlanOptions } from './deletion-planner.js';
export { ActionLog, formatDecision, formatHeader, logFileName } from './action-log.js';
export type { ActionLogHeader } from './action-log.js';
export { SessionReport, formatDuration } from './session-report.js';
export type { SessionStats } from './session-report.js';
export { DecisionExecutor } from './decision-executor.js';
export { FsFileRemover } from './file-remover.js';
export { scanRoots } from './file-scanner.js';
export type { ScanOptions, ScanResult } from './file-scanner.js';
export { fingerprintFile, createFingerprinter, normalizeAlgorithm, SUPPORTED_ALGORITHMS } from './fingerprint.js';
export { ConfigManager, mergeConfigs, readEnvConfig, resolveRunConfig } from './config.js';
export type { RunConfigInput } from './config.js';
export { runDedupeSession } from './dedupe-session.js';
export type { SessionDependencies, SessionResult } from './dedupe-session.js';
export { Prompter, createKeepIndexPrompt } from './prompts.js';
export { AppError, Logger, handleError } from './logger.js';
