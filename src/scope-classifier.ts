/**
 * Decides which duplicate copies live inside the directories the operator
 * authorized for deletion.
 */

import { realpathSync } from 'fs';
import { isAbsolute, relative, sep } from 'path';
import { Logger, errorMessage } from './logger.js';
import { DuplicateGroup, ScopePartition } from './types.js';

const logger = new Logger({ context: 'scope' });

function canonicalize(path: string): string | null {
  try {
    return realpathSync(path);
  } catch (error) {
    logger.warn(`Error comparing paths: cannot resolve ${path}`, { error: errorMessage(error) });
    return null;
  }
}

/**
 * True when `path` is a strict descendant of `root` once both are resolved.
 * Unresolvable inputs are never within anything.
 */
export function isWithin(path: string, root: string): boolean {
  const canonicalPath = canonicalize(path);
  const canonicalRoot = canonicalize(root);
  if (canonicalPath === null || canonicalRoot === null) {
    return false;
  }

  const rel = relative(canonicalRoot, canonicalPath);
  if (rel === '' || isAbsolute(rel)) {
    return false;
  }
  return !rel.split(sep).includes('..');
}

/**
 * Drop members that name a physical file already listed under another path,
 * keeping the first. Unresolvable members are kept as they are.
 */
export function collapseAliases(group: DuplicateGroup): DuplicateGroup {
  const seen = new Set<string>();
  const members: string[] = [];

  for (const member of group.members) {
    const key = canonicalize(member) ?? member;
    if (!seen.has(key)) {
      seen.add(key);
      members.push(member);
    }
  }

  return members.length === group.members.length ? group : { fingerprint: group.fingerprint, members };
}

export function partition(group: DuplicateGroup, roots: readonly string[]): ScopePartition {
  const eligible: string[] = [];
  const ineligible: string[] = [];

  for (const member of group.members) {
    if (roots.some(root => isWithin(member, root))) {
      eligible.push(member);
    } else {
      ineligible.push(member);
    }
  }

  return { eligible, ineligible };
}
