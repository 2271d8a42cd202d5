import * as path from 'path';
import { Candidate, Query, ScoredCandidate, TypeFilter } from '../types.js';
import { fuzzyScore } from '../utils/fuzzySearch.js';

/**
 * Final path component used for scoring. Trailing separators are ignored;
 * a filesystem root yields an empty name.
 */
export function candidateName(candidatePath: string): string {
  return path.basename(candidatePath);
}

export function passesTypeFilter(candidate: Candidate, filter: TypeFilter): boolean {
  if (filter.filesOnly && !candidate.isFile) {
    return false;
  }
  if (filter.dirsOnly && !candidate.isDirectory) {
    return false;
  }
  return true;
}

/**
 * Apply type filtering, case folding and scoring to one candidate.
 * Returns undefined for anything filtered out or scoring 0.
 */
export function evaluateCandidate(
  candidate: Candidate,
  query: Query,
  filter: TypeFilter
): ScoredCandidate | undefined {
  if (!passesTypeFilter(candidate, filter)) {
    return undefined;
  }

  const name = candidateName(candidate.path);
  if (!name) {
    return undefined;
  }

  const insensitive = query.caseSensitivity === 'insensitive';
  const queryText = insensitive ? query.text.toLowerCase() : query.text;
  const nameText = insensitive ? name.toLowerCase() : name;

  const score = fuzzyScore(queryText, nameText);
  if (score <= 0) {
    return undefined;
  }

  return { candidate, score };
}

/**
 * Score a batch of candidates. Order of the output follows the input, which
 * the ranker does not depend on.
 */
export function evaluateBatch(
  candidates: readonly Candidate[],
  query: Query,
  filter: TypeFilter
): ScoredCandidate[] {
  const scored: ScoredCandidate[] = [];
  for (const candidate of candidates) {
    const result = evaluateCandidate(candidate, query, filter);
    if (result) {
      scored.push(result);
    }
  }
  return scored;
}
