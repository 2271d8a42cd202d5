/**
 * Fuzzy scoring for path names.
 * Implements Smith-Waterman local alignment with:
 * - +2 per matching character, -1 per mismatch, -2 per gap
 * - a floor of 0 so an alignment can start anywhere
 * - additive boosts for exact and prefix matches
 */

import { SCORING } from '../constants.js';

/**
 * Best local alignment score between query and candidate, before boosts.
 * Characters are compared per code point, so surrogate pairs count once.
 *
 * Only two rows of the DP table are kept; row 0 and column 0 stay at zero,
 * which is what keeps leading gaps free.
 */
export function alignmentScore(query: string, candidate: string): number {
  const q = Array.from(query);
  const c = Array.from(candidate);
  const m = q.length;
  const n = c.length;

  if (m === 0 || n === 0) {
    return 0;
  }

  let previous = new Int32Array(n + 1);
  let current = new Int32Array(n + 1);
  let best = 0;

  for (let i = 1; i <= m; i++) {
    const queryChar = q[i - 1];
    current[0] = 0;

    for (let j = 1; j <= n; j++) {
      const diag = previous[j - 1] + (queryChar === c[j - 1] ? SCORING.MATCH : SCORING.MISMATCH);
      const up = previous[j] + SCORING.GAP;
      const left = current[j - 1] + SCORING.GAP;
      const cell = Math.max(0, diag, up, left);

      current[j] = cell;
      if (cell > best) {
        best = cell;
      }
    }

    [previous, current] = [current, previous];
  }

  return best;
}

/**
 * Score a (possibly case-folded) candidate name against a query.
 *
 * Tiers:
 * - exact match: alignment + 10000
 * - prefix match: alignment + 5000
 * - anything else: alignment only (at most 2 * min(|query|, |candidate|))
 *
 * Returns 0 when either side is empty; no boost applies then.
 */
export function fuzzyScore(query: string, candidate: string): number {
  if (!query || !candidate) {
    return 0;
  }

  let score = alignmentScore(query, candidate);

  if (query === candidate) {
    score += SCORING.EXACT_MATCH_BOOST;
  } else if (candidate.startsWith(query)) {
    score += SCORING.PREFIX_MATCH_BOOST;
  }

  return score;
}
