import { ScoredCandidate } from '../types.js';
import { MinHeap } from '../utils/minHeap.js';

const SEPARATOR_PATTERN = /[\\/]+/;

function pathComponents(p: string): string[] {
  return p.split(SEPARATOR_PATTERN).filter(part => part.length > 0 && part !== '.');
}

/**
 * Code point order, which matches byte order of the UTF-8 encoding.
 * Plain `<` compares UTF-16 code units and puts U+E000..U+FFFF after
 * astral characters.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  if (i < a.length) {
    return 1;
  }
  return j < b.length ? -1 : 0;
}

/**
 * Order two paths component by component, each component by code point.
 * `a/b` therefore sorts before `a-b` even though '-' < '/' as characters.
 */
export function comparePaths(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  const left = pathComponents(a);
  const right = pathComponents(b);
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    const order = compareCodePoints(left[i] ?? '', right[i] ?? '');
    if (order !== 0) {
      return order;
    }
  }

  if (left.length !== right.length) {
    return left.length - right.length;
  }

  // Same components, different spelling (e.g. a//b vs a/b)
  return compareCodePoints(a, b);
}

/**
 * Ranking order: score descending, then path ascending.
 * Negative when `a` should be listed before `b`.
 */
export function compareScoredCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return comparePaths(a.candidate.path, b.candidate.path);
}

/**
 * Select the `limit` best candidates in ranking order.
 *
 * Keeps a heap of at most `limit` entries whose root is the worst one kept,
 * so the whole input is never sorted. Duplicate (score, path) entries are
 * kept as separate results.
 */
export function rankCandidates(scored: Iterable<ScoredCandidate>, limit: number): ScoredCandidate[] {
  if (limit <= 0) {
    return [];
  }

  const kept = new MinHeap<ScoredCandidate>((a, b) => compareScoredCandidates(b, a));

  for (const item of scored) {
    if (kept.size < limit) {
      kept.push(item);
      continue;
    }

    const worst = kept.peek();
    if (worst && compareScoredCandidates(item, worst) < 0) {
      kept.replaceTop(item);
    }
  }

  const ranked: ScoredCandidate[] = [];
  let next = kept.pop();
  while (next) {
    ranked.push(next);
    next = kept.pop();
  }
  return ranked.reverse();
}
