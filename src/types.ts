/**
 * A path produced by the directory walker.
 * Flags are captured during traversal and never re-derived.
 */
export interface Candidate {
  path: string;
  isDirectory: boolean;
  isFile: boolean;
}

export type CaseSensitivity = 'sensitive' | 'insensitive';

export interface Query {
  text: string;
  caseSensitivity: CaseSensitivity;
}

/**
 * Both flags may be set at once, in which case nothing passes.
 */
export interface TypeFilter {
  filesOnly: boolean;
  dirsOnly: boolean;
}

/**
 * Invariant: score > 0. Candidates scoring 0 are never wrapped.
 */
export interface ScoredCandidate {
  candidate: Candidate;
  score: number;
}

export interface TraversalDiagnostic {
  path: string;
  message: string;
  code?: string;
}

export interface TraversalResult {
  candidates: Candidate[];
  diagnostics: TraversalDiagnostic[];
}

/**
 * Everything a single search run needs. Built once by the configuration
 * layer and treated as read-only afterwards.
 */
export interface SearchConfig {
  query: Query;
  root: string;
  limit: number;
  typeFilter: TypeFilter;
  parallel: boolean;
  threads: number;
  excludePatterns: string[];
}

export interface SearchResult {
  results: ScoredCandidate[];
  candidatesScanned: number;
  candidatesMatched: number;
  diagnostics: TraversalDiagnostic[];
}

/**
 * Unit of work shipped to a scoring worker.
 */
export interface ScoreTask {
  candidates: Candidate[];
  query: Query;
  typeFilter: TypeFilter;
}
