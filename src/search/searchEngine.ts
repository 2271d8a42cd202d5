import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { LOG_PREFIX, WORKER_CONFIG } from '../constants.js';
import { DirectoryWalker } from '../indexer/directoryWalker.js';
import { Profiler } from '../profiler/profiler.js';
import { Candidate, ScoredCandidate, ScoreTask, SearchConfig, SearchResult } from '../types.js';
import { IFileSystem } from '../utils/FileSystemService.js';
import { ILogger, NullLogger } from '../utils/Logger.js';
import { IWorkerPool, WorkerPool } from '../utils/workerPool.js';
import { evaluateBatch } from './candidateFilter.js';
import { rankCandidates } from './ranker.js';

export type ScorePool = IWorkerPool<ScoreTask, ScoredCandidate[]>;

/**
 * Creates the pool used for one parallel scoring pass, or returns null when
 * no worker can be started (scoring then runs on the calling thread).
 */
export type ScorePoolFactory = (threads: number, logger: ILogger) => ScorePool | null;

export interface SearchEngineOptions {
  logger?: ILogger;
  profiler?: Profiler;
  fileSystem?: IFileSystem;
  createPool?: ScorePoolFactory;
  minChunkSize?: number;
}

/**
 * Spawns worker threads from the compiled `scoreWorker.js` next to this
 * module. Returns null when running from TypeScript sources.
 */
export const createWorkerScorePool: ScorePoolFactory = (threads, logger) => {
  const workerScript = new URL('./scoreWorker.js', import.meta.url);
  if (!fs.existsSync(fileURLToPath(workerScript))) {
    logger.debug(`${LOG_PREFIX.ENGINE} Worker script not found at ${workerScript.href}`);
    return null;
  }
  return new WorkerPool<ScoreTask, ScoredCandidate[]>(workerScript, { poolSize: threads, logger });
};

/**
 * Split candidates into contiguous chunks, one per worker, never smaller
 * than `minChunkSize` (except the last).
 */
export function chunkCandidates(candidates: readonly Candidate[], workers: number, minChunkSize: number): Candidate[][] {
  const chunkSize = Math.max(minChunkSize, Math.ceil(candidates.length / Math.max(1, workers)));
  const chunks: Candidate[][] = [];
  for (let start = 0; start < candidates.length; start += chunkSize) {
    chunks.push(candidates.slice(start, start + chunkSize));
  }
  return chunks;
}

/**
 * SearchEngine - walk, score, rank.
 *
 * Scoring is a pure map over candidates, so it either runs inline or is
 * fanned out to worker threads; ranking starts only after every chunk has
 * come back and sees the same set either way.
 */
export class SearchEngine {
  private readonly logger: ILogger;
  private readonly profiler: Profiler;
  private readonly fileSystem: IFileSystem | undefined;
  private readonly createPool: ScorePoolFactory;
  private readonly minChunkSize: number;

  constructor(options: SearchEngineOptions = {}) {
    this.logger = options.logger ?? new NullLogger();
    this.profiler = options.profiler ?? new Profiler();
    this.fileSystem = options.fileSystem;
    this.createPool = options.createPool ?? createWorkerScorePool;
    this.minChunkSize = Math.max(1, options.minChunkSize ?? WORKER_CONFIG.MIN_CHUNK_SIZE);
  }

  async search(config: SearchConfig): Promise<SearchResult> {
    const walker = new DirectoryWalker({
      excludePatterns: config.excludePatterns,
      fileSystem: this.fileSystem,
      logger: this.logger
    });

    const traversal = await this.profiler.time('walk', () => walker.walk(config.root));
    if (traversal.diagnostics.length > 0) {
      this.logger.info(
        `${LOG_PREFIX.ENGINE} Skipped ${traversal.diagnostics.length} unreadable entries under ${config.root}`
      );
    }

    const scored = await this.profiler.time('score', () => this.score(traversal.candidates, config));

    const rankStart = performance.now();
    const results = rankCandidates(scored, config.limit);
    this.profiler.record('rank', performance.now() - rankStart);

    this.logger.debug(
      `${LOG_PREFIX.ENGINE} ${traversal.candidates.length} candidates, ${scored.length} matched, ` +
      `${results.length} returned`
    );

    return {
      results,
      candidatesScanned: traversal.candidates.length,
      candidatesMatched: scored.length,
      diagnostics: traversal.diagnostics
    };
  }

  /**
   * Score every candidate. Output order is unspecified.
   */
  async score(candidates: readonly Candidate[], config: SearchConfig): Promise<ScoredCandidate[]> {
    const { query, typeFilter } = config;

    if (!config.parallel) {
      return evaluateBatch(candidates, query, typeFilter);
    }

    const chunks = chunkCandidates(candidates, config.threads, this.minChunkSize);
    if (chunks.length <= 1) {
      this.logger.debug(`${LOG_PREFIX.ENGINE} ${candidates.length} candidates fit one chunk; scoring inline`);
      return evaluateBatch(candidates, query, typeFilter);
    }

    const pool = this.createPool(config.threads, this.logger);
    if (!pool) {
      this.logger.debug(`${LOG_PREFIX.ENGINE} No worker pool available; scoring inline`);
      return evaluateBatch(candidates, query, typeFilter);
    }

    try {
      this.logger.debug(`${LOG_PREFIX.ENGINE} Scoring ${chunks.length} chunks on ${pool.size} workers`);
      const results = await Promise.all(
        chunks.map(chunk => pool.runTask({ candidates: chunk, query, typeFilter }))
      );
      return results.flat();
    } finally {
      await pool.terminate();
    }
  }
}
