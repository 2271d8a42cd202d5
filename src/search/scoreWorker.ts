/**
 * Worker thread entry: scores one chunk of candidates per message.
 * Loaded from the compiled output by the search engine's worker pool.
 */

import { parentPort } from 'worker_threads';
import { ScoredCandidate, ScoreTask } from '../types.js';
import { WorkerResult } from '../utils/workerPool.js';
import { describeError } from '../utils/Logger.js';
import { evaluateBatch } from './candidateFilter.js';

export function processScoreTask(task: ScoreTask): WorkerResult<ScoredCandidate[]> {
  try {
    return { success: true, result: evaluateBatch(task.candidates, task.query, task.typeFilter) };
  } catch (error: unknown) {
    return { success: false, error: describeError(error) };
  }
}

if (parentPort) {
  const port = parentPort;
  port.on('message', (task: ScoreTask) => {
    port.postMessage(processScoreTask(task));
  });
}
