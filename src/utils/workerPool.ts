import { Worker, WorkerOptions } from 'worker_threads';
import * as os from 'os';
import { LOG_PREFIX, WORKER_CONFIG } from '../constants.js';
import { ILogger, NullLogger } from './Logger.js';

/**
 * Message posted back by a worker thread for every task.
 * @template T - The type of the result payload
 */
export interface WorkerResult<T> {
  success: boolean;
  result?: T;
  error?: string;
}

interface QueuedTask<TTask, TResult> {
  taskData: TTask;
  resolve: (result: TResult) => void;
  reject: (error: Error) => void;
}

interface CurrentTask<TResult> {
  resolve: (result: TResult) => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
}

interface WorkerState<TResult> {
  worker: Worker;
  idle: boolean;
  currentTask?: CurrentTask<TResult>;
}

/**
 * Worker pool statistics.
 */
export interface WorkerPoolStats {
  poolSize: number;
  idleWorkers: number;
  queuedTasks: number;
  totalProcessed: number;
  totalErrors: number;
  activeTasks: number;
}

/**
 * Interface for worker pool operations.
 * Allows mocking thread pool in unit tests.
 */
export interface IWorkerPool<TTask, TResult> {
  /** Number of workers tasks are spread over. */
  readonly size: number;

  /**
   * Run a task on a worker thread.
   */
  runTask(taskData: TTask): Promise<TResult>;

  /**
   * Terminate all workers and reject anything still pending.
   */
  terminate(): Promise<void>;

  getStats(): WorkerPoolStats;
}

export interface WorkerPoolOptions {
  poolSize?: number;
  taskTimeoutMs?: number;
  logger?: ILogger;
  /** Passed to every `new Worker()`; `eval: true` treats the script as source text. */
  workerOptions?: WorkerOptions;
}

export function defaultPoolSize(): number {
  return Math.max(WORKER_CONFIG.MIN_WORKERS, os.cpus().length - 1);
}

export class WorkerPool<TTask, TResult> implements IWorkerPool<TTask, TResult> {
  private workers: WorkerState<TResult>[] = [];
  private taskQueue: QueuedTask<TTask, TResult>[] = [];
  private readonly poolSize: number;
  private readonly taskTimeoutMs: number;
  private readonly logger: ILogger;
  private readonly workerOptions: WorkerOptions | undefined;
  private totalTasksProcessed = 0;
  private totalErrors = 0;
  private activeTasks = 0;
  private terminated = false;

  constructor(
    private readonly workerScript: string | URL,
    options: WorkerPoolOptions = {}
  ) {
    this.poolSize = options.poolSize ?? defaultPoolSize();
    this.taskTimeoutMs = options.taskTimeoutMs ?? WORKER_CONFIG.TASK_TIMEOUT_MS;
    this.logger = options.logger ?? new NullLogger();
    this.workerOptions = options.workerOptions;

    this.logger.debug(
      `${LOG_PREFIX.WORKER_POOL} Creating pool with ${this.poolSize} workers (${os.cpus().length} CPUs available)`
    );
    for (let i = 0; i < this.poolSize; i++) {
      this.createWorker();
    }
  }

  get size(): number {
    return this.poolSize;
  }

  private createWorker(): void {
    const worker = new Worker(this.workerScript, this.workerOptions);
    const workerState: WorkerState<TResult> = {
      worker,
      idle: true
    };

    worker.on('error', (error) => {
      this.logger.error(`${LOG_PREFIX.WORKER_POOL} Worker error`, error);
      this.restartWorker(workerState);
    });

    worker.on('exit', (code) => {
      if (code !== 0 && !this.terminated) {
        this.logger.error(`${LOG_PREFIX.WORKER_POOL} Worker exited with code ${code}`);
        this.restartWorker(workerState);
      }
    });

    this.workers.push(workerState);
  }

  private restartWorker(workerState: WorkerState<TResult>): void {
    const index = this.workers.indexOf(workerState);
    if (index === -1 || this.terminated) {
      return;
    }

    // Reject the in-flight task before replacing the worker
    if (workerState.currentTask) {
      clearTimeout(workerState.currentTask.timeoutId);
      this.totalErrors++;
      workerState.currentTask.reject(new Error('Worker crashed or timed out while processing task'));
      workerState.currentTask = undefined;
    }

    this.workers.splice(index, 1);
    workerState.worker.terminate().catch((error: unknown) => {
      this.logger.error(`${LOG_PREFIX.WORKER_POOL} Error terminating worker`, error);
    });

    this.createWorker();
    this.processNextTask();
  }

  private getIdleWorker(): WorkerState<TResult> | undefined {
    return this.workers.find(w => w.idle);
  }

  runTask(taskData: TTask): Promise<TResult> {
    if (this.terminated) {
      return Promise.reject(new Error('WorkerPool terminated'));
    }

    this.activeTasks++;

    return new Promise<TResult>((resolve, reject) => {
      const wrappedResolve = (result: TResult) => {
        this.activeTasks--;
        resolve(result);
      };
      const wrappedReject = (error: Error) => {
        this.activeTasks--;
        reject(error);
      };

      const idleWorker = this.getIdleWorker();
      if (idleWorker) {
        this.executeTask(idleWorker, taskData, wrappedResolve, wrappedReject);
      } else {
        this.taskQueue.push({ taskData, resolve: wrappedResolve, reject: wrappedReject });
      }
    });
  }

  private executeTask(
    workerState: WorkerState<TResult>,
    taskData: TTask,
    resolve: (result: TResult) => void,
    reject: (error: Error) => void
  ): void {
    workerState.idle = false;

    const timeoutId = setTimeout(() => {
      this.logger.error(`${LOG_PREFIX.WORKER_POOL} Task timeout after ${this.taskTimeoutMs}ms`);
      workerState.worker.off('message', messageHandler);
      this.restartWorker(workerState);
    }, this.taskTimeoutMs);

    workerState.currentTask = { resolve, reject, timeoutId };

    const messageHandler = (result: WorkerResult<TResult>) => {
      clearTimeout(timeoutId);
      workerState.worker.off('message', messageHandler);
      workerState.idle = true;
      workerState.currentTask = undefined;

      if (result.success && result.result !== undefined) {
        this.totalTasksProcessed++;
        resolve(result.result);
      } else {
        this.totalErrors++;
        reject(new Error(result.error || 'Worker task failed'));
      }

      this.processNextTask();
    };

    workerState.worker.on('message', messageHandler);
    workerState.worker.postMessage(taskData);
  }

  private processNextTask(): void {
    while (this.taskQueue.length > 0) {
      const idleWorker = this.getIdleWorker();
      const task = this.taskQueue[0];
      if (!idleWorker || !task) {
        return;
      }
      this.taskQueue.shift();
      this.executeTask(idleWorker, task.taskData, task.resolve, task.reject);
    }
  }

  async terminate(): Promise<void> {
    this.terminated = true;

    for (const task of this.taskQueue) {
      task.reject(new Error('WorkerPool terminated'));
    }

    for (const workerState of this.workers) {
      if (workerState.currentTask) {
        clearTimeout(workerState.currentTask.timeoutId);
        workerState.currentTask.reject(new Error('WorkerPool terminated'));
        workerState.currentTask = undefined;
      }
    }

    await Promise.all(this.workers.map(workerState => workerState.worker.terminate()));
    this.workers = [];
    this.taskQueue = [];
  }

  getStats(): WorkerPoolStats {
    return {
      poolSize: this.workers.length,
      idleWorkers: this.workers.filter(w => w.idle).length,
      queuedTasks: this.taskQueue.length,
      totalProcessed: this.totalTasksProcessed,
      totalErrors: this.totalErrors,
      activeTasks: this.activeTasks
    };
  }
}
