import * as path from 'path';
import type {
  BatchCounts,
  BatchState,
  BatchSummary,
  OperationResult,
  Task,
  TaskSpec,
} from '../types/types';
import type { TaskExecutor } from '../ffmpeg/transcode-operation';
import { OperationController, waitWhilePaused, DEFAULT_PAUSE_POLL_MS } from './operation-handle';
import { debugLogger } from '../utils/debug-logger';

export interface QueueCallbacks {
  onProgress?: (taskName: string, percent: number) => void;
  onBatchComplete?: (summary: BatchSummary) => void;
  onTaskStart?: (task: Readonly<Task>) => void;
  onTaskComplete?: (task: Readonly<Task>) => void;
  onTaskFailed?: (task: Readonly<Task>) => void;
}

export interface TaskQueueOptions extends QueueCallbacks {
  executor: TaskExecutor;
  workerCount: number;
  pollIntervalMs?: number; // Pause poll interval for idle workers
}

interface Batch {
  tasks: Task[];
  controller: OperationController;
  cursor: number; // Next index of `tasks` a worker looks at
  completed: number;
  failed: number;
  cancelled: number;
  wasCancelled: boolean;
  drained: boolean;
  done: Promise<BatchSummary>;
  resolveDone: (summary: BatchSummary) => void;
}

function createBatch(tasks: Task[]): Batch {
  let resolveDone: (summary: BatchSummary) => void = () => undefined;
  const done = new Promise<BatchSummary>((resolve) => {
    resolveDone = resolve;
  });
  return {
    tasks,
    controller: new OperationController(),
    cursor: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    wasCancelled: false,
    drained: false,
    done,
    resolveDone,
  };
}

/**
 * Ordered task list driven by a fixed pool of workers.
 *
 * A batch is the set of tasks that were waiting when `start()` was called.
 * Workers take tasks in list order; tasks may finish out of order. The
 * completion callback fires exactly once per batch, when the last task
 * settles. Settling runs synchronously on the event loop, so two workers
 * finishing together cannot both see the batch as full.
 */
export class TaskQueue {
  private tasks: Task[] = [];
  private state: BatchState = 'idle';
  private batch: Batch | null = null;
  private nextId = 1;
  private readonly executor: TaskExecutor;
  private readonly workerCount: number;
  private readonly pollIntervalMs: number;
  private readonly callbacks: QueueCallbacks;

  constructor(options: TaskQueueOptions) {
    if (!Number.isInteger(options.workerCount) || options.workerCount < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${options.workerCount}`);
    }
    this.executor = options.executor;
    this.workerCount = options.workerCount;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_PAUSE_POLL_MS;
    this.callbacks = {
      onProgress: options.onProgress,
      onBatchComplete: options.onBatchComplete,
      onTaskStart: options.onTaskStart,
      onTaskComplete: options.onTaskComplete,
      onTaskFailed: options.onTaskFailed,
    };
  }

  /**
   * Append a waiting task. Rejected while a batch is in progress, so a
   * running batch's total never changes.
   */
  addTask(spec: TaskSpec): Task | null {
    if (this.isActive()) {
      debugLogger.warn(`[Queue] Cannot add tasks while a batch is ${this.state}: ${spec.output}`);
      return null;
    }

    const kind = spec.kind ?? 'convert';
    if (kind === 'convert' && spec.inputs.length !== 1) {
      debugLogger.warn(`[Queue] A convert task takes exactly one input, got ${spec.inputs.length}`);
      return null;
    }

    const task: Task = {
      id: `task-${this.nextId++}`,
      name: spec.name ?? path.basename(kind === 'merge' ? spec.output : spec.inputs[0]),
      kind,
      inputs: [...spec.inputs],
      output: spec.output,
      includeAudio: spec.includeAudio ?? false,
      status: 'waiting',
      progress: 0,
      attempts: 0,
    };

    this.tasks.push(task);
    debugLogger.info(`[Queue] Added: ${task.name} -> ${task.output} (audio: ${task.includeAudio ? 'on' : 'off'})`);
    return task;
  }

  addTasks(specs: TaskSpec[]): Task[] {
    const added: Task[] = [];
    for (const spec of specs) {
      const task = this.addTask(spec);
      if (task) added.push(task);
    }
    debugLogger.info(`[Queue] Added ${added.length} of ${specs.length} task(s)`);
    return added;
  }

  /**
   * Dispatch every waiting task to the worker pool. Returns immediately.
   */
  start(): void {
    if (this.isActive()) {
      debugLogger.warn(`[Queue] A batch is already ${this.state}`);
      return;
    }

    const waiting = this.tasks.filter((task) => task.status === 'waiting');
    if (waiting.length === 0) {
      debugLogger.warn('[Queue] No waiting tasks to start');
      return;
    }

    const batch = createBatch(waiting);
    this.batch = batch;
    this.state = 'running';

    const workers = Math.min(this.workerCount, waiting.length);
    debugLogger.info(`[Queue] Starting batch of ${waiting.length} task(s) with ${workers} worker(s)`);

    for (let i = 0; i < workers; i++) {
      this.runWorker(batch).catch((error) => {
        debugLogger.error(`[Queue] Worker ${i + 1} stopped unexpectedly`, error);
      });
    }
  }

  pause(): void {
    if (!this.batch || this.state !== 'running') {
      debugLogger.warn(`[Queue] Cannot pause: queue is ${this.state}`);
      return;
    }
    this.batch.controller.pause();
    this.state = 'paused';
    debugLogger.info('[Queue] Paused');
  }

  resume(): void {
    if (!this.batch || this.state !== 'paused') {
      debugLogger.warn(`[Queue] Cannot resume: queue is ${this.state}`);
      return;
    }
    this.batch.controller.resume();
    this.state = 'running';
    debugLogger.info('[Queue] Resumed');
  }

  /**
   * Request cancellation. Waiting tasks are cancelled at once; running tasks
   * stop at their next checkpoint and settle on their own.
   */
  cancel(): void {
    const batch = this.batch;
    if (!batch || (this.state !== 'running' && this.state !== 'paused')) {
      debugLogger.warn(`[Queue] Cannot cancel: queue is ${this.state}`);
      return;
    }

    batch.wasCancelled = true;
    batch.controller.cancel();
    this.state = 'cancelled';

    let skipped = 0;
    for (const task of batch.tasks) {
      if (task.status === 'waiting') {
        task.status = 'cancelled';
        batch.cancelled++;
        skipped++;
      }
    }
    debugLogger.info(`[Queue] Cancelled (${skipped} waiting task(s) skipped)`);

    this.checkDrained(batch);
  }

  /**
   * Reset failed tasks to waiting and start them as a new batch
   */
  retryFailed(): void {
    if (this.isActive()) {
      debugLogger.warn(`[Queue] Cannot retry while a batch is ${this.state}`);
      return;
    }

    const failed = this.tasks.filter((task) => task.status === 'failed');
    if (failed.length === 0) {
      debugLogger.warn('[Queue] No failed tasks to retry');
      return;
    }

    for (const task of failed) {
      task.status = 'waiting';
      task.progress = 0;
      task.error = undefined;
      task.failure = undefined;
    }
    debugLogger.info(`[Queue] Retrying ${failed.length} failed task(s)`);
    this.start();
  }

  /**
   * Hard reset to an empty, idle queue. An active batch is cancelled and its
   * workers are detached: their results are ignored and no completion fires.
   */
  clear(): void {
    const batch = this.batch;
    if (batch && !batch.drained) {
      debugLogger.warn('[Queue] Clearing while a batch is in progress; in-flight tasks are abandoned');
      batch.wasCancelled = true;
      batch.controller.cancel();
      batch.resolveDone(this.summarize(batch));
    }

    this.tasks = [];
    this.batch = null;
    this.state = 'idle';
    debugLogger.info('[Queue] Cleared');
  }

  /**
   * Resolves with the summary of the current batch once it has drained
   */
  whenDrained(): Promise<BatchSummary> {
    if (!this.batch) {
      return Promise.reject(new Error('No batch has been started'));
    }
    return this.batch.done;
  }

  getState(): BatchState {
    return this.state;
  }

  getTasks(): readonly Readonly<Task>[] {
    return this.tasks;
  }

  getTask(id: string): Readonly<Task> | undefined {
    return this.tasks.find((task) => task.id === id);
  }

  getCounts(): BatchCounts {
    const batch = this.batch;
    if (!batch) {
      return {
        total: 0,
        completed: 0,
        failed: 0,
        cancelled: 0,
        pending: this.tasks.filter((task) => task.status === 'waiting').length,
        running: 0,
      };
    }
    return {
      total: batch.tasks.length,
      completed: batch.completed,
      failed: batch.failed,
      cancelled: batch.cancelled,
      pending: batch.tasks.filter((task) => task.status === 'waiting').length,
      running: batch.tasks.filter((task) => task.status === 'running').length,
    };
  }

  /**
   * Overall batch progress (0-100). Failed and cancelled tasks count as done.
   */
  getOverallProgress(): number {
    const batch = this.batch;
    if (!batch || batch.tasks.length === 0) {
      return 0;
    }
    const sum = batch.tasks.reduce((acc, task) => {
      if (task.status === 'failed' || task.status === 'cancelled') return acc + 100;
      return acc + task.progress;
    }, 0);
    return sum / batch.tasks.length;
  }

  private isActive(): boolean {
    return this.batch !== null && !this.batch.drained;
  }

  private async runWorker(batch: Batch): Promise<void> {
    const handle = batch.controller.handle;

    for (;;) {
      // Do not launch new processes while paused
      await waitWhilePaused(handle, this.pollIntervalMs);
      if (handle.isCancelled() || this.batch !== batch) return;

      const task = this.takeNext(batch);
      if (!task) return;

      await this.runTask(batch, task);
    }
  }

  private takeNext(batch: Batch): Task | null {
    while (batch.cursor < batch.tasks.length) {
      const task = batch.tasks[batch.cursor++];
      if (task.status === 'waiting') {
        return task;
      }
    }
    return null;
  }

  private async runTask(batch: Batch, task: Task): Promise<void> {
    task.status = 'running';
    task.progress = 0;
    task.attempts++;

    debugLogger.info(`[Queue] Processing: ${task.name} (attempt ${task.attempts})`);
    this.notify('onTaskStart', () => this.callbacks.onTaskStart?.(task));
    this.notify('onProgress', () => this.callbacks.onProgress?.(task.name, 0));

    let result: OperationResult;
    try {
      result = await this.executor.execute(task, batch.controller.handle, (percent) =>
        this.reportProgress(batch, task, percent)
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      debugLogger.error(`[Queue] Unexpected error in ${task.name}: ${message}`, error);
      result = { status: 'failed', failure: 'internal', diagnostic: `Internal error: ${message}` };
    }

    if (this.batch !== batch) {
      debugLogger.debug(`[Queue] Dropping result of ${task.name}: its batch was cleared`);
      return;
    }

    switch (result.status) {
      case 'completed': {
        // The operation may already have reported its final 100
        const reported = task.progress >= 100;
        task.status = 'completed';
        task.progress = 100;
        task.error = undefined;
        task.failure = undefined;
        batch.completed++;
        debugLogger.info(`[Queue] Completed: ${task.name}`);
        if (!reported) {
          this.notify('onProgress', () => this.callbacks.onProgress?.(task.name, 100));
        }
        this.notify('onTaskComplete', () => this.callbacks.onTaskComplete?.(task));
        break;
      }
      case 'failed':
        task.status = 'failed';
        task.error = result.diagnostic;
        task.failure = result.failure;
        batch.failed++;
        debugLogger.error(`[Queue] Failed: ${task.name} - ${result.diagnostic.split('\n')[0]}`);
        this.notify('onTaskFailed', () => this.callbacks.onTaskFailed?.(task));
        break;
      case 'cancelled':
        task.status = 'cancelled';
        batch.cancelled++;
        debugLogger.info(`[Queue] Cancelled: ${task.name}`);
        break;
    }

    this.checkDrained(batch);
  }

  private reportProgress(batch: Batch, task: Task, percent: number): void {
    if (this.batch !== batch || task.status !== 'running') return;
    // Never report a value lower than one already sent
    if (!(percent > task.progress)) return;
    task.progress = Math.min(100, percent);
    this.notify('onProgress', () => this.callbacks.onProgress?.(task.name, task.progress));
  }

  private checkDrained(batch: Batch): void {
    if (batch.drained || this.batch !== batch) return;
    if (batch.completed + batch.failed + batch.cancelled < batch.tasks.length) return;

    batch.drained = true;
    this.state = 'drained';

    const summary = this.summarize(batch);
    debugLogger.info(
      `[Queue] Batch finished: ${summary.completed} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled`
    );
    this.notify('onBatchComplete', () => this.callbacks.onBatchComplete?.(summary));
    batch.resolveDone(summary);
  }

  private summarize(batch: Batch): BatchSummary {
    return {
      total: batch.tasks.length,
      completed: batch.completed,
      failed: batch.failed,
      cancelled: batch.cancelled,
      wasCancelled: batch.wasCancelled,
      tasks: batch.tasks.map((task) => ({ ...task, inputs: [...task.inputs] })),
    };
  }

  private notify(name: keyof QueueCallbacks, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      debugLogger.error(`[Queue] ${name} callback threw`, error);
    }
  }
}
