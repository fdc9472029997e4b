import { setTimeout as sleep } from 'timers/promises';

export const DEFAULT_PAUSE_POLL_MS = 100;

/**
 * Read-only view of the pause/cancel flags shared by every in-flight operation
 * of a batch. Operations poll it at their checkpoints; the abort signal lets a
 * process be terminated without waiting for its next output line.
 */
export interface OperationHandle {
  readonly signal: AbortSignal;
  isCancelled(): boolean;
  isPaused(): boolean;
}

/**
 * Write side of an OperationHandle. Owned by the task queue, one per batch.
 */
export class OperationController {
  private readonly abortController = new AbortController();
  private paused = false;
  readonly handle: OperationHandle;

  constructor() {
    const signal = this.abortController.signal;
    this.handle = Object.freeze({
      signal,
      isCancelled: () => signal.aborted,
      isPaused: () => this.paused,
    });
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  cancel(): void {
    this.paused = false;
    this.abortController.abort();
  }
}

/**
 * Resolves once the handle is no longer paused, is cancelled, or `until`
 * returns true. Sleeps between polls instead of spinning.
 */
export async function waitWhilePaused(
  handle: OperationHandle,
  pollIntervalMs = DEFAULT_PAUSE_POLL_MS,
  until?: () => boolean
): Promise<void> {
  while (handle.isPaused() && !handle.isCancelled() && !until?.()) {
    await sleep(pollIntervalMs);
  }
}
