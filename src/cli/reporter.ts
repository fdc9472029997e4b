import type { BatchSummary, Task } from '../core/types/types';
import type { QueueCallbacks } from '../core/queue/task-queue';

export function formatTime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}h ${minutes}m ${secs}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${secs}s`;
  } else {
    return `${secs}s`;
  }
}

export interface ReporterOutput {
  write(text: string): void;
  log(text: string): void;
  error(text: string): void;
}

const consoleOutput: ReporterOutput = {
  write: (text) => {
    process.stdout.write(text);
  },
  log: (text) => console.log(text),
  error: (text) => console.error(text),
};

/**
 * Terminal progress for a batch. Progress lines are rewritten in place and
 * only when a task's whole-number percentage changes.
 */
export class ConsoleReporter {
  private readonly lastPercent = new Map<string, number>();
  private readonly startTime = Date.now();
  private filesCompleted = 0;
  private filesFailed = 0;

  constructor(
    private readonly overallProgress: () => number,
    private readonly output: ReporterOutput = consoleOutput
  ) {}

  callbacks(): QueueCallbacks {
    return {
      onTaskStart: (task) => this.onTaskStart(task),
      onProgress: (taskName, percent) => this.onProgress(taskName, percent),
      onTaskComplete: (task) => this.onTaskComplete(task),
      onTaskFailed: (task) => this.onTaskFailed(task),
    };
  }

  /**
   * One-line description of a task's progress
   */
  formatProgressLine(taskName: string, percent: number): string {
    const overall = Math.floor(this.overallProgress());
    return `\r[${taskName}] ${Math.floor(percent)}% | Overall: ${overall}%    `;
  }

  printSummary(summary: BatchSummary, label = 'Batch'): void {
    const elapsed = (Date.now() - this.startTime) / 1000;
    this.output.log('');
    this.output.log(
      `[${label}] ${summary.completed} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled` +
        ` (${summary.total} total)${summary.wasCancelled ? ' - cancelled by user' : ''}`
    );
    for (const task of summary.tasks) {
      if (task.status === 'failed') {
        this.output.error(`  ${task.name}: ${(task.error ?? 'unknown error').split('\n')[0]}`);
      }
    }
    this.output.log(`  Elapsed: ${formatTime(elapsed)}`);
  }

  getTotals(): { completed: number; failed: number } {
    return { completed: this.filesCompleted, failed: this.filesFailed };
  }

  private onTaskStart(task: Readonly<Task>): void {
    this.lastPercent.set(task.name, -1);
    this.output.log(`\n[Processing] Starting: ${task.name}`);
  }

  private onProgress(taskName: string, percent: number): void {
    const whole = Math.floor(percent);
    if (this.lastPercent.get(taskName) === whole) return;
    this.lastPercent.set(taskName, whole);
    this.output.write(this.formatProgressLine(taskName, percent));
  }

  private onTaskComplete(task: Readonly<Task>): void {
    this.filesCompleted++;
    this.lastPercent.delete(task.name);
    this.output.log(`\n[Complete] ${task.name} -> ${task.output}`);
  }

  private onTaskFailed(task: Readonly<Task>): void {
    this.filesFailed++;
    this.lastPercent.delete(task.name);
    this.output.error(`\n[Failed] ${task.name}: ${(task.error ?? 'unknown error').split('\n')[0]}`);
  }
}
