import type { TaskExecutor } from "../core/ffmpeg/transcode-operation";
import type { OperationHandle } from "../core/queue/operation-handle";
import type { OperationResult, ProgressCallback, Task } from "../core/types/types";

export interface PendingCall {
  task: Readonly<Task>;
  handle: OperationHandle;
  onProgress: ProgressCallback;
  settle: (result: OperationResult) => void;
}

/**
 * Executor whose operations stay running until the test settles them
 */
export class ManualExecutor implements TaskExecutor {
  readonly calls: PendingCall[] = [];

  execute(task: Readonly<Task>, handle: OperationHandle, onProgress: ProgressCallback): Promise<OperationResult> {
    return new Promise<OperationResult>((resolve) => {
      this.calls.push({ task, handle, onProgress, settle: resolve });
    });
  }
}

export type ExecutorScript = (
  task: Readonly<Task>,
  onProgress: ProgressCallback,
  handle: OperationHandle
) => OperationResult | Promise<OperationResult>;

/**
 * Executor that runs `script` for every task and records what it ran
 */
export class ScriptedExecutor implements TaskExecutor {
  readonly executed: string[] = [];
  running = 0;
  maxRunning = 0;

  constructor(private readonly script: ExecutorScript) {}

  async execute(task: Readonly<Task>, handle: OperationHandle, onProgress: ProgressCallback): Promise<OperationResult> {
    this.executed.push(task.name);
    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);
    try {
      return await this.script(task, onProgress, handle);
    } finally {
      this.running--;
    }
  }
}

export const COMPLETED: OperationResult = { status: "completed" };
