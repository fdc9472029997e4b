import * as chokidar from 'chokidar';
import * as path from 'path';
import type { ConvertMergePipeline, PipelineResult } from '../core/queue/convert-merge-pipeline';
import { sortByTimestamp } from '../core/files/file-scanner';
import { debugLogger } from '../core/utils/debug-logger';

export interface WatchSessionOptions {
  directory: string;
  extension: string;
  outputDir: string;
  includeAudio: boolean;
  pipeline: ConvertMergePipeline;
  settleMs?: number; // Quiet period before a batch starts, so a burst of files becomes one batch
  onBatch?: (result: PipelineResult) => void;
}

/**
 * Continuous conversion of new recordings.
 *
 * Files reported while a batch is running are collected and converted as the
 * next batch once the current one has drained.
 */
export class WatchSession {
  private readonly pending = new Set<string>();
  private readonly seen = new Set<string>();
  private readonly settleMs: number;
  private watcher: chokidar.FSWatcher | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running: Promise<void> | null = null;
  private stopped = false;

  constructor(private readonly options: WatchSessionOptions) {
    this.settleMs = options.settleMs ?? 1000;
  }

  start(): void {
    debugLogger.info(`[Watch] Monitoring ${this.options.directory} for new *${this.options.extension} files`);

    this.watcher = chokidar.watch(this.options.directory, {
      persistent: true,
      ignoreInitial: false, // Convert existing files on startup
      awaitWriteFinish: {
        stabilityThreshold: 2000, // Wait 2 seconds after last change
        pollInterval: 100,
      },
      ignored: [
        /(^|[/\\])\../, // Dotfiles
        (candidate: string) => isInside(candidate, this.options.outputDir),
      ],
    });

    this.watcher
      .on('add', (filePath: string) => {
        this.enqueue(filePath);
      })
      .on('error', (error: unknown) => {
        debugLogger.error('[Watch] Error:', error);
      });
  }

  /**
   * Queue a file for the next batch. Returns false for files that are not
   * recordings or were already queued.
   */
  enqueue(filePath: string): boolean {
    if (this.stopped) return false;
    if (!filePath.toLowerCase().endsWith(this.options.extension.toLowerCase())) return false;

    const resolved = path.resolve(filePath);
    if (this.seen.has(resolved)) return false;

    this.seen.add(resolved);
    this.pending.add(resolved);
    debugLogger.info(`[Watch] New file detected: ${path.basename(resolved)}`);
    this.schedule();
    return true;
  }

  getPendingCount(): number {
    return this.pending.size;
  }

  /**
   * Resolves once no batch is running and nothing is waiting
   */
  async whenIdle(): Promise<void> {
    while (this.running || this.timer) {
      if (this.running) {
        await this.running;
      } else {
        await new Promise<void>((resolve) => setTimeout(resolve, this.settleMs));
      }
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    this.options.pipeline.cancel();
    if (this.running) {
      await this.running;
    }
    debugLogger.info('[Watch] Stopped');
  }

  private schedule(): void {
    // A running batch picks up pending files when it finishes
    if (this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => this.kick(), this.settleMs);
  }

  private kick(): void {
    this.timer = null;
    if (this.running || this.stopped) return;

    this.running = this.drainPending()
      .catch((error) => {
        debugLogger.error('[Watch] Batch failed unexpectedly', error);
      })
      .finally(() => {
        this.running = null;
        if (this.pending.size > 0 && !this.stopped) {
          this.schedule();
        }
      });
  }

  private async drainPending(): Promise<void> {
    while (this.pending.size > 0 && !this.stopped) {
      const files = sortByTimestamp([...this.pending].map((file) => ({ name: path.basename(file), path: file }))).map(
        (file) => file.path
      );
      this.pending.clear();

      debugLogger.info(`[Watch] Converting ${files.length} new file(s)`);
      const result = await this.options.pipeline.run(files, this.options.outputDir, {
        includeAudio: this.options.includeAudio,
        merge: false,
        keepIntermediate: true,
        sourceRoot: this.options.directory,
      });
      this.options.onBatch?.(result);
    }
  }
}

function isInside(candidate: string, directory: string): boolean {
  const relative = path.relative(path.resolve(directory), path.resolve(candidate));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}
