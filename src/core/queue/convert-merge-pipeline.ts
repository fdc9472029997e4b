import * as fs from 'fs';
import * as path from 'path';
import type { BatchSummary, TaskSpec } from '../types/types';
import type { TaskQueue } from './task-queue';
import { getMergedOutputFilename, getOutputFilename } from '../files/file-scanner';
import { debugLogger } from '../utils/debug-logger';

export interface PipelineOptions {
  includeAudio: boolean;
  merge: boolean;
  keepIntermediate: boolean;
  sourceRoot?: string; // Subdirectories under this root are kept in the output
  now?: () => Date;
}

export interface PipelineResult {
  conversion: BatchSummary;
  merge?: BatchSummary;
  mergedOutput?: string;
  removedIntermediates: string[];
}

function emptySummary(): BatchSummary {
  return { total: 0, completed: 0, failed: 0, cancelled: 0, wasCancelled: false, tasks: [] };
}

function buildConvertSpecs(files: string[], outputDir: string, options: PipelineOptions): TaskSpec[] {
  const { sourceRoot } = options;
  const byOutput = new Map<string, string>();
  return files.map((file) => {
    const output = getOutputFilename(file, outputDir, sourceRoot);
    const key = path.resolve(output);
    const previous = byOutput.get(key);
    if (previous !== undefined) {
      throw new Error(`${previous} and ${file} would both be converted to ${output}`);
    }
    byOutput.set(key, file);

    const relative = sourceRoot === undefined ? '' : path.relative(path.resolve(sourceRoot), path.resolve(file));
    const name = relative && !relative.startsWith('..') && !path.isAbsolute(relative) ? relative : path.basename(file);
    return { kind: 'convert', inputs: [file], output, includeAudio: options.includeAudio, name };
  });
}

/**
 * Converts every recording, then optionally concatenates the converted files
 * into one MP4 as a second batch on the same queue.
 */
export class ConvertMergePipeline {
  private cancelled = false;

  constructor(private readonly queue: TaskQueue) {}

  async run(files: string[], outputDir: string, options: PipelineOptions): Promise<PipelineResult> {
    const state = this.queue.getState();
    if (state === 'running' || state === 'paused') {
      throw new Error(`Cannot start a pipeline while the queue is ${state}`);
    }

    this.cancelled = false;
    this.queue.clear();

    if (files.length === 0) {
      debugLogger.warn('[Pipeline] No files to convert');
      return { conversion: emptySummary(), removedIntermediates: [] };
    }

    const specs = buildConvertSpecs(files, outputDir, options);
    this.queue.addTasks(specs);
    this.queue.start();
    const conversion = await this.queue.whenDrained();

    if (!options.merge) {
      return { conversion, removedIntermediates: [] };
    }
    if (this.cancelled || conversion.wasCancelled) {
      debugLogger.info('[Pipeline] Conversion was cancelled, skipping merge');
      return { conversion, removedIntermediates: [] };
    }

    // Recording order is the order the tasks were added
    const converted = conversion.tasks.filter((task) => task.status === 'completed').map((task) => task.output);
    if (converted.length === 0) {
      debugLogger.warn('[Pipeline] No files were converted, nothing to merge');
      return { conversion, removedIntermediates: [] };
    }

    const mergedOutput = getMergedOutputFilename(outputDir, options.now ? options.now() : new Date());
    debugLogger.info(`[Pipeline] Merging ${converted.length} file(s) into ${mergedOutput}`);

    this.queue.addTask({ kind: 'merge', inputs: converted, output: mergedOutput, includeAudio: options.includeAudio });
    this.queue.start();
    const merge = await this.queue.whenDrained();

    const removedIntermediates: string[] = [];
    if (merge.completed === 1 && !options.keepIntermediate) {
      for (const file of converted) {
        try {
          await fs.promises.rm(file, { force: true });
          removedIntermediates.push(file);
        } catch (error) {
          debugLogger.warn(`[Pipeline] Could not remove intermediate file ${file}: ${error}`);
        }
      }
      debugLogger.info(`[Pipeline] Removed ${removedIntermediates.length} intermediate file(s)`);
    }

    return { conversion, merge, mergedOutput, removedIntermediates };
  }

  /**
   * Cancel the running phase; a merge that has not started yet never will
   */
  cancel(): void {
    this.cancelled = true;
    const state = this.queue.getState();
    if (state === 'running' || state === 'paused') {
      this.queue.cancel();
    }
  }
}
