import * as fs from 'fs';
import * as path from 'path';
import type {
  ConfigReader,
  FailureKind,
  OperationResult,
  ProgressCallback,
  Task,
} from '../types/types';
import type { OperationHandle } from '../queue/operation-handle';
import { ProcessRunner, RunResult } from './process-runner';
import { buildConvertArgs, buildMergeArgs, EncodingConfig, getManifestPath, writeManifest } from './ffmpeg-args';
import { isErrorLine, parseProgress, sniffDecodeError } from './progress-parser';
import { debugLogger } from '../utils/debug-logger';

type FailedResult = Extract<OperationResult, { status: 'failed' }>;

function failed(failure: FailureKind, diagnostic: string): FailedResult {
  return { status: 'failed', failure, diagnostic };
}

/**
 * Runs one task of the queue. The queue only depends on this seam, so tests
 * and other front ends can substitute their own.
 */
export interface TaskExecutor {
  execute(task: Readonly<Task>, handle: OperationHandle, onProgress: ProgressCallback): Promise<OperationResult>;
}

export interface TranscodeOperationOptions {
  config: ConfigReader;
  ffmpegPath: string;
  runner?: ProcessRunner;
}

/**
 * Converts and merges camera recordings with ffmpeg.
 *
 * Every entry point checks its inputs before anything is spawned, and reports
 * failures as results rather than exceptions. Cancellation is reported as its
 * own outcome, never as a failure.
 */
export class TranscodeOperation implements TaskExecutor {
  private readonly config: ConfigReader;
  private readonly ffmpegPath: string;
  private readonly runner: ProcessRunner;

  constructor(options: TranscodeOperationOptions) {
    this.config = options.config;
    this.ffmpegPath = options.ffmpegPath;
    this.runner = options.runner ?? new ProcessRunner();
  }

  execute(task: Readonly<Task>, handle: OperationHandle, onProgress: ProgressCallback): Promise<OperationResult> {
    if (task.kind === 'merge') {
      return this.mergeMany(task.inputs, task.output, task.includeAudio, handle, onProgress);
    }
    return this.convertOne(task.inputs[0] ?? '', task.output, task.includeAudio, handle, onProgress);
  }

  async convertOne(
    input: string,
    output: string,
    includeAudio: boolean,
    handle: OperationHandle,
    onProgress?: ProgressCallback
  ): Promise<OperationResult> {
    debugLogger.info(`[Convert] ${input} -> ${output} (audio: ${includeAudio ? 'on' : 'off'})`);

    try {
      const precondition = (await this.checkInputs([input])) ?? (await this.ensureOutputDirectory(output));
      if (precondition) {
        debugLogger.error(`[Convert] ${precondition.diagnostic}`);
        return precondition;
      }

      const args = buildConvertArgs(input, output, includeAudio, this.encodingConfig());
      const result = await this.runFfmpeg(path.basename(input), args, handle, 1, onProgress);
      if (result.status === 'completed') {
        onProgress?.(100);
      }
      this.logOutcome('Convert', output, result);
      return result;
    } catch (error) {
      return this.internalFailure('Convert', output, error);
    }
  }

  async mergeMany(
    inputs: string[],
    output: string,
    includeAudio: boolean,
    handle: OperationHandle,
    onProgress?: ProgressCallback
  ): Promise<OperationResult> {
    debugLogger.info(`[Merge] ${inputs.length} file(s) -> ${output} (audio: ${includeAudio ? 'on' : 'off'})`);

    if (inputs.length === 0) {
      const result = failed('empty-input-list', 'Merge failed: the input file list is empty');
      debugLogger.error(`[Merge] ${result.diagnostic}`);
      return result;
    }

    try {
      const precondition = (await this.checkInputs(inputs)) ?? (await this.ensureOutputDirectory(output));
      if (precondition) {
        debugLogger.error(`[Merge] ${precondition.diagnostic}`);
        return precondition;
      }

      const manifestPath = getManifestPath(output);
      try {
        await writeManifest(manifestPath, inputs);
        const args = buildMergeArgs(manifestPath, output, includeAudio, this.encodingConfig());
        let result = await this.runFfmpeg(path.basename(output), args, handle, inputs.length, onProgress);

        if (result.status === 'completed' && !fs.existsSync(output)) {
          result = failed('missing-output', `Merge failed: ffmpeg exited cleanly but ${output} was not created`);
        }
        if (result.status === 'completed') {
          onProgress?.(100);
        }
        this.logOutcome('Merge', output, result);
        return result;
      } finally {
        await removeManifest(manifestPath);
      }
    } catch (error) {
      return this.internalFailure('Merge', output, error);
    }
  }

  /**
   * Returns a failure listing every missing or zero-size input, or null
   */
  private async checkInputs(inputs: string[]): Promise<FailedResult | null> {
    const missing: string[] = [];
    const empty: string[] = [];

    for (const input of inputs) {
      try {
        const stats = await fs.promises.stat(input);
        if (!stats.isFile() || stats.size === 0) {
          empty.push(input);
        }
      } catch {
        missing.push(input);
      }
    }

    if (missing.length === 0 && empty.length === 0) {
      return null;
    }

    const lines = [
      ...missing.map((input) => `${input} (file does not exist)`),
      ...empty.map((input) => `${input} (file is empty)`),
    ];
    const diagnostic = inputs.length === 1 ? `Invalid input: ${lines[0]}` : `Invalid input files:\n${lines.join('\n')}`;
    return failed(missing.length > 0 ? 'missing-input' : 'empty-input', diagnostic);
  }

  private async ensureOutputDirectory(output: string): Promise<FailedResult | null> {
    const outputDir = path.dirname(path.resolve(output));
    try {
      await fs.promises.mkdir(outputDir, { recursive: true });
      return null;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return failed('output-directory', `Could not create output directory ${outputDir}: ${reason}`);
    }
  }

  private async runFfmpeg(
    taskName: string,
    args: string[],
    handle: OperationHandle,
    inputCount: number,
    onProgress?: ProgressCallback
  ): Promise<OperationResult> {
    // A merge covers several recordings of the assumed length
    const assumedTotal = this.config.get('assumedDurationSeconds') * inputCount;
    let lastErrorLine: string | undefined;
    let decodeError = false;

    const result = await this.runner.run(this.ffmpegPath, args, {
      handle,
      timeoutMs: this.config.get('processTimeoutSeconds') * 1000,
      onLine: (line) => {
        debugLogger.logProcessOutput(taskName, line);
        const percent = parseProgress(line, assumedTotal);
        if (percent !== null) {
          onProgress?.(percent);
          return;
        }
        if (isErrorLine(line)) {
          lastErrorLine = line;
        }
        if (sniffDecodeError(line)) {
          decodeError = true;
        }
      },
    });

    return this.interpret(result, lastErrorLine, decodeError);
  }

  private interpret(result: RunResult, lastErrorLine: string | undefined, decodeError: boolean): OperationResult {
    const tailText = result.tail.length > 0 ? `\n\nLast output:\n${result.tail.join('\n')}` : '';

    switch (result.kind) {
      case 'cancelled':
        return { status: 'cancelled', diagnostic: 'Operation cancelled' };
      case 'timed-out':
        return failed(
          'timed-out',
          `ffmpeg did not finish within ${this.config.get('processTimeoutSeconds')} s and was terminated${tailText}`
        );
      case 'launch-failed': {
        const code = 'code' in result.error ? String(result.error.code) : '';
        const hint = code === 'ENOENT' ? ` (executable not found: "${this.ffmpegPath}")` : '';
        return failed('launch-failed', `Failed to start ffmpeg${hint}: ${result.error.message}`);
      }
      case 'exited': {
        if (result.exitCode === 0) {
          return { status: 'completed' };
        }
        if (result.exitCode === null) {
          return failed('interrupted', `ffmpeg was interrupted by ${result.signal ?? 'an unknown signal'}${tailText}`);
        }
        let diagnostic = `ffmpeg exited with code ${result.exitCode}`;
        if (decodeError) {
          diagnostic += ' (input stream could not be decoded)';
        }
        if (lastErrorLine) {
          diagnostic += `\nDetails: ${lastErrorLine}`;
        }
        return failed(decodeError ? 'decode-error' : 'exit-code', diagnostic + tailText);
      }
    }
  }

  private encodingConfig(): EncodingConfig {
    return {
      videoCodec: this.config.get('videoCodec'),
      crf: this.config.get('crf'),
      preset: this.config.get('preset'),
      audioCodec: this.config.get('audioCodec'),
      audioBitrate: this.config.get('audioBitrate'),
      overwrite: this.config.get('overwrite'),
    };
  }

  private logOutcome(label: string, output: string, result: OperationResult): void {
    if (result.status === 'completed') {
      debugLogger.info(`[${label}] Succeeded: ${output}`);
    } else if (result.status === 'cancelled') {
      debugLogger.info(`[${label}] Cancelled: ${output}`);
    } else {
      debugLogger.error(`[${label}] Failed: ${output} - ${result.diagnostic.split('\n')[0]}`);
    }
  }

  private internalFailure(label: string, output: string, error: unknown): OperationResult {
    const message = error instanceof Error ? error.message : String(error);
    debugLogger.error(`[${label}] Unexpected error for ${output}: ${message}`, error);
    return failed('internal', `Unexpected error during ${label.toLowerCase()}: ${message}`);
  }
}

async function removeManifest(manifestPath: string): Promise<void> {
  try {
    await fs.promises.rm(manifestPath, { force: true });
  } catch (error) {
    debugLogger.warn(`[Merge] Could not remove manifest ${manifestPath}: ${error}`);
  }
}
