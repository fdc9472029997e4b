export * from './types/types';
export { ProcessRunner, LineTail, DEFAULT_TAIL_SIZE, DEFAULT_KILL_GRACE_MS } from './ffmpeg/process-runner';
export type { RunnableProcess, RunOptions, RunResult, SpawnFunction, ProcessRunnerOptions } from './ffmpeg/process-runner';
export { parseProgress, parseElapsedSeconds, isErrorLine, sniffDecodeError } from './ffmpeg/progress-parser';
export {
  buildConvertArgs,
  buildMergeArgs,
  buildVideoArgs,
  buildAudioArgs,
  formatManifest,
  getManifestPath,
  writeManifest,
} from './ffmpeg/ffmpeg-args';
export type { EncodingConfig } from './ffmpeg/ffmpeg-args';
export { TranscodeOperation } from './ffmpeg/transcode-operation';
export type { TaskExecutor, TranscodeOperationOptions } from './ffmpeg/transcode-operation';
export { OperationController, waitWhilePaused, DEFAULT_PAUSE_POLL_MS } from './queue/operation-handle';
export type { OperationHandle } from './queue/operation-handle';
export { TaskQueue } from './queue/task-queue';
export type { QueueCallbacks, TaskQueueOptions } from './queue/task-queue';
export { ConvertMergePipeline } from './queue/convert-merge-pipeline';
export type { PipelineOptions, PipelineResult } from './queue/convert-merge-pipeline';
export { ConfigStore, DEFAULT_CONFIG, CONFIG_KEYS, isConfigKey, parseConfigValue } from './config/config-store';
export {
  scanAndSort,
  scanDirectoryRecursive,
  sortByTimestamp,
  extractTimestamp,
  getOutputFilename,
  getMergedOutputFilename,
} from './files/file-scanner';
export type { ScannedFile } from './files/file-scanner';
export { resolveFfmpegPath, createCliContext, getUserDataPath, APP_NAME } from './utils/ffmpeg-path';
export type { RuntimeContext } from './utils/ffmpeg-path';
export { detectFfmpeg, parseEncoderList, parseFfmpegVersion } from './utils/ffmpeg-detection';
export type { FfmpegDetectionResult } from './utils/ffmpeg-detection';
export { debugLogger, isLogLevel } from './utils/debug-logger';
