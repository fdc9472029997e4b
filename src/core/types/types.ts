export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ConverterConfig {
  sourceDirectory: string;
  outputDirectory: string; // Relative paths resolve against the source directory
  ffmpegPath: string;
  videoCodec: string;
  crf: number; // 0-51, lower is better
  preset: 'ultrafast' | 'superfast' | 'veryfast' | 'faster' | 'fast' | 'medium' | 'slow' | 'slower' | 'veryslow';
  audioCodec: string;
  audioBitrate: string; // e.g. "128k"
  workers: number; // Number of files to process simultaneously
  overwrite: boolean;
  includeAudio: boolean;
  keepIntermediate: boolean; // Keep per-file MP4s after a successful merge
  sourceExtension: string;
  assumedDurationSeconds: number; // Fixed duration used for progress estimation
  processTimeoutSeconds: number; // 0 disables the hard timeout
  logLevel: LogLevel;
}

export type ConfigKey = keyof ConverterConfig;

export type TaskKind = 'convert' | 'merge';

export type TaskStatus = 'waiting' | 'running' | 'completed' | 'failed' | 'cancelled';

export type BatchState = 'idle' | 'running' | 'paused' | 'cancelled' | 'drained';

export type FailureKind =
  | 'empty-input-list'
  | 'missing-input'
  | 'empty-input'
  | 'output-directory'
  | 'launch-failed'
  | 'exit-code'
  | 'decode-error'
  | 'interrupted'
  | 'timed-out'
  | 'missing-output'
  | 'internal';

export interface TaskSpec {
  kind?: TaskKind; // Defaults to 'convert'
  inputs: string[];
  output: string;
  includeAudio?: boolean;
  name?: string; // Defaults to the input (convert) or output (merge) file name
}

export interface Task {
  id: string;
  name: string; // Identity used in progress notifications
  kind: TaskKind;
  inputs: string[];
  output: string;
  includeAudio: boolean;
  status: TaskStatus;
  progress: number; // 0-100
  error?: string;
  failure?: FailureKind;
  attempts: number;
}

export type OperationResult =
  | { status: 'completed' }
  | { status: 'cancelled'; diagnostic: string }
  | { status: 'failed'; failure: FailureKind; diagnostic: string };

export interface ProgressCallback {
  (percent: number): void;
}

export interface BatchCounts {
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
  pending: number;
  running: number;
}

export interface BatchSummary {
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
  wasCancelled: boolean; // True when cancel() was called on this batch
  tasks: Task[]; // Snapshot of the batch's tasks at drain time
}

export interface ConfigReader {
  get<K extends ConfigKey>(key: K): ConverterConfig[K];
}
