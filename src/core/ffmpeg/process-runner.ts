import { spawn as nodeSpawn } from 'child_process';
import { EventEmitter } from 'events';
import * as readline from 'readline';
import { PassThrough, Readable } from 'stream';
import { setTimeout as sleep } from 'timers/promises';
import { OperationHandle, waitWhilePaused, DEFAULT_PAUSE_POLL_MS } from '../queue/operation-handle';
import { debugLogger } from '../utils/debug-logger';

export const DEFAULT_TAIL_SIZE = 50;
export const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * The parts of a ChildProcess the runner relies on
 */
export interface RunnableProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFunction = (command: string, args: string[]) => RunnableProcess;

const defaultSpawn: SpawnFunction = (command, args) =>
  nodeSpawn(command, args, {
    shell: false,
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
  });

export type RunResult =
  | { kind: 'exited'; exitCode: number | null; signal: NodeJS.Signals | null; tail: string[] }
  | { kind: 'cancelled'; tail: string[] }
  | { kind: 'timed-out'; tail: string[] }
  | { kind: 'launch-failed'; error: Error; tail: string[] };

export interface RunOptions {
  onLine?: (line: string) => void;
  handle: OperationHandle;
  tailSize?: number;
  timeoutMs?: number; // 0 or undefined disables the hard timeout
}

export interface ProcessRunnerOptions {
  spawn?: SpawnFunction;
  killGraceMs?: number;
  pollIntervalMs?: number;
}

/**
 * Fixed-size buffer of the most recent output lines
 */
export class LineTail {
  private readonly buffer: string[] = [];
  private start = 0;

  constructor(private readonly capacity: number) {}

  push(line: string): void {
    if (this.capacity <= 0) return;
    if (this.buffer.length < this.capacity) {
      this.buffer.push(line);
      return;
    }
    this.buffer[this.start] = line;
    this.start = (this.start + 1) % this.capacity;
  }

  lines(): string[] {
    return [...this.buffer.slice(this.start), ...this.buffer.slice(0, this.start)];
  }
}

type ExitInfo =
  | { type: 'close'; code: number | null; signal: NodeJS.Signals | null }
  | { type: 'error'; error: Error };

/**
 * Runs one external process and streams its merged output line by line.
 *
 * Cancellation and pause are polled before every line. Cancellation also
 * reacts to the handle's abort signal so a process that prints nothing is
 * still terminated. Pausing holds line consumption only; the process itself
 * keeps running until its output pipe fills.
 */
export class ProcessRunner {
  private readonly spawnProcess: SpawnFunction;
  private readonly killGraceMs: number;
  private readonly pollIntervalMs: number;

  constructor(options: ProcessRunnerOptions = {}) {
    this.spawnProcess = options.spawn ?? defaultSpawn;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_PAUSE_POLL_MS;
  }

  async run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    const { handle, onLine } = options;
    const tail = new LineTail(options.tailSize ?? DEFAULT_TAIL_SIZE);

    if (handle.isCancelled()) {
      return { kind: 'cancelled', tail: [] };
    }

    debugLogger.logCommand(command, args);
    const proc = this.spawnProcess(command, args);

    const state: { exited: boolean; terminating: boolean; timedOut: boolean; killTimer: NodeJS.Timeout | null } = {
      exited: false,
      terminating: false,
      timedOut: false,
      killTimer: null,
    };

    const exit = new Promise<ExitInfo>((resolve) => {
      proc.on('error', (error: Error) => {
        state.exited = true;
        resolve({ type: 'error', error });
      });
      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        state.exited = true;
        resolve({ type: 'close', code, signal });
      });
    });

    const terminate = () => {
      if (state.exited || state.terminating) return;
      state.terminating = true;
      proc.kill('SIGTERM');
      // Give it a moment, then force kill if needed
      state.killTimer = setTimeout(() => {
        if (!state.exited) {
          debugLogger.warn(`[Process] ${command} ignored SIGTERM, sending SIGKILL`);
          proc.kill('SIGKILL');
        }
      }, this.killGraceMs);
      state.killTimer.unref();
    };

    const abortHandler = () => {
      debugLogger.debug(`[Process] Cancellation requested, terminating ${command}`);
      terminate();
    };
    handle.signal.addEventListener('abort', abortHandler, { once: true });

    const timeoutTimer =
      options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            state.timedOut = true;
            debugLogger.warn(`[Process] ${command} exceeded ${options.timeoutMs} ms, terminating`);
            terminate();
          }, options.timeoutMs)
        : null;

    const merged = mergeOutput(proc);
    void exit.then(() => merged.end());

    const lines = readline.createInterface({ input: merged.stream, crlfDelay: Infinity });

    let streamEnded = false;
    try {
      for await (const rawLine of lines) {
        const line = rawLine.trimEnd();
        if (!line) continue;

        if (handle.isPaused()) {
          await waitWhilePaused(handle, this.pollIntervalMs, () => state.timedOut);
        }
        if (handle.isCancelled() || state.timedOut) {
          terminate();
          break;
        }

        tail.push(line);
        onLine?.(line);
      }
      streamEnded = !state.terminating;
    } finally {
      lines.close();
      handle.signal.removeEventListener('abort', abortHandler);
      if (timeoutTimer) clearTimeout(timeoutTimer);
      // Left early (cancelled, or onLine threw): do not leave the process behind
      if (!streamEnded && !state.exited) terminate();
    }

    if (handle.isCancelled() || state.timedOut) {
      // Bounded wait: the process gets the kill grace period to go away
      await Promise.race([exit, sleep(this.killGraceMs, undefined, { ref: false })]);
      if (state.killTimer && state.exited) clearTimeout(state.killTimer);
      return state.timedOut && !handle.isCancelled()
        ? { kind: 'timed-out', tail: tail.lines() }
        : { kind: 'cancelled', tail: tail.lines() };
    }

    const info = await exit;
    if (state.killTimer) clearTimeout(state.killTimer);

    if (info.type === 'error') {
      return { kind: 'launch-failed', error: info.error, tail: tail.lines() };
    }
    return { kind: 'exited', exitCode: info.code, signal: info.signal, tail: tail.lines() };
  }
}

/**
 * Pipes stdout and stderr into one stream. The stream ends when both sources
 * have ended, or when `end()` is called after the process went away.
 */
function mergeOutput(proc: RunnableProcess): { stream: PassThrough; end: () => void } {
  const stream = new PassThrough();
  const sources = [proc.stdout, proc.stderr].filter((source): source is Readable => source !== null);
  let open = sources.length;

  const end = () => {
    if (stream.writableEnded) return;
    for (const source of sources) {
      source.unpipe(stream);
    }
    stream.end();
  };

  for (const source of sources) {
    source.pipe(stream, { end: false });
    source.once('end', () => {
      open -= 1;
      if (open === 0) end();
    });
  }
  if (open === 0) end();

  return { stream, end };
}
