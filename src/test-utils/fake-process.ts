import { EventEmitter } from "events";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { PassThrough } from "stream";
import type { RunnableProcess, SpawnFunction } from "../core/ffmpeg/process-runner";

/**
 * In-process stand-in for a spawned ffmpeg
 */
export class FakeProcess extends EventEmitter implements RunnableProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];
  ignoreSigterm = false;
  private closed = false;

  constructor(
    readonly command: string,
    readonly args: string[]
  ) {
    super();
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    if (signal === "SIGTERM" && this.ignoreSigterm) {
      return true;
    }
    this.exit(null, typeof signal === "string" ? signal : "SIGTERM");
    return true;
  }

  line(text: string): void {
    this.stderr.write(`${text}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.closed) return;
    this.closed = true;
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit("close", code, signal));
  }

  failToLaunch(code = "ENOENT"): void {
    this.closed = true;
    this.emit("error", Object.assign(new Error(`spawn ${this.command} ${code}`), { code }));
  }

  isClosed(): boolean {
    return this.closed;
  }
}

export type FakeScript = (proc: FakeProcess) => void | Promise<void>;

/**
 * Spawn function whose processes are driven by `script`, started on the next
 * turn of the event loop so the runner has attached its listeners
 */
export function createFakeSpawn(script: FakeScript): { spawn: SpawnFunction; processes: FakeProcess[] } {
  const processes: FakeProcess[] = [];
  const spawn: SpawnFunction = (command, args) => {
    const proc = new FakeProcess(command, args);
    processes.push(proc);
    setImmediate(() => {
      Promise.resolve(script(proc)).catch((error: unknown) => {
        proc.emit("error", error instanceof Error ? error : new Error(String(error)));
      });
    });
    return proc;
  };
  return { spawn, processes };
}

/**
 * Writes the output file named last in the argument list, then exits 0
 */
export async function writeOutputAndExit(proc: FakeProcess): Promise<void> {
  const output = proc.args[proc.args.length - 1];
  await fs.promises.writeFile(output, "fake mp4");
  proc.line("frame=  100 fps= 50 q=-1.0 size=     256kB time=00:01:30.00 bitrate= 200.0kbits/s speed=2x");
  proc.exit(0);
}

export async function makeTempDir(prefix = "v264-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls `condition` until it holds, failing after `timeoutMs`
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Timed out waiting for condition");
    }
    await delay(2);
  }
}
