// Tests for the two-phase convert-then-merge pipeline.
import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConvertMergePipeline } from "./convert-merge-pipeline";
import { scanAndSort } from "../files/file-scanner";
import { TaskQueue } from "./task-queue";
import type { OperationResult, Task } from "../types/types";
import { COMPLETED, ScriptedExecutor } from "../../test-utils/fake-executor";
import { delay, makeTempDir, removeTempDir, waitFor } from "../../test-utils/fake-process";

const NOW = () => new Date(2024, 0, 2, 3, 4, 5);

describe("ConvertMergePipeline", () => {
  let dir: string;
  let outDir: string;
  let merges: Array<{ inputs: string[]; convertsDone: number }>;
  let converted: number;

  const recordings = (...names: string[]): string[] =>
    names.map((name) => {
      const file = path.join(dir, name);
      fs.writeFileSync(file, "raw stream");
      return file;
    });

  // Writes outputs like ffmpeg would; inputs named "bad-*" fail
  const writingExecutor = () =>
    new ScriptedExecutor(async (task: Readonly<Task>): Promise<OperationResult> => {
      if (task.kind === "merge") {
        merges.push({ inputs: [...task.inputs], convertsDone: converted });
      } else if (path.basename(task.inputs[0]).startsWith("bad-")) {
        return { status: "failed", failure: "decode-error", diagnostic: "ffmpeg exited with code 1" };
      }
      await fs.promises.mkdir(path.dirname(task.output), { recursive: true });
      await fs.promises.writeFile(task.output, "mp4");
      if (task.kind === "convert") converted++;
      return COMPLETED;
    });

  const createPipeline = (executor: ScriptedExecutor) =>
    new ConvertMergePipeline(new TaskQueue({ executor, workerCount: 2, pollIntervalMs: 5 }));

  beforeEach(async () => {
    dir = await makeTempDir();
    outDir = path.join(dir, "converted");
    merges = [];
    converted = 0;
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("converts every file to <stem>.mp4 without merging", async () => {
    const pipeline = createPipeline(writingExecutor());

    const result = await pipeline.run(recordings("0-1.v264", "0-2.v264"), outDir, {
      includeAudio: false,
      merge: false,
      keepIntermediate: false,
    });

    expect(result.conversion).toMatchObject({ total: 2, completed: 2 });
    expect(result.merge).toBeUndefined();
    expect(merges).toEqual([]);
    expect(fs.existsSync(path.join(outDir, "0-1.mp4"))).toBe(true);
    expect(fs.existsSync(path.join(outDir, "0-2.mp4"))).toBe(true);
  });

  it("merges the converted files after the conversion batch drains", async () => {
    const pipeline = createPipeline(writingExecutor());
    const first = path.join(outDir, "0-1.mp4");
    const second = path.join(outDir, "0-2.mp4");

    const result = await pipeline.run(recordings("0-1.v264", "0-2.v264"), outDir, {
      includeAudio: false,
      merge: true,
      keepIntermediate: false,
      now: NOW,
    });

    expect(merges).toEqual([{ inputs: [first, second], convertsDone: 2 }]);
    expect(result.mergedOutput).toBe(path.join(outDir, "merged_20240102_030405.mp4"));
    expect(result.merge).toMatchObject({ total: 1, completed: 1 });
    expect(result.removedIntermediates).toEqual([first, second]);
    expect(fs.existsSync(first)).toBe(false);
    expect(fs.existsSync(second)).toBe(false);
    expect(fs.existsSync(path.join(outDir, "merged_20240102_030405.mp4"))).toBe(true);
  });

  it("keeps intermediate files when asked", async () => {
    const pipeline = createPipeline(writingExecutor());

    const result = await pipeline.run(recordings("0-1.v264"), outDir, {
      includeAudio: false,
      merge: true,
      keepIntermediate: true,
      now: NOW,
    });

    expect(result.removedIntermediates).toEqual([]);
    expect(fs.existsSync(path.join(outDir, "0-1.mp4"))).toBe(true);
  });

  it("merges only the conversions that succeeded", async () => {
    const pipeline = createPipeline(writingExecutor());

    const result = await pipeline.run(recordings("0-1.v264", "bad-2.v264", "0-3.v264"), outDir, {
      includeAudio: false,
      merge: true,
      keepIntermediate: true,
      now: NOW,
    });

    expect(result.conversion).toMatchObject({ completed: 2, failed: 1 });
    expect(merges).toEqual([
      { inputs: [path.join(outDir, "0-1.mp4"), path.join(outDir, "0-3.mp4")], convertsDone: 2 },
    ]);
  });

  it("skips the merge when nothing was converted", async () => {
    const pipeline = createPipeline(writingExecutor());

    const result = await pipeline.run(recordings("bad-1.v264"), outDir, {
      includeAudio: false,
      merge: true,
      keepIntermediate: false,
    });

    expect(result.conversion.failed).toBe(1);
    expect(result.merge).toBeUndefined();
    expect(merges).toEqual([]);
  });

  it("skips the merge after cancellation", async () => {
    const executor = new ScriptedExecutor(async (task, _onProgress, handle) => {
      if (task.kind === "merge") merges.push({ inputs: [...task.inputs], convertsDone: 0 });
      await waitFor(() => handle.isCancelled());
      return { status: "cancelled", diagnostic: "Operation cancelled" };
    });
    const pipeline = createPipeline(executor);

    const running = pipeline.run(recordings("0-1.v264", "0-2.v264", "0-3.v264"), outDir, {
      includeAudio: false,
      merge: true,
      keepIntermediate: false,
    });
    await waitFor(() => executor.executed.length === 2);
    pipeline.cancel();
    const result = await running;

    expect(result.conversion).toMatchObject({ total: 3, cancelled: 3, wasCancelled: true });
    expect(result.merge).toBeUndefined();
    expect(merges).toEqual([]);
  });

  it("keeps recordings with the same name in different folders apart", async () => {
    for (const camera of ["cam1", "cam2"]) {
      fs.mkdirSync(path.join(dir, camera));
      fs.writeFileSync(path.join(dir, camera, "0-102042.v264"), "raw stream");
    }
    const pipeline = createPipeline(writingExecutor());

    const result = await pipeline.run(scanAndSort(dir, ".v264"), outDir, {
      includeAudio: false,
      merge: false,
      keepIntermediate: false,
      sourceRoot: dir,
    });

    expect(result.conversion.completed).toBe(2);
    expect(result.conversion.tasks.map((task) => task.output)).toEqual([
      path.join(outDir, "cam1", "0-102042.mp4"),
      path.join(outDir, "cam2", "0-102042.mp4"),
    ]);
    expect(result.conversion.tasks.map((task) => task.name)).toEqual([
      path.join("cam1", "0-102042.v264"),
      path.join("cam2", "0-102042.v264"),
    ]);
  });

  it("rejects inputs that would share an output file", async () => {
    const executor = writingExecutor();
    const pipeline = createPipeline(executor);
    const first = path.join(dir, "cam1", "0-102042.v264");
    const second = path.join(dir, "cam2", "0-102042.v264");

    await expect(
      pipeline.run([first, second], outDir, { includeAudio: false, merge: false, keepIntermediate: false })
    ).rejects.toThrow(`${first} and ${second} would both be converted to ${path.join(outDir, "0-102042.mp4")}`);
    expect(executor.executed).toEqual([]);
  });

  it("returns an empty summary for no files", async () => {
    const pipeline = createPipeline(writingExecutor());

    const result = await pipeline.run([], outDir, { includeAudio: false, merge: true, keepIntermediate: false });

    expect(result.conversion).toEqual({ total: 0, completed: 0, failed: 0, cancelled: 0, wasCancelled: false, tasks: [] });
    expect(result.merge).toBeUndefined();
  });

  it("refuses to start while the queue is busy", async () => {
    const executor = new ScriptedExecutor(async () => {
      await delay(30);
      return COMPLETED;
    });
    const pipeline = createPipeline(executor);
    const files = recordings("0-1.v264");

    const first = pipeline.run(files, outDir, { includeAudio: false, merge: false, keepIntermediate: false });
    await expect(
      pipeline.run(files, outDir, { includeAudio: false, merge: false, keepIntermediate: false })
    ).rejects.toThrow("Cannot start a pipeline while the queue is running");
    await first;
  });
});
