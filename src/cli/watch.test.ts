// Tests for batching files reported by the directory watcher.
import * as path from "path";
import { describe, expect, it } from "vitest";
import { WatchSession } from "./watch";
import { ConvertMergePipeline, type PipelineResult } from "../core/queue/convert-merge-pipeline";
import { TaskQueue } from "../core/queue/task-queue";
import { COMPLETED, ScriptedExecutor } from "../test-utils/fake-executor";
import { delay, waitFor } from "../test-utils/fake-process";

function createSession(executor: ScriptedExecutor) {
  const batches: string[][] = [];
  const pipeline = new ConvertMergePipeline(new TaskQueue({ executor, workerCount: 1, pollIntervalMs: 5 }));
  const session = new WatchSession({
    directory: "/rec",
    extension: ".v264",
    outputDir: "/rec/converted",
    includeAudio: false,
    pipeline,
    settleMs: 10,
    onBatch: (result: PipelineResult) => batches.push(result.conversion.tasks.map((task) => task.inputs[0])),
  });
  return { session, batches };
}

describe("WatchSession", () => {
  it("converts a burst of new files as one batch in timestamp order", async () => {
    const { session, batches } = createSession(new ScriptedExecutor(() => COMPLETED));

    expect(session.enqueue("/rec/0-200.v264")).toBe(true);
    expect(session.enqueue("/rec/0-100.V264")).toBe(true);
    expect(session.enqueue("/rec/notes.txt")).toBe(false);
    expect(session.enqueue("/rec/0-200.v264")).toBe(false);
    await session.whenIdle();

    expect(batches).toEqual([[path.resolve("/rec/0-100.V264"), path.resolve("/rec/0-200.v264")]]);
  });

  it("queues files that arrive during a batch for the next one", async () => {
    const executor = new ScriptedExecutor(async () => {
      await delay(30);
      return COMPLETED;
    });
    const { session, batches } = createSession(executor);

    session.enqueue("/rec/0-1.v264");
    await waitFor(() => executor.executed.length === 1);
    session.enqueue("/rec/0-2.v264");
    expect(session.getPendingCount()).toBe(1);
    await session.whenIdle();

    expect(batches).toEqual([[path.resolve("/rec/0-1.v264")], [path.resolve("/rec/0-2.v264")]]);
  });

  it("accepts nothing after stopping", async () => {
    const { session, batches } = createSession(new ScriptedExecutor(() => COMPLETED));

    await session.stop();

    expect(session.enqueue("/rec/0-1.v264")).toBe(false);
    expect(batches).toEqual([]);
  });
});
