// Tests for the external process runner, driven by an in-process fake.
import { describe, expect, it } from "vitest";
import { LineTail, ProcessRunner } from "./process-runner";
import { OperationController } from "../queue/operation-handle";
import { createFakeSpawn, delay } from "../../test-utils/fake-process";

describe("LineTail", () => {
  it("keeps only the most recent lines in order", () => {
    const tail = new LineTail(3);
    for (const line of ["1", "2", "3", "4", "5"]) tail.push(line);
    expect(tail.lines()).toEqual(["3", "4", "5"]);
  });

  it("returns everything while below capacity", () => {
    const tail = new LineTail(3);
    tail.push("a");
    expect(tail.lines()).toEqual(["a"]);
  });
});

describe("ProcessRunner", () => {
  it("streams lines split on newlines and carriage returns", async () => {
    const { spawn, processes } = createFakeSpawn((proc) => {
      proc.stderr.write("a\nb\rc\r\n\n");
      proc.exit(0);
    });
    const seen: string[] = [];
    const result = await new ProcessRunner({ spawn }).run("ffmpeg", ["-i", "in file.v264"], {
      handle: new OperationController().handle,
      onLine: (line) => seen.push(line),
    });

    expect(seen).toEqual(["a", "b", "c"]);
    expect(result).toEqual({ kind: "exited", exitCode: 0, signal: null, tail: ["a", "b", "c"] });
    expect(processes[0].command).toBe("ffmpeg");
    expect(processes[0].args).toEqual(["-i", "in file.v264"]);
  });

  it("bounds the output tail", async () => {
    const { spawn } = createFakeSpawn((proc) => {
      for (let i = 1; i <= 10; i++) proc.line(`line ${i}`);
      proc.exit(1);
    });
    const result = await new ProcessRunner({ spawn }).run("ffmpeg", [], {
      handle: new OperationController().handle,
      tailSize: 3,
    });

    expect(result).toEqual({ kind: "exited", exitCode: 1, signal: null, tail: ["line 8", "line 9", "line 10"] });
  });

  it("stops at the next line once cancelled", async () => {
    const controller = new OperationController();
    const { spawn, processes } = createFakeSpawn((proc) => {
      proc.stderr.write("first\nsecond\nthird\n");
    });
    const seen: string[] = [];
    const result = await new ProcessRunner({ spawn, killGraceMs: 50 }).run("ffmpeg", [], {
      handle: controller.handle,
      onLine: (line) => {
        seen.push(line);
        if (line === "second") controller.cancel();
      },
    });

    expect(result.kind).toBe("cancelled");
    expect(seen).toEqual(["first", "second"]);
    expect(processes[0].killSignals).toEqual(["SIGTERM"]);
  });

  it("terminates a silent process when the handle is aborted", async () => {
    const controller = new OperationController();
    const { spawn, processes } = createFakeSpawn((proc) => proc.line("started"));
    const running = new ProcessRunner({ spawn, killGraceMs: 50 }).run("ffmpeg", [], { handle: controller.handle });

    await delay(20);
    controller.cancel();

    await expect(running).resolves.toEqual({ kind: "cancelled", tail: ["started"] });
    expect(processes[0].killSignals).toEqual(["SIGTERM"]);
  });

  it("force kills a process that ignores SIGTERM", async () => {
    const controller = new OperationController();
    const { spawn, processes } = createFakeSpawn((proc) => {
      proc.ignoreSigterm = true;
    });
    const running = new ProcessRunner({ spawn, killGraceMs: 20 }).run("ffmpeg", [], { handle: controller.handle });

    await delay(10);
    controller.cancel();

    await expect(running).resolves.toMatchObject({ kind: "cancelled" });
    expect(processes[0].killSignals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("holds lines while paused", async () => {
    const controller = new OperationController();
    controller.pause();
    const { spawn, processes } = createFakeSpawn((proc) => proc.line("one"));
    const seen: string[] = [];
    const running = new ProcessRunner({ spawn, pollIntervalMs: 5 }).run("ffmpeg", [], {
      handle: controller.handle,
      onLine: (line) => seen.push(line),
    });

    await delay(40);
    expect(seen).toEqual([]);

    controller.resume();
    await delay(40);
    expect(seen).toEqual(["one"]);

    processes[0].exit(0);
    await expect(running).resolves.toMatchObject({ kind: "exited", exitCode: 0 });
  });

  it("kills the process after the hard timeout", async () => {
    const { spawn, processes } = createFakeSpawn((proc) => proc.line("working"));
    const result = await new ProcessRunner({ spawn, killGraceMs: 50 }).run("ffmpeg", [], {
      handle: new OperationController().handle,
      timeoutMs: 30,
    });

    expect(result).toEqual({ kind: "timed-out", tail: ["working"] });
    expect(processes[0].killSignals).toEqual(["SIGTERM"]);
  });

  it("returns after the hard timeout even while paused", async () => {
    const controller = new OperationController();
    controller.pause();
    const { spawn, processes } = createFakeSpawn((proc) => proc.line("working"));

    const result = await new ProcessRunner({ spawn, killGraceMs: 50, pollIntervalMs: 5 }).run("ffmpeg", [], {
      handle: controller.handle,
      timeoutMs: 30,
    });

    expect(result).toEqual({ kind: "timed-out", tail: [] });
    expect(processes[0].killSignals).toEqual(["SIGTERM"]);
    expect(controller.handle.isPaused()).toBe(true);
  });

  it("reports launch failures", async () => {
    const { spawn } = createFakeSpawn((proc) => proc.failToLaunch("ENOENT"));
    const result = await new ProcessRunner({ spawn }).run("missing-ffmpeg", [], {
      handle: new OperationController().handle,
    });

    expect(result.kind).toBe("launch-failed");
    if (result.kind === "launch-failed") {
      expect(result.error.message).toBe("spawn missing-ffmpeg ENOENT");
    }
  });

  it("does not spawn when already cancelled", async () => {
    const controller = new OperationController();
    controller.cancel();
    const { spawn, processes } = createFakeSpawn(() => undefined);
    const result = await new ProcessRunner({ spawn }).run("ffmpeg", [], { handle: controller.handle });

    expect(result).toEqual({ kind: "cancelled", tail: [] });
    expect(processes).toHaveLength(0);
  });
});
