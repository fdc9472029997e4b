// Tests for ffmpeg executable resolution.
import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCliContext, resolveFfmpegPath } from "./ffmpeg-path";
import { makeTempDir, removeTempDir } from "../../test-utils/fake-process";

describe("resolveFfmpegPath", () => {
  let appPath: string;
  const executable = process.platform === "win32" ? "ffmpeg.exe" : "ffmpeg";

  beforeEach(async () => {
    appPath = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(appPath);
  });

  it("uses an absolute path as given", () => {
    const absolute = path.resolve("/opt/tools/ffmpeg");
    expect(resolveFfmpegPath(absolute, { appPath })).toBe(absolute);
  });

  it("resolves a relative path against the app path", () => {
    expect(resolveFfmpegPath("tools/ffmpeg", { appPath })).toBe(path.join(appPath, "tools", "ffmpeg"));
  });

  it("prefers a bundled executable", () => {
    const bundled = path.join(appPath, "ffmpeg", "bin", executable);
    fs.mkdirSync(path.dirname(bundled), { recursive: true });
    fs.writeFileSync(bundled, "");

    expect(resolveFfmpegPath("ffmpeg", { appPath })).toBe(bundled);
  });

  it("falls back to the system PATH", () => {
    expect(resolveFfmpegPath("ffmpeg", { appPath })).toBe("ffmpeg");
    expect(resolveFfmpegPath("  ", { appPath })).toBe("ffmpeg");
  });

  it("creates a CLI context rooted at the given directory", () => {
    const context = createCliContext(appPath);
    expect(context.appPath).toBe(appPath);
    expect(context.userDataPath).toMatch(/v264-converter$/);
  });
});
