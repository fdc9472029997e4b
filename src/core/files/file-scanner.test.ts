// Tests for recording discovery and output naming.
import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  extractTimestamp,
  getMergedOutputFilename,
  getOutputFilename,
  scanAndSort,
  sortByTimestamp,
} from "./file-scanner";
import { makeTempDir, removeTempDir } from "../../test-utils/fake-process";

describe("file scanner", () => {
  let dir: string;

  const touch = (...parts: string[]): string => {
    const file = path.join(dir, ...parts);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "raw");
    return file;
  };

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("finds recordings recursively in timestamp order", () => {
    const late = touch("0-120000.v264");
    const early = touch("sub", "0-080000.V264");
    const middle = touch("1-100000.v264");
    touch("notes.txt");
    touch(".hidden", "0-000001.v264");
    touch(".0-000002.v264");

    expect(scanAndSort(dir, ".v264")).toEqual([early, middle, late]);
  });

  it("sorts names without a timestamp first, keeping their order", () => {
    const named = touch("camera.v264");
    const stamped = touch("0-5.v264");
    const other = touch("zz.v264");

    expect(scanAndSort(dir, ".v264")).toEqual([named, other, stamped]);
  });

  it("returns nothing for a missing directory", () => {
    expect(scanAndSort(path.join(dir, "absent"), ".v264")).toEqual([]);
  });

  it("extracts timestamps from camera file names", () => {
    expect(extractTimestamp("0-102042.v264")).toBe(102042);
    expect(extractTimestamp("12-7.v264")).toBe(7);
    expect(extractTimestamp("clip.v264")).toBeNull();
    expect(extractTimestamp("a-1.v264")).toBeNull();
  });

  it("sorts stably by timestamp", () => {
    const files = [{ name: "2-30.v264" }, { name: "1-10.v264" }, { name: "0-30.v264" }, { name: "x.v264" }];
    expect(sortByTimestamp(files).map((file) => file.name)).toEqual(["x.v264", "1-10.v264", "2-30.v264", "0-30.v264"]);
  });

  it("names converted files after the input stem", () => {
    expect(getOutputFilename("/rec/0-102042.v264", "/out")).toBe(path.join("/out", "0-102042.mp4"));
  });

  it("keeps the input's folder below the source root", () => {
    expect(getOutputFilename("/rec/cam1/day/0-5.v264", "/out", "/rec")).toBe(path.join("/out", "cam1", "day", "0-5.mp4"));
    expect(getOutputFilename("/rec/0-5.v264", "/out", "/rec")).toBe(path.join("/out", "0-5.mp4"));
    expect(getOutputFilename("/elsewhere/0-5.v264", "/out", "/rec")).toBe(path.join("/out", "0-5.mp4"));
  });

  it("names merged files after the local time", () => {
    expect(getMergedOutputFilename("/out", new Date(2024, 10, 9, 8, 7, 6))).toBe(
      path.join("/out", "merged_20241109_080706.mp4")
    );
  });
});
