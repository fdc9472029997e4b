// Tests for ffmpeg status line parsing.
import { describe, expect, it } from "vitest";
import { isErrorLine, parseElapsedSeconds, parseProgress, sniffDecodeError } from "./progress-parser";

const STATUS_LINE = "frame= 2250 fps=75 q=28.0 size=    1024kB time=00:01:30.00 bitrate=93.2kbits/s speed=3.01x";

describe("parseElapsedSeconds", () => {
  it("reads hours, minutes and fractional seconds", () => {
    expect(parseElapsedSeconds("time=01:02:03.50")).toBe(3723.5);
  });

  it("accepts whole seconds", () => {
    expect(parseElapsedSeconds("size=1kB time=00:00:07 bitrate=1")).toBe(7);
  });

  it("returns null for lines without a timestamp", () => {
    expect(parseElapsedSeconds("Stream #0:0: Video: h264")).toBeNull();
    expect(parseElapsedSeconds("time=N/A bitrate=N/A")).toBeNull();
  });
});

describe("parseProgress", () => {
  it("turns 90 s of a 600 s total into 15 percent", () => {
    expect(parseProgress(STATUS_LINE, 600)).toBe(15);
  });

  it("clamps past the assumed total to 100", () => {
    expect(parseProgress("time=00:12:00.00", 600)).toBe(100);
  });

  it("scales with the assumed total", () => {
    expect(parseProgress("time=00:10:00.00", 1200)).toBe(50);
  });

  it("returns null for lines without a timestamp", () => {
    expect(parseProgress("Input #0, h264, from 'clip.v264':", 600)).toBeNull();
  });

  it("returns null for a non-positive total", () => {
    expect(parseProgress(STATUS_LINE, 0)).toBeNull();
    expect(parseProgress(STATUS_LINE, -5)).toBeNull();
  });
});

describe("error detection", () => {
  it("flags lines containing error keywords regardless of case", () => {
    expect(isErrorLine("[h264 @ 0x1] Error splitting the input into NAL units.")).toBe(true);
    expect(isErrorLine("Could not write header for output file")).toBe(true);
    expect(isErrorLine("Unable to find a suitable output format")).toBe(true);
  });

  it("ignores ordinary output", () => {
    expect(isErrorLine(STATUS_LINE)).toBe(false);
    expect(isErrorLine("Press [q] to stop, [?] for help")).toBe(false);
  });

  it("recognises decode errors", () => {
    expect(sniffDecodeError("[h264 @ 0x1] no start code is found")).toBe(true);
    expect(sniffDecodeError("clip.v264: Invalid data found when processing input")).toBe(true);
    expect(sniffDecodeError("Error while decoding stream #0:0")).toBe(true);
    expect(sniffDecodeError("Conversion failed!")).toBe(false);
  });
});
