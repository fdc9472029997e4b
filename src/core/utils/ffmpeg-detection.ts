import { spawn } from "child_process";
import { debugLogger } from "./debug-logger";

async function spawnAndCapture(
  executable: string,
  args: string[],
  timeoutMs: number
): Promise<{ code: number | null; stdout: string; stderr: string; timedOut: boolean; launchError?: string }> {
  return new Promise((resolve) => {
    const proc = spawn(executable, args, {
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    let done = false;

    const finish = (result: { code: number | null; stdout: string; stderr: string; timedOut: boolean; launchError?: string }) => {
      if (done) return;
      done = true;
      clearTimeout(timeout);
      resolve(result);
    };

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code) => {
      finish({ code, stdout, stderr, timedOut: false });
    });

    proc.on("error", (err) => {
      finish({ code: null, stdout: "", stderr: "", timedOut: false, launchError: err.message });
    });

    const timeout = setTimeout(() => {
      proc.kill();
      finish({ code: null, stdout, stderr, timedOut: true });
    }, timeoutMs);
  });
}

/**
 * Result of ffmpeg detection
 */
export interface FfmpegDetectionResult {
  executable: string;
  available: boolean;
  version?: string;
  encoders: string[];
  videoEncoderAvailable: boolean;
  audioEncoderAvailable: boolean;
  error?: string;
}

/**
 * Extract the version string from `ffmpeg -version` output
 */
export function parseFfmpegVersion(output: string): string | undefined {
  const match = output.match(/ffmpeg version (\S+)/i);
  return match ? match[1] : undefined;
}

/**
 * Extract encoder names from `ffmpeg -encoders` output.
 *
 * Encoder rows look like ` V....D libx264   libx264 H.264 / AVC ...`: a
 * six-character capability column followed by the encoder name. The legend
 * above the separator line is skipped.
 */
export function parseEncoderList(output: string): string[] {
  const lines = output.split(/\r?\n/);
  const separator = lines.findIndex((line) => line.trim().startsWith("------"));
  const rows = separator >= 0 ? lines.slice(separator + 1) : lines;

  const encoders: string[] = [];
  for (const row of rows) {
    const match = row.match(/^\s*[VAS][A-Z.]{5}\s+(\S+)/);
    if (match) {
      encoders.push(match[1]);
    }
  }
  return encoders;
}

/**
 * Check that ffmpeg can be launched and supports the configured encoders
 */
export async function detectFfmpeg(
  executable: string,
  required: { videoCodec: string; audioCodec: string },
  timeoutMs = 5000
): Promise<FfmpegDetectionResult> {
  const base: FfmpegDetectionResult = {
    executable,
    available: false,
    encoders: [],
    videoEncoderAvailable: false,
    audioEncoderAvailable: false,
  };

  const versionRun = await spawnAndCapture(executable, ["-hide_banner", "-version"], timeoutMs);
  if (versionRun.launchError) {
    debugLogger.warn(`[Detection] Could not launch ${executable}: ${versionRun.launchError}`);
    return { ...base, error: `Could not launch ffmpeg: ${versionRun.launchError}` };
  }
  if (versionRun.timedOut) {
    return { ...base, error: `ffmpeg did not answer within ${timeoutMs} ms` };
  }
  if (versionRun.code !== 0) {
    return { ...base, error: `ffmpeg -version exited with code ${versionRun.code}: ${versionRun.stderr.trim()}` };
  }

  const version = parseFfmpegVersion(versionRun.stdout);
  debugLogger.debug(`[Detection] ffmpeg ${version ?? "unknown version"} at ${executable}`);

  const encoderRun = await spawnAndCapture(executable, ["-hide_banner", "-encoders"], timeoutMs);
  const encoders = encoderRun.code === 0 ? parseEncoderList(encoderRun.stdout) : [];
  if (encoderRun.code !== 0) {
    debugLogger.warn(`[Detection] Could not list encoders (exit ${encoderRun.code})`);
  }

  return {
    ...base,
    available: true,
    version,
    encoders,
    videoEncoderAvailable: encoders.includes(required.videoCodec),
    audioEncoderAvailable: encoders.includes(required.audioCodec),
  };
}
