// Matches ffmpeg's status field, e.g. "time=00:01:23.45"
const TIME_PATTERN = /time=(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)/;

const ERROR_KEYWORDS = ["error", "failed", "could not", "unable to", "no start code", "invalid data"];
const DECODE_ERROR_KEYWORDS = ["no start code", "invalid data", "error while decoding"];

/**
 * Elapsed output time in seconds carried by a status line, or null.
 */
export function parseElapsedSeconds(line: string): number | null {
  const match = TIME_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const hours = Number.parseInt(match[1], 10);
  const minutes = Number.parseInt(match[2], 10);
  const seconds = Number.parseFloat(match[3]);
  if (![hours, minutes, seconds].every(Number.isFinite)) {
    return null;
  }
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Progress percentage (0-100) for one line of ffmpeg output.
 *
 * The total is an assumed duration rather than the probed length of the
 * input, so the value is an estimate. Returns null for lines without a
 * timestamp, which is most of them.
 */
export function parseProgress(line: string, assumedTotalSeconds: number): number | null {
  if (!Number.isFinite(assumedTotalSeconds) || assumedTotalSeconds <= 0) {
    return null;
  }
  const elapsed = parseElapsedSeconds(line);
  if (elapsed === null) {
    return null;
  }
  return Math.min(100, Math.max(0, (elapsed * 100) / assumedTotalSeconds));
}

/**
 * True for output lines that look like an error or warning worth keeping.
 */
export function isErrorLine(line: string): boolean {
  const lower = line.toLowerCase();
  return ERROR_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * True for output lines that indicate the input stream failed to decode.
 */
export function sniffDecodeError(line: string): boolean {
  const lower = line.toLowerCase();
  return DECODE_ERROR_KEYWORDS.some((keyword) => lower.includes(keyword));
}
