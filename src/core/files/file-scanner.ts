import * as fs from 'fs';
import * as path from 'path';
import { debugLogger } from '../utils/debug-logger';

export interface ScannedFile {
  name: string;
  path: string;
  relativePath: string;
}

/**
 * Recursively collect files with the given extension (case-insensitive).
 * Dot files and dot directories are skipped; entries are visited in name
 * order so results are stable across filesystems.
 */
export function scanDirectoryRecursive(
  dirPath: string,
  extension: string,
  baseDir: string = dirPath
): ScannedFile[] {
  const results: ScannedFile[] = [];
  const wanted = extension.toLowerCase();

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    debugLogger.error(`[Scan] Error scanning directory ${dirPath}: ${error}`);
    return results;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      results.push(...scanDirectoryRecursive(fullPath, extension, baseDir));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(wanted)) {
      results.push({
        name: entry.name,
        path: fullPath,
        relativePath: path.relative(baseDir, fullPath),
      });
    }
  }

  return results;
}

/**
 * Timestamp embedded in camera file names such as `0-102042.v264` (102042),
 * or null when the name does not follow that pattern.
 */
export function extractTimestamp(fileName: string): number | null {
  const match = /^\d+-(\d+)\.[^.]+$/.exec(fileName);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Stable sort by file name timestamp; names without one sort as 0.
 */
export function sortByTimestamp<T extends { name: string }>(files: T[]): T[] {
  return files
    .map((file) => {
      const timestamp = extractTimestamp(file.name);
      if (timestamp === null) {
        debugLogger.warn(`[Scan] No timestamp in file name: ${file.name}`);
      }
      return { file, timestamp: timestamp ?? 0 };
    })
    .sort((a, b) => a.timestamp - b.timestamp)
    .map(({ file }) => file);
}

/**
 * Discover recordings under a directory in recording order
 */
export function scanAndSort(directory: string, extension: string): string[] {
  debugLogger.info(`[Scan] Scanning ${directory} for *${extension} files`);
  const files = sortByTimestamp(scanDirectoryRecursive(directory, extension));
  debugLogger.info(`[Scan] Found ${files.length} file(s)`);
  return files.map((file) => file.path);
}

/**
 * `<outputDir>/<input stem>.mp4`. With a source root, the input's directory
 * relative to that root is kept under `outputDir`; inputs outside the root
 * go directly into `outputDir`.
 */
export function getOutputFilename(input: string, outputDir: string, sourceRoot?: string): string {
  const stem = path.basename(input, path.extname(input));
  const subdir = sourceRoot === undefined ? '' : relativeDirectory(input, sourceRoot);
  return path.join(outputDir, subdir, `${stem}.mp4`);
}

function relativeDirectory(input: string, sourceRoot: string): string {
  const relative = path.relative(path.resolve(sourceRoot), path.dirname(path.resolve(input)));
  if (relative.startsWith('..') || path.isAbsolute(relative)) return '';
  return relative;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `<outputDir>/merged_YYYYMMDD_HHMMSS.mp4`, in local time
 */
export function getMergedOutputFilename(outputDir: string, now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return path.join(outputDir, `merged_${stamp}.mp4`);
}
