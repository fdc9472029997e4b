import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

/**
 * Runtime context for ffmpeg and data path resolution
 */
export interface RuntimeContext {
  appPath: string;       // Directory a bundled ffmpeg is looked up in
  userDataPath?: string; // User-writable data directory for logs/config
}

export const APP_NAME = 'v264-converter';

function executableName(base: string): string {
  return process.platform === 'win32' ? `${base}.exe` : base;
}

/**
 * Resolves the ffmpeg executable to spawn.
 *
 * Absolute paths are used as given. Relative paths with a directory part are
 * resolved against the app path. A bare name is first looked up next to the
 * app (`<app>/ffmpeg/ffmpeg`, `<app>/ffmpeg`) and otherwise left to the
 * system PATH.
 */
export function resolveFfmpegPath(configured: string, context: RuntimeContext): string {
  const requested = configured.trim() || 'ffmpeg';

  if (path.isAbsolute(requested)) {
    return requested;
  }

  if (requested.includes('/') || requested.includes('\\')) {
    return path.resolve(context.appPath, requested);
  }

  const executable = path.extname(requested) ? requested : executableName(requested);
  const candidates = [
    path.join(context.appPath, 'ffmpeg', 'bin', executable),
    path.join(context.appPath, 'ffmpeg', executable),
    path.join(context.appPath, executable),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  // Fall back to system PATH
  return requested;
}

/**
 * Platform-specific user data directory (config file and logs)
 */
export function getUserDataPath(): string {
  const homeDir = os.homedir();

  if (process.platform === 'win32') {
    // Windows: Use %APPDATA%
    return path.join(process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming'), APP_NAME);
  }
  if (process.platform === 'darwin') {
    // macOS: Use ~/Library/Application Support
    return path.join(homeDir, 'Library', 'Application Support', APP_NAME);
  }
  // Linux: Use ~/.config
  return path.join(process.env.XDG_CONFIG_HOME || path.join(homeDir, '.config'), APP_NAME);
}

/**
 * Create the CLI runtime context
 * @param appRoot Optional directory holding a bundled ffmpeg
 */
export function createCliContext(appRoot?: string): RuntimeContext {
  return {
    appPath: appRoot || process.cwd(),
    userDataPath: getUserDataPath(),
  };
}
