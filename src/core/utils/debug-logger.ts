import * as fs from "fs";
import * as path from "path";
import { RuntimeContext } from "./ffmpeg-path";
import type { LogLevel } from "../types/types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Leveled logger with file persistence
 */
class DebugLogger {
  private level: LogLevel = "info";
  private logDir: string | null = null;
  private logFile: string | null = null;

  /**
   * Initialize file output.
   * The log file is recreated on each launch.
   */
  initialize(context: RuntimeContext): void {
    this.logDir = path.join(context.userDataPath || process.cwd(), "logs");

    try {
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }

      this.logFile = path.join(this.logDir, "app.log");

      const header = `${"=".repeat(80)}\n` +
        `Application Log - Started: ${new Date().toISOString()}\n` +
        `Platform: ${process.platform} ${process.arch}\n` +
        `Node Version: ${process.version}\n` +
        `${"=".repeat(80)}\n\n`;

      fs.writeFileSync(this.logFile, header, "utf8");
    } catch (error) {
      // The logger itself cannot report this
      console.error(`[Logger] Failed to initialize log file: ${error}`);
      this.logFile = null;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  /**
   * Log one line of transcoder output.
   * Only written at debug level.
   */
  logProcessOutput(taskName: string, line: string): void {
    if (!this.isEnabled("debug")) return;
    const trimmed = line.trim();
    if (trimmed) {
      this.write("debug", `[ffmpeg:${taskName}] ${trimmed}`);
    }
  }

  /**
   * Log the full argument list of a spawned process
   */
  logCommand(command: string, args: string[]): void {
    if (!this.isEnabled("debug")) return;
    this.write("debug", "Spawning process", { command, args });
  }

  getLogFilePath(): string | null {
    return this.logFile;
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const logLine = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

    if (level === "error") {
      console.error(logLine);
    } else if (level === "warn") {
      console.warn(logLine);
    } else {
      console.log(logLine);
    }

    if (this.logFile) {
      let fileContent = logLine;
      if (data !== undefined) {
        fileContent += `\n${formatData(data)}`;
      }
      this.writeToFile(fileContent + "\n");
    }
  }

  private writeToFile(content: string): void {
    if (!this.logFile) return;

    try {
      fs.appendFileSync(this.logFile, content, "utf8");
    } catch (error) {
      // Stop writing to a file that went away; keep console output
      console.error(`[Logger] Failed to write log file, disabling file output: ${error}`);
      this.logFile = null;
    }
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return String(data);
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();
