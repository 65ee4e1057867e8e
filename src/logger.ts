import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { errnoCode } from "./nodePrimitives.js";

/** Size (in bytes) the active log file may reach before it is rotated. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Files kept by the rotation, the active one included. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** File mirroring every entry. `null` or omitted disables mirroring. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly minLevel?: LogLevel;
  readonly maxFileSizeBytes?: number;
  readonly maxFileCount?: number;
  /** When false, entries are not written to stdout. */
  readonly stdout?: boolean;
  /** Invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/** Writes a diagnostic about the logger itself; stdout may be muted. */
function reportLoggerFailure(message: string, error: unknown, extra: Record<string, unknown> = {}): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { ...extra, error: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

/**
 * JSON-lines logger for the node layer. Entries go to stdout and, when a file
 * is configured, to that file through a sequential write queue that rotates
 * it once it grows past the size limit.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly writeToStdout: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.minLevel = options.minLevel ?? "debug";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.writeToStdout = options.stdout ?? true;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  /** Resolves once every queued file write has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    if (this.writeToStdout) {
      process.stdout.write(line);
    }
    this.entryListener?.(structuredClone(entry));
    if (this.logFile !== null) {
      this.enqueueWrite(this.logFile, line);
    }
  }

  private enqueueWrite(logFile: string, line: string): void {
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.prepareDirectory(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        reportLoggerFailure("log_file_write_failed", error, { logFile });
        // The next write retries the directory creation.
        this.directoryReady = false;
      }
    });
  }

  private async prepareDirectory(logFile: string): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.directoryReady = true;
  }

  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }
    try {
      await this.rotate(logFile);
    } catch (error) {
      reportLoggerFailure("log_file_rotation_failed", error, { logFile });
    }
  }

  /** Shifts `file.N` to `file.N+1`, dropping the oldest, then archives the active file. */
  private async rotate(logFile: string): Promise<void> {
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 0; index -= 1) {
      const source = index === 0 ? logFile : `${logFile}.${index}`;
      try {
        await rename(source, `${logFile}.${index + 1}`);
      } catch (error) {
        if (errnoCode(error) !== "ENOENT") {
          throw error;
        }
      }
    }
  }
}
