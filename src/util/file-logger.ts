import fs from "node:fs";
import path from "node:path";

export type LogLevel = "INFO" | "ERROR";

export interface Logger {
  log(...values: unknown[]): void;
  error(...values: unknown[]): void;
}

// The TUI owns the terminal, so nothing goes to stdout/stderr without a log file.
const SILENT_LOGGER: Logger = {
  log: () => undefined,
  error: () => undefined
};

const describeValue = (value: unknown): string => {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined || typeof value === "function" || typeof value === "symbol") {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    // circular structures
    return String(value);
  }
};

/** One log line, newline included. */
export const formatLogLine = (level: LogLevel, values: readonly unknown[], at: Date): string =>
  `${at.toISOString()} [${level}] ${values.map(describeValue).join(" ")}\n`;

/** Appends formatted lines to a file, creating its directory on first use. */
export class FileLogger implements Logger {
  private readonly filePath: string;
  private directoryReady = false;

  public constructor(
    filePath: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.filePath = path.resolve(filePath);
  }

  public get location(): string {
    return this.filePath;
  }

  public log(...values: unknown[]): void {
    this.append("INFO", values);
  }

  public error(...values: unknown[]): void {
    this.append("ERROR", values);
  }

  private append(level: LogLevel, values: readonly unknown[]): void {
    if (!this.directoryReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    fs.appendFileSync(this.filePath, formatLogLine(level, values, this.now()), "utf8");
  }
}

export const createLogger = (logFilePath: string | undefined): Logger =>
  logFilePath ? new FileLogger(logFilePath) : SILENT_LOGGER;
