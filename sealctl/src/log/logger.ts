export type LogLevel = "debug" | "info" | "warn" | "error";

export type OutputFormat = "human" | "jsonl";

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogRecord = {
  level: LogLevel;
  code: string;
  message: string;
  at: string;
} & Record<string, unknown>;

/** Receives each formatted line together with the structured record. */
export type LogSink = (line: string, record: LogRecord) => void;

export type LoggerOptions = {
  level?: LogLevel;
  format?: OutputFormat;
  sink?: LogSink;
  now?: () => Date;
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

/**
 * Leveled logger. Human lines look like `[sealctl] WARN SOFT_FAILURE message {...}`;
 * jsonl mode writes one `{level, code, message, ...}` object per line.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly format: OutputFormat;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? "info";
    this.format = opts.format ?? "human";
    this.sink = opts.sink ?? stderrSink;
    this.now = opts.now ?? (() => new Date());
  }

  debug(code: string, message: string, fields?: Record<string, unknown>): void {
    this.log("debug", code, message, fields);
  }

  info(code: string, message: string, fields?: Record<string, unknown>): void {
    this.log("info", code, message, fields);
  }

  warn(code: string, message: string, fields?: Record<string, unknown>): void {
    this.log("warn", code, message, fields);
  }

  error(code: string, message: string, fields?: Record<string, unknown>): void {
    this.log("error", code, message, fields);
  }

  private log(level: LogLevel, code: string, message: string, fields: Record<string, unknown> = {}): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;

    const record: LogRecord = { ...fields, level, code, message, at: this.now().toISOString() };
    const line =
      this.format === "jsonl"
        ? JSON.stringify(record)
        : `[sealctl] ${level.toUpperCase()} ${code} ${message}${Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : ""}`;
    this.sink(line, record);
  }
}

/** Logger that keeps every record in memory. */
export function createMemoryLogger(level: LogLevel = "debug"): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = new Logger({ level, format: "jsonl", sink: (_line, record) => records.push(record) });
  return { logger, records };
}

export const silentLogger = new Logger({ level: "error", sink: () => undefined });
