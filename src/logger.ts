export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

/** Leveled logger; lines below `level` are dropped. */
export class Logger {
  constructor(
    public level: LogLevel = "warn",
    private readonly scope = "scriptharness",
    private readonly sink: LogSink = consoleSink
  ) {}

  enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  child(scope: string): Logger {
    return new Logger(this.level, `${this.scope}:${scope}`, this.sink);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string): void {
    if (!this.enabled(level)) return;
    this.sink(level, `[${this.scope}] ${level}: ${message}`);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }
}
