/**
 * @module logger
 * Module-prefixed logging for the library's own diagnostics: debug traces of
 * file and resize work, and warnings for failed saves.
 */

export const LogLevel = { DEBUG: 0, WARN: 1, SILENT: 2 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/** Receives every emitted message; `args` starts with the `[module]` prefix. */
export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const consoleSink: LogSink = (level, ...args) => {
  if (level === LogLevel.DEBUG) console.debug(...args);
  else console.warn(...args);
};

let threshold: LogLevel = LogLevel.WARN;
let sink: LogSink = consoleSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Messages below `level` are dropped. `SILENT` drops everything. */
  static setLevel(level: LogLevel): void {
    threshold = level;
  }

  /** Send output to `next` instead of the console; `null` restores the console. */
  static setSink(next: LogSink | null): void {
    sink = next ?? consoleSink;
  }

  debug(message: string, ...details: unknown[]): void {
    this.emit(LogLevel.DEBUG, message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.emit(LogLevel.WARN, message, details);
  }

  private emit(level: LogLevel, message: string, details: unknown[]): void {
    if (level < threshold) return;
    sink(level, `[${this.module}]`, message, ...details);
  }
}
