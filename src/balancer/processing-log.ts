/**
 * Human-readable processing messages for a balancing run.
 *
 * Every pass and the orchestrator report what they did here, with the day,
 * provider and individual a message is about. The log is returned with the
 * result; callers that want messages as they happen pass an `onEntry` sink.
 *
 * @module
 */

export type LogLevel = "info" | "warn" | "error";

export interface LogContext {
  date?: string;
  provider?: string;
  individual?: string;
}

/**
 * @category Processing Log
 */
export interface LogEntry extends LogContext {
  /** Position in the run, starting at 1. */
  readonly sequence: number;
  readonly level: LogLevel;
  readonly message: string;
}

export interface ProcessingLog {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;

  getEntries(): readonly LogEntry[];
  getEntriesForDay(date: string): readonly LogEntry[];
  hasErrors(): boolean;
}

export interface ProcessingLogOptions {
  /** Called with each entry right after it is recorded. */
  onEntry?: (entry: LogEntry) => void;
  /** Lowest level that is kept. Defaults to `"info"`. */
  minLevel?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

export class ProcessingLogImpl implements ProcessingLog {
  #entries: LogEntry[] = [];
  #onEntry: ((entry: LogEntry) => void) | undefined;
  #minRank: number;

  constructor(options: ProcessingLogOptions = {}) {
    this.#onEntry = options.onEntry;
    this.#minRank = LEVEL_RANK[options.minLevel ?? "info"];
  }

  info(message: string, context: LogContext = {}): void {
    this.#report("info", message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.#report("warn", message, context);
  }

  error(message: string, context: LogContext = {}): void {
    this.#report("error", message, context);
  }

  getEntries(): readonly LogEntry[] {
    return [...this.#entries];
  }

  getEntriesForDay(date: string): readonly LogEntry[] {
    return this.#entries.filter((entry) => entry.date === date);
  }

  hasErrors(): boolean {
    return this.#entries.some((entry) => entry.level === "error");
  }

  #report(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_RANK[level] < this.#minRank) return;
    const entry: LogEntry = Object.freeze({
      sequence: this.#entries.length + 1,
      level,
      message,
      ...context,
    });
    this.#entries.push(entry);
    this.#onEntry?.(entry);
  }
}

/**
 * Formats an entry as a single line, e.g.
 * `[warn] 2025-07-01 Morgan Hale, RN/House Manager: 2h over the cap remain`.
 */
export function formatLogEntry(entry: LogEntry): string {
  const scope = [entry.date, entry.provider, entry.individual].filter(Boolean).join(" ");
  return scope ? `[${entry.level}] ${scope}: ${entry.message}` : `[${entry.level}] ${entry.message}`;
}
