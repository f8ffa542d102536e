/**
 * Formatter Interface
 *
 * Defines the log entry model and the contract every output formatter implements.
 * A formatter turns one entry into one line (without the trailing newline, which
 * the sink appends).
 */

export type Level = 'debug' | 'info' | 'error';

export const LEVELS: readonly Level[] = ['debug', 'info', 'error'];

/**
 * Severity ranks in winston's convention: lower is more severe.
 */
export const LEVEL_SEVERITY: Record<Level, number> = {
  error: 0,
  info: 1,
  debug: 2,
};

export type Fields = Record<string, unknown>;

export interface LogEntry {
  time: Date;
  level: Level;
  message: string;
  fields: Fields;
  error?: Error;
}

export type OutputFormat = 'text' | 'json';

export type TimestampFormat = (time: Date) => string;

export interface Formatter {
  readonly name: string;
  format(entry: LogEntry): string;
}

/**
 * Key under which a bound error is merged into an entry's data.
 */
export const ERROR_KEY = 'error';

/**
 * Fields of the entry with the bound error merged in last, so it wins on collision.
 */
export function entryData(entry: LogEntry): Fields {
  if (!entry.error) {
    return entry.fields;
  }
  return { ...entry.fields, [ERROR_KEY]: entry.error };
}

export function isLevel(value: unknown): value is Level {
  return LEVELS.some((level) => level === value);
}
