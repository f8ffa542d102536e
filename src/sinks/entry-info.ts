/**
 * Links winston info objects to the entries they were built from.
 *
 * winston passes the same info object through the logger format and on to every
 * transport, so formats and transports recover the typed entry from it here
 * instead of reading loose keys off the info bag.
 */

import type { LogEntry } from '../formatters/formatter.interface';

const entries = new WeakMap<object, LogEntry>();

export function attachEntry<T extends object>(info: T, entry: LogEntry): T {
  entries.set(info, entry);
  return info;
}

export function entryOf(info: object): LogEntry | undefined {
  return entries.get(info);
}
