/**
 * TextFormatter
 *
 * logfmt-style line: `time="..." level=info msg=hello key=value`.
 *
 * Fixed keys come first (msg is left out for an empty message), then the entry
 * data sorted by key. Data keys that clash with a fixed key are moved under a
 * `fields.` prefix. Values are quoted only when they hold a character outside
 * the unquoted set.
 */

import type { Fields, Formatter, LogEntry, TimestampFormat } from './formatter.interface';
import { entryData } from './formatter.interface';
import { formatRFC3339Nano } from './timestamp';

const FIXED_KEYS = ['time', 'level', 'msg'] as const;

const UNQUOTED = /^[A-Za-z0-9\-._/@^+]*$/;

export interface TextFormatterOptions {
  timestampFormat?: TimestampFormat;
}

export function prefixFieldClashes(data: Fields): Fields {
  const out: Fields = { ...data };
  for (const key of FIXED_KEYS) {
    if (key in out) {
      out[`fields.${key}`] = out[key];
      delete out[key];
    }
  }
  return out;
}

export class TextFormatter implements Formatter {
  readonly name = 'text';

  private readonly timestampFormat: TimestampFormat;

  constructor(options: TextFormatterOptions = {}) {
    this.timestampFormat = options.timestampFormat ?? ((time) => formatRFC3339Nano(time));
  }

  format(entry: LogEntry): string {
    const data = prefixFieldClashes(entryData(entry));
    const pairs: string[] = [];

    pairs.push(this.pair('time', this.timestampFormat(entry.time)));
    pairs.push(this.pair('level', entry.level));
    if (entry.message !== '') {
      pairs.push(this.pair('msg', entry.message));
    }

    for (const key of Object.keys(data).sort()) {
      pairs.push(this.pair(key, this.stringify(data[key])));
    }

    return pairs.join(' ');
  }

  private pair(key: string, value: string): string {
    return `${key}=${UNQUOTED.test(value) ? value : JSON.stringify(value)}`;
  }

  private stringify(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    if (value instanceof Date) {
      return this.timestampFormat(value);
    }
    if (value instanceof Error) {
      return value.message;
    }
    return String(value);
  }
}
