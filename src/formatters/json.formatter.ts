/**
 * JSONFormatter
 *
 * Encodes an entry as one JSON object: `Message`, `Level` and `Time` plus the
 * entry data verbatim. The same document is what the remote collector
 * receives, whatever formatter the engine uses for its own output.
 *
 * Built as a winston format chain: a document format that lays out the object,
 * then winston.format.json(), which sorts keys and writes cycles as
 * "[Circular]". Errors encode as their message and bigints as strings. A value
 * whose toJSON() or getter throws makes format() throw; the engine drops such
 * entries.
 */

import { MESSAGE } from 'triple-beam';
import winston from 'winston';
import { attachEntry, entryOf } from '../sinks/entry-info';
import type { Fields, Formatter, LogEntry, TimestampFormat } from './formatter.interface';
import { entryData } from './formatter.interface';
import { formatRFC3339Nano } from './timestamp';

export interface JSONFormatterOptions {
  timestampFormat?: TimestampFormat;
}

/** Info key holding the document that replaces the info bag when encoded. */
const DOCUMENT = Symbol('document');

function encodeValue(key: string, value: unknown): unknown {
  if (key === '' && typeof value === 'object' && value !== null && DOCUMENT in value) {
    return value[DOCUMENT];
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}

export class JSONFormatter implements Formatter {
  readonly name = 'json';

  private readonly timestampFormat: TimestampFormat;
  private readonly pipeline: winston.Logform.Format;

  constructor(options: JSONFormatterOptions = {}) {
    this.timestampFormat = options.timestampFormat ?? ((time) => formatRFC3339Nano(time));

    const document = winston.format((info) => {
      const entry = entryOf(info);
      if (!entry) {
        return false;
      }
      info[DOCUMENT] = this.document(entry);
      return info;
    });

    this.pipeline = winston.format.combine(document(), winston.format.json({ replacer: encodeValue }));
  }

  format(entry: LogEntry): string {
    const result = this.pipeline.transform(attachEntry({ level: entry.level, message: entry.message }, entry));
    const line = typeof result === 'object' ? result[MESSAGE] : undefined;
    if (typeof line !== 'string') {
      throw new Error('JSON encoding produced no output');
    }
    return line;
  }

  private document(entry: LogEntry): Fields {
    return {
      Message: entry.message,
      Level: entry.level,
      Time: this.timestampFormat(entry.time),
      ...entryData(entry),
    };
  }
}
