/**
 * Entry Renderer
 *
 * Wraps another formatter and expands field values into text before handing the
 * entry on. Errors are split into message + `stackTrace`, strings and values
 * with their own textual form pass through, and everything else is deep-rendered
 * with util.inspect so nested objects show their contents.
 */

import { inspect } from 'node:util';
import { formatError } from './error-formatter';
import type { Fields, Formatter, LogEntry } from './formatter.interface';
import { entryData } from './formatter.interface';

export const STACK_TRACE_KEY = 'stackTrace';

/**
 * Key carrying a caller-supplied timestamp; the wrapped formatter owns its
 * rendering (the text formatter later moves it to `fields.time`).
 */
export const TIMESTAMP_KEYS: readonly string[] = ['time'];

/**
 * A value that supplies its own textual form through an overridden `toString`.
 */
export interface Renderable {
  toString(): string;
}

export type FieldValue =
  | { kind: 'text'; value: string | Renderable }
  | { kind: 'error'; error: Error }
  | { kind: 'structured'; value: unknown };

export function isRenderable(value: unknown): value is Renderable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return typeof value.toString === 'function' && value.toString !== Object.prototype.toString;
}

export function classifyFieldValue(value: unknown): FieldValue {
  if (value instanceof Error) {
    return { kind: 'error', error: value };
  }
  if (typeof value === 'string' || isRenderable(value)) {
    return { kind: 'text', value };
  }
  return { kind: 'structured', value };
}

export function renderValue(value: unknown): string {
  return inspect(value, {
    depth: null,
    breakLength: Infinity,
    compact: true,
    sorted: true,
  });
}

export function renderFields(data: Fields): Fields {
  const rendered: Fields = {};

  for (const [key, raw] of Object.entries(data)) {
    const value = classifyFieldValue(raw);
    switch (value.kind) {
      case 'error': {
        const { message, stackTrace } = formatError(value.error);
        rendered[key] = message;
        rendered[STACK_TRACE_KEY] = stackTrace;
        break;
      }
      case 'text':
        rendered[key] = value.value;
        break;
      case 'structured':
        rendered[key] = TIMESTAMP_KEYS.includes(key) ? value.value : renderValue(value.value);
        break;
    }
  }

  return rendered;
}

export class RenderFormatter implements Formatter {
  readonly name: string;

  constructor(private readonly formatter: Formatter) {
    this.name = formatter.name;
  }

  format(entry: LogEntry): string {
    const data = entryData(entry);
    if (Object.keys(data).length === 0) {
      return this.formatter.format(entry);
    }

    return this.formatter.format({
      time: entry.time,
      level: entry.level,
      message: entry.message,
      fields: renderFields(data),
    });
  }
}
