/**
 * Logger
 *
 * Per-call-site handle bound to one level, and optionally to a field context and
 * an error. Handles are immutable: withContext/withError return a new handle, so
 * one handle can be shared between concurrent tasks without aliasing surprises.
 *
 * Field precedence in print(), last writer wins:
 *   1. fields of the bound context
 *   2. each explicit field set, in argument order
 *   3. the bound error (under `error`)
 */

import type { FieldContext } from '../fields/field-context';
import type { Fields, Level } from '../formatters/formatter.interface';
import type { LogEngine } from './log-engine';

function toError(value: unknown): Error | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return value instanceof Error ? value : new Error(String(value));
}

export class Logger {
  constructor(
    private readonly engine: LogEngine,
    readonly level: Level,
    private readonly context?: FieldContext,
    private readonly err?: Error
  ) {}

  withContext(context: FieldContext): Logger {
    return new Logger(this.engine, this.level, context, this.err);
  }

  /**
   * Accepts whatever a `catch` clause binds. Non-Error values are wrapped in an
   * Error carrying their string form; `undefined` and `null` clear the error.
   */
  withError(error: unknown): Logger {
    return new Logger(this.engine, this.level, this.context, toError(error));
  }

  print(message: string, ...fields: Fields[]): void {
    const merged: Fields = this.context ? this.context.toFields() : {};

    for (const set of fields) {
      Object.assign(merged, set);
    }

    this.engine.write({
      level: this.level,
      message,
      fields: merged,
      error: this.err,
    });
  }
}
