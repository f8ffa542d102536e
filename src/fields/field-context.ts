/**
 * FieldContext
 *
 * Immutable, append-only set of log fields carried along a call chain. Each
 * `with*` call returns a new context; the receiver never changes, so a context
 * can be shared freely between concurrent tasks.
 *
 * Duplicate keys are kept in order and resolved when flattened: the field added
 * last wins.
 */

import type { Fields } from '../formatters/formatter.interface';

export interface Field {
  readonly key: string;
  readonly value: unknown;
}

export class FieldContext {
  static readonly empty = new FieldContext([]);

  private constructor(private readonly entries: readonly Field[]) {}

  static of(fields: Fields): FieldContext {
    return FieldContext.empty.withFields(fields);
  }

  withField(key: string, value: unknown): FieldContext {
    return new FieldContext([...this.entries, { key, value }]);
  }

  withFields(fields: Fields): FieldContext {
    const added = Object.entries(fields).map(([key, value]) => ({ key, value }));
    if (added.length === 0) {
      return this;
    }
    return new FieldContext([...this.entries, ...added]);
  }

  fields(): readonly Field[] {
    return this.entries;
  }

  toFields(): Fields {
    const flattened: Fields = {};
    for (const { key, value } of this.entries) {
      flattened[key] = value;
    }
    return flattened;
  }

  get size(): number {
    return this.entries.length;
  }
}
