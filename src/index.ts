/**
 * fieldlog
 *
 * Structured logging façade: leveled entries with contextual fields, errors
 * split into message and stack trace, text or JSON output to stderr and an
 * optional Fluent Bit collector.
 *
 * The package-level functions below use the default engine from config/logger.
 * Applications that want their own configuration construct a LogEngine and
 * pass it around instead.
 *
 * Usage:
 *   import { print, withContext, FieldContext } from 'fieldlog';
 *   const ctx = FieldContext.of({ requestId: 'abc' });
 *   withContext(ctx).print('request handled', { status: 200 });
 */

import { engine } from './config/logger';
import type { FieldContext } from './fields/field-context';
import type { Fields, Level, OutputFormat } from './formatters/formatter.interface';
import type { Logger } from './services/logger';
import type { OutputSink } from './sinks/sink-configurator';

export function debug(): Logger {
  return engine.debug();
}

export function info(): Logger {
  return engine.info();
}

export function error(): Logger {
  return engine.error();
}

/**
 * Logs `message` at info level; shorthand for `info().print(message, ...fields)`.
 */
export function print(message: string, ...fields: Fields[]): void {
  engine.print(message, ...fields);
}

export function withContext(context: FieldContext): Logger {
  return engine.withContext(context);
}

export function withError(err: unknown): Logger {
  return engine.withError(err);
}

export function setOutput(sink: OutputSink): void {
  engine.setOutput(sink);
}

export function setFormatter(format: OutputFormat): void {
  engine.setFormatter(format);
}

export function setLevel(level: Level): void {
  engine.setLevel(level);
}

export { engine };
export { LogEngine } from './services/log-engine';
export type { EntryInput, LogEngineOptions } from './services/log-engine';
export { Logger } from './services/logger';
export { FieldContext } from './fields/field-context';
export type { Field } from './fields/field-context';
export { LoggingConfigurationError } from './errors/logging-configuration.error';
export { describeError, formatError } from './formatters/error-formatter';
export type { FormattedError } from './formatters/error-formatter';
export {
  RenderFormatter,
  STACK_TRACE_KEY,
  classifyFieldValue,
  renderFields,
} from './formatters/entry-renderer';
export type { FieldValue, Renderable } from './formatters/entry-renderer';
export { TextFormatter } from './formatters/text.formatter';
export { JSONFormatter } from './formatters/json.formatter';
export { formatRFC3339Nano } from './formatters/timestamp';
export type {
  Fields,
  Formatter,
  Level,
  LogEntry,
  OutputFormat,
  TimestampFormat,
} from './formatters/formatter.interface';
export { FluentbitTransport } from './sinks/fluentbit.transport';
export type { CollectorEndpoint, SocketFactory } from './sinks/fluentbit.transport';
export {
  LOGGING_SERVICE_HOST_ENV,
  LOGGING_SERVICE_PORT_ENV,
} from './sinks/sink-configurator';
export type { OutputSink } from './sinks/sink-configurator';
