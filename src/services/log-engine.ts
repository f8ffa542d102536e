/**
 * LogEngine
 *
 * Owns the winston logger behind the façade: minimum level, the active formatter
 * and the output sinks. Build one at the composition root and hand it to the
 * code that logs; reconfigure it at startup only, not while other code prints.
 *
 * Pipeline per entry:
 *   Logger.print() -> LogEngine.write() -> winston format (active formatter)
 *     -> stderr transport (+ Fluent Bit transport when configured)
 *
 * Nothing on this path throws to callers. Formatting failures drop the entry,
 * transport failures are reported through `onError`.
 */

import type { Writable } from 'node:stream';
import { MESSAGE } from 'triple-beam';
import winston from 'winston';
import { LoggingConfigurationError } from '../errors/logging-configuration.error';
import type { FieldContext } from '../fields/field-context';
import { RenderFormatter } from '../formatters/entry-renderer';
import type {
  Fields,
  Formatter,
  Level,
  LogEntry,
  OutputFormat,
  TimestampFormat,
} from '../formatters/formatter.interface';
import { isLevel, LEVEL_SEVERITY } from '../formatters/formatter.interface';
import { JSONFormatter } from '../formatters/json.formatter';
import { TextFormatter } from '../formatters/text.formatter';
import { attachEntry, entryOf } from '../sinks/entry-info';
import type { SocketFactory } from '../sinks/fluentbit.transport';
import { FluentbitTransport } from '../sinks/fluentbit.transport';
import type { OutputSink } from '../sinks/sink-configurator';
import { createStderrTransport, resolveCollectorEndpoint } from '../sinks/sink-configurator';
import { Logger } from './logger';

export interface LogEngineOptions {
  level?: Level;
  format?: OutputFormat;
  output?: OutputSink;
  /** Local output stream; defaults to process.stderr. */
  stderr?: Writable;
  /** Environment consulted by setOutput('fluentbit'); defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  clock?: () => Date;
  timestampFormat?: TimestampFormat;
  connect?: SocketFactory;
  onError?: (error: Error) => void;
}

export interface EntryInput {
  level: Level;
  message: string;
  fields: Fields;
  error?: Error;
}

export class LogEngine {
  private readonly logger: winston.Logger;
  private readonly stderr: Writable;
  private readonly env: NodeJS.ProcessEnv;
  private readonly clock: () => Date;
  private readonly timestampFormat: TimestampFormat | undefined;
  private readonly connect: SocketFactory | undefined;
  private readonly onError: (error: Error) => void;

  private formatter: Formatter;
  private remote: FluentbitTransport | undefined;

  constructor(options: LogEngineOptions = {}) {
    this.stderr = options.stderr ?? process.stderr;
    this.env = options.env ?? process.env;
    this.clock = options.clock ?? (() => new Date());
    this.timestampFormat = options.timestampFormat;
    this.connect = options.connect;
    this.onError =
      options.onError ??
      ((error) => {
        this.stderr.write(`Failed to write log entry: ${error.message}\n`);
      });

    this.formatter = this.createFormatter(options.format ?? 'text');

    this.logger = winston.createLogger({
      levels: LEVEL_SEVERITY,
      level: options.level ?? 'info',
      format: winston.format((info) => this.render(info))(),
      transports: [createStderrTransport(this.stderr)],
      exitOnError: false,
    });
    this.logger.on('error', (error: Error) => this.onError(error));

    if (options.output) {
      this.setOutput(options.output);
    }
  }

  debug(): Logger {
    return new Logger(this, 'debug');
  }

  info(): Logger {
    return new Logger(this, 'info');
  }

  error(): Logger {
    return new Logger(this, 'error');
  }

  print(message: string, ...fields: Fields[]): void {
    this.info().print(message, ...fields);
  }

  withContext(context: FieldContext): Logger {
    return this.info().withContext(context);
  }

  withError(error: unknown): Logger {
    return this.info().withError(error);
  }

  get level(): Level {
    const level = this.logger.level;
    return isLevel(level) ? level : 'info';
  }

  get format(): OutputFormat {
    return this.formatter.name === 'json' ? 'json' : 'text';
  }

  get outputs(): OutputSink[] {
    return this.remote ? ['stderr', 'fluentbit'] : ['stderr'];
  }

  setLevel(level: Level): void {
    this.logger.level = level;
  }

  isLevelEnabled(level: Level): boolean {
    return this.logger.isLevelEnabled(level);
  }

  /**
   * `stderr` leaves the local stream as the only output. `fluentbit` adds the
   * remote collector next to it and needs LOGGING_SVC_SERVICE_HOST and
   * LOGGING_SVC_SERVICE_PORT_LOGGING; when either is missing this throws and the
   * current outputs stay as they are.
   */
  setOutput(sink: OutputSink): void {
    switch (sink) {
      case 'stderr':
        this.removeRemote();
        return;
      case 'fluentbit': {
        const endpoint = resolveCollectorEndpoint(this.env);
        this.removeRemote();
        this.remote = new FluentbitTransport({
          endpoint,
          connect: this.connect,
          encoder: new JSONFormatter({ timestampFormat: this.timestampFormat }),
        });
        this.logger.add(this.remote);
        return;
      }
      default:
        throw new LoggingConfigurationError(`Unsupported log output: ${String(sink)}`);
    }
  }

  /**
   * Throws for an unknown format. Callers should treat that as fatal: the
   * previous formatter stays installed, but the process asked for output it
   * will not get.
   */
  setFormatter(format: OutputFormat): void {
    this.formatter = this.createFormatter(format);
  }

  write(input: EntryInput): void {
    if (!this.isLevelEnabled(input.level)) {
      return;
    }

    const entry: LogEntry = { time: this.clock(), ...input };
    this.logger.log(attachEntry({ level: entry.level, message: entry.message }, entry));
  }

  close(): void {
    this.removeRemote();
    this.logger.close();
  }

  private render(info: winston.Logform.TransformableInfo): winston.Logform.TransformableInfo | false {
    const entry = entryOf(info);
    if (!entry) {
      return false;
    }

    try {
      info[MESSAGE] = this.formatter.format(entry);
      return info;
    } catch (error) {
      this.onError(error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  private createFormatter(format: OutputFormat): Formatter {
    const options = { timestampFormat: this.timestampFormat };
    switch (format) {
      case 'text':
        return new RenderFormatter(new TextFormatter(options));
      case 'json':
        return new JSONFormatter(options);
      default:
        throw new LoggingConfigurationError(`Unsupported log format: ${String(format)}`);
    }
  }

  private removeRemote(): void {
    if (this.remote) {
      this.logger.remove(this.remote);
      this.remote.close();
      this.remote = undefined;
    }
  }
}
