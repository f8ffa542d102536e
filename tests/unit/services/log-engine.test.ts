/**
 * LogEngine Unit Tests
 *
 * The engine writes to an in-process capture stream with a fixed clock, so
 * every line can be asserted exactly.
 */

import { PassThrough } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import { LoggingConfigurationError } from '../../../src/errors/logging-configuration.error';
import { FieldContext } from '../../../src/fields/field-context';
import type { LogEngineOptions } from '../../../src/services/log-engine';
import { LogEngine } from '../../../src/services/log-engine';
import type { CollectorEndpoint } from '../../../src/sinks/fluentbit.transport';
import { CaptureStream, FIXED_TIME, flushLogs, isoTimestamp } from '../../helpers/capture-stream';

const COLLECTOR_ENV = {
  LOGGING_SVC_SERVICE_HOST: 'logging-svc',
  LOGGING_SVC_SERVICE_PORT_LOGGING: '24224',
};

/**
 * What a caller handing in configuration strings sees of the engine.
 */
interface StringConfigurable {
  setOutput(sink: string): void;
  setFormatter(format: string): void;
}

function createEngine(options: LogEngineOptions = {}) {
  const stderr = new CaptureStream();
  const sockets: PassThrough[] = [];
  const connect = vi.fn((_endpoint: CollectorEndpoint) => {
    const socket = new PassThrough();
    sockets.push(socket);
    return socket;
  });
  const engine = new LogEngine({
    stderr,
    clock: () => FIXED_TIME,
    timestampFormat: isoTimestamp,
    connect,
    env: {},
    ...options,
  });
  return { engine, stderr, sockets, connect };
}

function errorWithStack(message: string, stack: string): Error {
  const error = new Error(message);
  error.stack = stack;
  return error;
}

describe('LogEngine', () => {
  describe('defaults', () => {
    it('should start with text format, stderr output and info level', () => {
      const { engine } = createEngine();

      expect(engine.format).toBe('text');
      expect(engine.outputs).toEqual(['stderr']);
      expect(engine.level).toBe('info');
    });

    it('should write a text line to stderr', async () => {
      const { engine, stderr } = createEngine();

      engine.print('login', { user: 'alice' });
      await flushLogs();

      expect(stderr.output).toBe('time="2024-05-01T10:00:00.000Z" level=info msg=login user=alice\n');
    });
  });

  describe('field merging', () => {
    it('should merge context fields, explicit fields and the error, last writer wins', async () => {
      const { engine, stderr } = createEngine({ format: 'json' });
      const context = FieldContext.of({ requestId: 'req-1', user: 'bob', error: 'from context' });

      engine
        .withContext(context)
        .withError(new Error('boom'))
        .print('failed', { user: 'alice', attempt: 1 }, { attempt: 2, error: 'explicit' });
      await flushLogs();

      expect(JSON.parse(stderr.output)).toEqual({
        Level: 'info',
        Message: 'failed',
        Time: '2024-05-01T10:00:00.000Z',
        attempt: 2,
        error: 'boom',
        requestId: 'req-1',
        user: 'alice',
      });
    });
  });

  describe('text rendering', () => {
    it('should expand nested structured fields', async () => {
      const { engine, stderr } = createEngine();

      engine.print('order placed', { order: { items: ['a', 'b'], id: 7 } });
      await flushLogs();

      expect(stderr.output).toBe(
        `time="2024-05-01T10:00:00.000Z" level=info msg="order placed" order="{ id: 7, items: [ 'a', 'b' ] }"\n`
      );
    });

    it('should emit a timestamp field without rendering it', async () => {
      const { engine, stderr } = createEngine();

      engine.print('tick', { time: new Date('2024-05-02T00:00:00.000Z') });
      await flushLogs();

      expect(stderr.output).toBe(
        'time="2024-05-01T10:00:00.000Z" level=info msg=tick fields.time="2024-05-02T00:00:00.000Z"\n'
      );
    });

    it('should split a bound error into error and stackTrace', async () => {
      const { engine, stderr } = createEngine();
      const error = errorWithStack('boom', 'Error: boom\n    at handler (app.ts:1:1)');

      engine.error().withError(error).print('failed');
      await flushLogs();

      expect(stderr.output).toBe(
        'time="2024-05-01T10:00:00.000Z" level=error msg=failed error="Error: boom" stackTrace="\\n    at handler (app.ts:1:1)"\n'
      );
    });

    it('should produce identical lines for identical input', async () => {
      const { engine, stderr } = createEngine();

      engine.print('same', { n: 1 });
      engine.print('same', { n: 1 });
      await flushLogs();

      expect(stderr.lines).toHaveLength(2);
      expect(stderr.lines[0]).toBe(stderr.lines[1]);
    });
  });

  describe('levels', () => {
    it('should drop debug entries at the default level', async () => {
      const { engine, stderr } = createEngine();

      engine.debug().print('hidden');
      await flushLogs();

      expect(engine.isLevelEnabled('debug')).toBe(false);
      expect(stderr.output).toBe('');
    });

    it('should write debug entries after lowering the level', async () => {
      const { engine, stderr } = createEngine();

      engine.setLevel('debug');
      engine.debug().print('shown');
      await flushLogs();

      expect(engine.level).toBe('debug');
      expect(stderr.output).toBe('time="2024-05-01T10:00:00.000Z" level=debug msg=shown\n');
    });

    it('should keep error entries at error level', async () => {
      const { engine, stderr } = createEngine({ level: 'error' });

      engine.print('info is filtered');
      engine.error().print('kept');
      await flushLogs();

      expect(stderr.lines).toEqual(['time="2024-05-01T10:00:00.000Z" level=error msg=kept']);
    });
  });

  describe('setFormatter', () => {
    it('should switch to JSON documents with raw field values', async () => {
      const { engine, stderr } = createEngine();

      engine.setFormatter('json');
      engine.print('login', { user: 'alice' });
      await flushLogs();

      expect(engine.format).toBe('json');
      expect(stderr.output).toBe(
        '{"Level":"info","Message":"login","Time":"2024-05-01T10:00:00.000Z","user":"alice"}\n'
      );
    });

    it('should reject unknown formats and keep the current one', () => {
      const { engine } = createEngine();
      const configurable: StringConfigurable = engine;

      expect(() => configurable.setFormatter('xml')).toThrow(
        new LoggingConfigurationError('Unsupported log format: xml')
      );
      expect(engine.format).toBe('text');
    });
  });

  describe('serialization failures', () => {
    const unencodable = {
      toJSON(): string {
        throw new Error('cannot encode');
      },
    };

    it('should drop the entry and report the failure', async () => {
      const onError = vi.fn();
      const { engine, stderr } = createEngine({ format: 'json', onError });

      engine.print('unencodable', { unencodable });
      engine.print('fine');
      await flushLogs();

      expect(stderr.lines).toEqual(['{"Level":"info","Message":"fine","Time":"2024-05-01T10:00:00.000Z"}']);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toEqual(new Error('cannot encode'));
    });

    it('should report to stderr when no handler is given', async () => {
      const { engine, stderr } = createEngine({ format: 'json' });

      engine.print('unencodable', { unencodable });
      await flushLogs();

      expect(stderr.output).toBe('Failed to write log entry: cannot encode\n');
    });
  });

  describe('setOutput', () => {
    it('should fail without collector variables and keep the current outputs', () => {
      const { engine, connect } = createEngine();

      expect(() => engine.setOutput('fluentbit')).toThrow(
        new LoggingConfigurationError('Unable to find Fluentbit host address')
      );
      expect(engine.outputs).toEqual(['stderr']);
      expect(connect).not.toHaveBeenCalled();
    });

    it('should fail without the port variable', () => {
      const { engine } = createEngine({ env: { LOGGING_SVC_SERVICE_HOST: 'logging-svc' } });

      expect(() => engine.setOutput('fluentbit')).toThrow('Unable to find Fluentbit logging port');
      expect(engine.outputs).toEqual(['stderr']);
    });

    it('should reject unknown sinks', () => {
      const { engine } = createEngine();
      const configurable: StringConfigurable = engine;

      expect(() => configurable.setOutput('syslog')).toThrow(
        new LoggingConfigurationError('Unsupported log output: syslog')
      );
    });

    it('should ship JSON to the collector next to the text written to stderr', async () => {
      const { engine, stderr, sockets, connect } = createEngine({ env: COLLECTOR_ENV });

      engine.setOutput('fluentbit');
      engine.print('login', { user: 'alice' });
      await flushLogs();

      expect(engine.outputs).toEqual(['stderr', 'fluentbit']);
      expect(connect).toHaveBeenCalledWith({ host: 'logging-svc', port: 24224 });
      expect(stderr.output).toBe('time="2024-05-01T10:00:00.000Z" level=info msg=login user=alice\n');
      expect(String(sockets[0].read())).toBe(
        '{"Level":"info","Message":"login","Time":"2024-05-01T10:00:00.000Z","user":"alice"}\n'
      );
    });

    it('should accept the collector output at construction', () => {
      const { engine } = createEngine({ env: COLLECTOR_ENV, output: 'fluentbit' });

      expect(engine.outputs).toEqual(['stderr', 'fluentbit']);
    });

    it('should go back to stderr only and close the collector connection', async () => {
      const { engine, sockets } = createEngine({ env: COLLECTOR_ENV });

      engine.setOutput('fluentbit');
      engine.print('first');
      await flushLogs();
      engine.setOutput('stderr');

      expect(engine.outputs).toEqual(['stderr']);
      expect(sockets[0].writableEnded).toBe(true);
    });

    it('should report collector socket errors without throwing to callers', async () => {
      const onError = vi.fn();
      const { engine, sockets } = createEngine({ env: COLLECTOR_ENV, onError });

      engine.setOutput('fluentbit');
      engine.print('first');
      await flushLogs();
      sockets[0].emit('error', new Error('connection refused'));

      expect(onError).toHaveBeenCalledWith(new Error('connection refused'));
      expect(() => engine.print('second')).not.toThrow();
    });
  });
});
