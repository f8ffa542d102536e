/**
 * Sink Configurator
 *
 * Resolves output destinations: the process stderr stream, or a remote log
 * collector (Fluent Bit) whose address is discovered from the environment the
 * way the collector's Kubernetes service injects it.
 */

import type { Writable } from 'node:stream';
import winston from 'winston';
import type Transport from 'winston-transport';
import { LoggingConfigurationError } from '../errors/logging-configuration.error';
import type { CollectorEndpoint } from './fluentbit.transport';

export type OutputSink = 'stderr' | 'fluentbit';

export const OUTPUT_SINKS: readonly OutputSink[] = ['stderr', 'fluentbit'];

export const LOGGING_SERVICE_HOST_ENV = 'LOGGING_SVC_SERVICE_HOST';
export const LOGGING_SERVICE_PORT_ENV = 'LOGGING_SVC_SERVICE_PORT_LOGGING';

export function isOutputSink(value: unknown): value is OutputSink {
  return OUTPUT_SINKS.some((sink) => sink === value);
}

/**
 * Both variables are required; nothing is configured when either is missing.
 */
export function resolveCollectorEndpoint(env: NodeJS.ProcessEnv): CollectorEndpoint {
  const host = env[LOGGING_SERVICE_HOST_ENV];
  if (!host) {
    throw new LoggingConfigurationError('Unable to find Fluentbit host address');
  }

  const rawPort = env[LOGGING_SERVICE_PORT_ENV];
  if (!rawPort) {
    throw new LoggingConfigurationError('Unable to find Fluentbit logging port');
  }

  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new LoggingConfigurationError(`Invalid Fluentbit logging port: ${rawPort}`);
  }

  return { host, port };
}

export function createStderrTransport(stream: Writable): Transport {
  return new winston.transports.Stream({ stream, eol: '\n' });
}
