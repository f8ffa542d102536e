/**
 * Configuration Loader
 *
 * Loads environment variables and provides typed logging configuration.
 * Uses dotenv for local development.
 *
 * The collector endpoint (LOGGING_SVC_SERVICE_HOST / LOGGING_SVC_SERVICE_PORT_LOGGING)
 * is read by the sink configurator when the Fluent Bit output is selected, not here.
 */

import dotenv from 'dotenv';
import { LoggingConfigurationError } from '../errors/logging-configuration.error';
import type { Level, OutputFormat } from '../formatters/formatter.interface';
import { isLevel } from '../formatters/formatter.interface';
import type { OutputSink } from '../sinks/sink-configurator';
import { isOutputSink } from '../sinks/sink-configurator';

dotenv.config();

export interface Config {
  log: {
    level: Level;
    format: OutputFormat;
    output: OutputSink;
  };
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Unset or empty variables take their defaults; unrecognised values throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const level = env.LOG_LEVEL?.toLowerCase() || 'info';
  const format = env.LOG_FORMAT?.toLowerCase() || 'text';
  const output = env.LOG_OUTPUT?.toLowerCase() || 'stderr';

  if (!isLevel(level)) {
    throw new LoggingConfigurationError(`Unsupported log level: ${env.LOG_LEVEL}`);
  }
  if (!isOutputFormat(format)) {
    throw new LoggingConfigurationError(`Unsupported log format: ${env.LOG_FORMAT}`);
  }
  if (!isOutputSink(output)) {
    throw new LoggingConfigurationError(`Unsupported log output: ${env.LOG_OUTPUT}`);
  }

  return {
    log: { level, format, output },
  };
}

export const config: Config = loadConfig();
