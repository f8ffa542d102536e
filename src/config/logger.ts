/**
 * Default Log Engine
 *
 * Composition root for the package-level logging functions: one engine built
 * from the environment (text on stderr at info level unless configured).
 *
 * A Fluent Bit output without its endpoint variables throws here, at startup.
 */

import { LogEngine } from '../services/log-engine';
import { config } from './index';

export const engine = new LogEngine({
  level: config.log.level,
  format: config.log.format,
  output: config.log.output,
});
