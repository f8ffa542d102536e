/**
 * Raised by setOutput/setFormatter when the requested configuration cannot be
 * applied. The engine keeps its previous configuration.
 */
export class LoggingConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LoggingConfigurationError';
  }
}
