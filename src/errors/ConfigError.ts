/**
 * Raised while loading or validating run configuration (unknown strategy names,
 * out-of-range options, unreadable config files). Nothing has run yet when this
 * is thrown, so it is always safe to report and abort.
 */
import { ToolError } from './ToolError.js';

export class ConfigError extends ToolError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super('VALIDATION', message, { details, cause });
    this.name = 'ConfigError';
  }
}
