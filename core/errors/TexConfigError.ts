import { TexError, ErrorSeverity } from './TexError';

export interface TexConfigErrorOptions {
  filePath?: string;
  key?: string;
  cause?: unknown;
}

/**
 * Error thrown when a configuration file holds an invalid value
 */
export class TexConfigError extends TexError {
  constructor(message: string, options: TexConfigErrorOptions = {}) {
    super(message, {
      code: 'INVALID_CONFIG',
      severity: ErrorSeverity.Fatal,
      filePath: options.filePath,
      details: options.key ? { key: options.key } : undefined,
      cause: options.cause
    });
  }
}
