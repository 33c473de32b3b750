import type { SourceLocation } from '@core/types';
import { TexError, ErrorSeverity } from './TexError';

/**
 * Raised when a token is requested after the stream already yielded
 * EndOfInput. Parser logic never does this; seeing it means a bug.
 */
export class TokenStreamError extends TexError {
  constructor(message: string, sourceLocation?: SourceLocation) {
    super(message, {
      code: 'TOKEN_STREAM_EXHAUSTED',
      severity: ErrorSeverity.Fatal,
      sourceLocation
    });
  }
}
