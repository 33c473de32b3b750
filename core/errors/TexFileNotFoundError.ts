import { TexError, ErrorSeverity } from './TexError';

export class TexFileNotFoundError extends TexError {
  constructor(filePath: string, cause?: unknown) {
    super(`File not found: ${filePath}`, {
      code: 'FILE_NOT_FOUND',
      severity: ErrorSeverity.Fatal,
      filePath,
      cause
    });
  }
}
