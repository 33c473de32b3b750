/**
 * Central export point for texast error types.
 */

export { TexError, ErrorSeverity } from './TexError';
export type { BaseErrorDetails, TexErrorOptions } from './TexError';
export { TexSyntaxError, DiagnosticCode, severityForCode } from './TexSyntaxError';
export type { Diagnostic } from './TexSyntaxError';
export { TokenStreamError } from './TokenStreamError';
export { TexConfigError } from './TexConfigError';
export type { TexConfigErrorOptions } from './TexConfigError';
export { TexFileNotFoundError } from './TexFileNotFoundError';
export * from './messages/parser';
