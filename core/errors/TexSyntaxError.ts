import type { Position, SourceLocation } from '@core/types';
import { TexError, ErrorSeverity, type BaseErrorDetails } from './TexError';

export enum DiagnosticCode {
  UNTERMINATED_GROUP = 'UNTERMINATED_GROUP',
  UNTERMINATED_ENVIRONMENT = 'UNTERMINATED_ENVIRONMENT',
  UNTERMINATED_MATH = 'UNTERMINATED_MATH',
  ENVIRONMENT_MISMATCH = 'ENVIRONMENT_MISMATCH',
  MATH_DELIMITER_MISMATCH = 'MATH_DELIMITER_MISMATCH',
  UNEXPECTED_CLOSE = 'UNEXPECTED_CLOSE',
  MISSING_ARGUMENT = 'MISSING_ARGUMENT',
  INVALID_MACRO_DEFINITION = 'INVALID_MACRO_DEFINITION',
}

const WARNING_CODES: ReadonlySet<DiagnosticCode> = new Set([
  DiagnosticCode.MISSING_ARGUMENT,
  DiagnosticCode.INVALID_MACRO_DEFINITION
]);

export function severityForCode(code: DiagnosticCode): ErrorSeverity {
  return WARNING_CODES.has(code) ? ErrorSeverity.Warning : ErrorSeverity.Error;
}

/**
 * A structural problem found while parsing.
 *
 * Instances are collected into the parse result's diagnostics list; the
 * parser never throws them.
 */
export class TexSyntaxError extends TexError {
  public readonly location: SourceLocation;
  declare readonly code: DiagnosticCode;

  constructor(
    code: DiagnosticCode,
    message: string,
    location: SourceLocation,
    details?: BaseErrorDetails
  ) {
    super(message, {
      code,
      severity: severityForCode(code),
      details,
      sourceLocation: location
    });
    this.location = location;
  }

  get position(): Position {
    return this.location.start;
  }

  get line(): number {
    return this.location.start.line;
  }

  get column(): number {
    return this.location.start.column;
  }
}

export type Diagnostic = TexSyntaxError;
