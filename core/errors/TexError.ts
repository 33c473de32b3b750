import type { SourceLocation } from '@core/types';
import { formatLocationForError } from '@core/utils/locationFormatter';

/**
 * Defines the severity levels for texast errors and diagnostics.
 */
export enum ErrorSeverity {
  /** A structural problem; the parser recovered but the input is malformed */
  Error = 'error',
  /** Suspicious input that still has a well-defined reading */
  Warning = 'warning',
  /** The operation cannot continue */
  Fatal = 'fatal',
}

/**
 * Base interface for error details.
 * Specific error types add their own keys.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating a TexError instance.
 */
export interface TexErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  sourceLocation?: SourceLocation;
  filePath?: string;
  cause?: unknown;
}

/**
 * Base class for all texast errors.
 * Provides structure for error codes, severity, details, and source location.
 */
export class TexError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;
  /** Optional source location where the error occurred */
  public readonly sourceLocation?: SourceLocation;
  public readonly filePath?: string;

  constructor(message: string, options: TexErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;
    this.sourceLocation = options.sourceLocation;
    this.filePath = options.filePath;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Whether a caller may treat this error as a warning.
   */
  public canBeWarning(): boolean {
    return this.severity === ErrorSeverity.Warning;
  }

  /**
   * Provides a string representation including code, location and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.sourceLocation || this.filePath) {
      result += ` at ${formatLocationForError(this.sourceLocation, this.filePath)}`;
    }

    return `${result} (Severity: ${this.severity})`;
  }

  /**
   * Serializes the error to JSON with a formatted location string.
   */
  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.sourceLocation) {
      result.sourceLocation = formatLocationForError(this.sourceLocation, this.filePath);
    }

    return result;
  }
}
