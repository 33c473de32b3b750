import type { ArityRecord, DocumentNode } from '@core/types';
import type { Diagnostic } from '@core/errors';
import type { SymbolTable } from '@core/registry';

/**
 * How an optional argument's `[` may be separated from what precedes it.
 * - strict: `[` must follow immediately (`\foo[bar]`)
 * - lenient: whitespace may come between (`\foo [bar]`)
 */
export type OptionalArgumentSpacing = 'strict' | 'lenient';

/**
 * Options for configuring the parser behavior
 */
export interface ParserOptions {
  /**
   * Table to start from instead of the built-ins. The parser works on a
   * copy, so the caller's table is never modified.
   */
  symbols?: SymbolTable;

  /**
   * Extra command arities registered before parsing starts
   */
  commands?: ArityRecord;

  /**
   * Extra environment arities registered before parsing starts
   */
  environments?: ArityRecord;

  /**
   * Default: 'strict'
   */
  optionalArgumentSpacing?: OptionalArgumentSpacing;
}

/**
 * Result of a parse: always a complete tree, plus every problem found
 * (sorted by source position).
 */
export interface ParseResult {
  ast: DocumentNode;
  diagnostics: Diagnostic[];
}
