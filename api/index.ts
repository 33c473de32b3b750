/**
 * texast API Entry Point
 *
 * LaTeX source in, document tree plus diagnostics out.
 */

// Lexing and parsing
export { tokenize, TokenStream } from '@core/lexer';
export { parse, parseLatex, LatexParser, NestingStack } from '@core/parser';
export type { ParserOptions, ParseResult, OptionalArgumentSpacing } from '@core/parser';
export { SymbolTable, toArity } from '@core/registry';

// Tree utilities
export {
  walk,
  findAll,
  findCommands,
  findEnvironments,
  getTextContent,
  getSections,
  getTitle,
  getAbstract,
  getCitationKeys,
  serialize,
  formatTree
} from '@core/ast';
export type { Visitor, TextContentOptions, SectionInfo } from '@core/ast';

// Errors and diagnostics
export {
  TexError,
  TexSyntaxError,
  TexConfigError,
  TexFileNotFoundError,
  TokenStreamError,
  ErrorSeverity,
  DiagnosticCode
} from '@core/errors';
export type { Diagnostic } from '@core/errors';
export { formatDiagnostic, summarizeDiagnostics } from '@core/utils/diagnosticFormatter';
export type { DiagnosticDisplayOptions } from '@core/utils/diagnosticFormatter';

// Configuration
export { ConfigLoader, toParserOptions, validateConfig } from '@core/config/loader';
export type { TexastConfig, ParserConfig } from '@core/config/types';

export * from '@core/types';
