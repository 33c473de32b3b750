import type { Token } from '@core/types';
import { tokenize } from '@core/lexer';
import { LatexParser } from './LatexParser';
import type { ParseResult, ParserOptions } from './types';

export { LatexParser, splitText } from './LatexParser';
export { NestingStack } from './NestingStack';
export type { ScopeMarker, ScopeKind } from './NestingStack';
export { isDefinitionCommand } from './definitions';
export type { DefinitionContext } from './definitions';
export type { OptionalArgumentSpacing, ParserOptions, ParseResult } from './types';

/**
 * Parse a token sequence into a document tree plus diagnostics.
 * Never throws on malformed LaTeX.
 */
export function parse(tokens: Iterable<Token>, options: ParserOptions = {}): ParseResult {
  return new LatexParser(tokens, options).parse();
}

/**
 * Tokenize and parse LaTeX source in one step
 */
export function parseLatex(source: string, options: ParserOptions = {}): ParseResult {
  return parse(tokenize(source), options);
}
