import type { SourceLocation } from './primitives';

export type TokenKind =
  | 'Command'
  | 'Text'
  | 'Comment'
  | 'GroupOpen'
  | 'GroupClose'
  | 'MathInlineDelim'
  | 'MathDisplayDelim'
  | 'SpecialChar'
  | 'EndOfInput';

/**
 * A classified lexical unit.
 *
 * `value` holds the command name without its backslash, the literal text span,
 * the comment body without its `%`, or the special character itself.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly location: SourceLocation;
}

/** Characters the lexer emits as SpecialChar tokens */
export const SPECIAL_CHARS = ['~', '&', '#', '_', '^', '[', ']'] as const;
export type SpecialCharacter = (typeof SPECIAL_CHARS)[number];

export function isSpecialCharacter(char: string): char is SpecialCharacter {
  return SPECIAL_CHARS.some(special => special === char);
}
