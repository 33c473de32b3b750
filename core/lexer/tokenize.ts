import {
  isSpecialCharacter,
  utf8Width,
  type Position,
  type Token,
  type TokenKind
} from '@core/types';
import { lexerLogger } from '@core/utils/logger';

const LETTER = /[A-Za-z]/;

/**
 * Characters that end a Text run. Everything else is literal text,
 * whitespace and newlines included.
 */
function isStructural(char: string): boolean {
  return (
    char === '\\' ||
    char === '{' ||
    char === '}' ||
    char === '$' ||
    char === '%' ||
    isSpecialCharacter(char)
  );
}

/**
 * Convert LaTeX source into a lazy token sequence.
 *
 * The lexer never fails: every character ends up in some token, and the
 * sequence always finishes with exactly one EndOfInput token.
 */
export function* tokenize(source: string): Generator<Token, void, undefined> {
  let offset = 0;
  let byteOffset = 0;
  let line = 1;
  let column = 1;
  let count = 0;

  const here = (): Position => ({ line, column, offset, byteOffset });

  // Moves past `length` code units, keeping line, column and byte offset in step
  const advance = (length: number): void => {
    for (let i = 0; i < length; i++) {
      if (source[offset] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
      byteOffset += utf8Width(source, offset);
      offset++;
    }
  };

  const make = (kind: TokenKind, value: string, start: Position): Token => {
    count++;
    return { kind, value, location: { start, end: here() } };
  };

  while (offset < source.length) {
    const char = source[offset];
    const start = here();

    if (char === '\\') {
      const code = source.codePointAt(offset + 1);
      if (code === undefined) {
        advance(1);
        yield make('Text', '\\', start);
        continue;
      }
      const next = String.fromCodePoint(code);
      if (LETTER.test(next)) {
        let end = offset + 1;
        while (end < source.length && LETTER.test(source[end])) {
          end++;
        }
        const name = source.slice(offset + 1, end);
        advance(end - offset);
        yield make('Command', name, start);
        continue;
      }
      advance(1 + next.length);
      yield make('Command', next, start);
      continue;
    }

    if (char === '{') {
      advance(1);
      yield make('GroupOpen', char, start);
      continue;
    }

    if (char === '}') {
      advance(1);
      yield make('GroupClose', char, start);
      continue;
    }

    if (char === '$') {
      if (source[offset + 1] === '$') {
        advance(2);
        yield make('MathDisplayDelim', '$$', start);
      } else {
        advance(1);
        yield make('MathInlineDelim', '$', start);
      }
      continue;
    }

    if (char === '%') {
      let end = source.indexOf('\n', offset);
      if (end === -1) end = source.length;
      const content = source.slice(offset + 1, end);
      advance(end - offset);
      yield make('Comment', content, start);
      continue;
    }

    if (isSpecialCharacter(char)) {
      advance(1);
      yield make('SpecialChar', char, start);
      continue;
    }

    let end = offset + 1;
    while (end < source.length && !isStructural(source[end])) {
      end++;
    }
    const text = source.slice(offset, end);
    advance(end - offset);
    yield make('Text', text, start);
  }

  lexerLogger.debug('Tokenized source', { tokens: count + 1, length: source.length });
  yield make('EndOfInput', '', here());
}
