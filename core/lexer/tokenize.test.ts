import { describe, it, expect } from 'vitest';
import type { Token } from '@core/types';
import { tokenize } from './tokenize';

const kinds = (source: string) => [...tokenize(source)].map(token => token.kind);
const values = (source: string) => [...tokenize(source)].map(token => token.value);

describe('tokenize', () => {
  it('ends every sequence with exactly one EndOfInput', () => {
    expect(kinds('')).toEqual(['EndOfInput']);
    expect(kinds('plain')).toEqual(['Text', 'EndOfInput']);
  });

  it('reads a command name as the run of letters after the backslash', () => {
    const tokens = [...tokenize('\\textbf{hi}')];

    expect(tokens.map(token => token.kind)).toEqual([
      'Command',
      'GroupOpen',
      'Text',
      'GroupClose',
      'EndOfInput'
    ]);
    expect(tokens[0].value).toBe('textbf');
    expect(tokens[0].location).toEqual({
      start: { line: 1, column: 1, offset: 0, byteOffset: 0 },
      end: { line: 1, column: 8, offset: 7, byteOffset: 7 }
    });
    expect(tokens[2].location.start).toEqual({ line: 1, column: 9, offset: 8, byteOffset: 8 });
  });

  it('treats a single non-letter after a backslash as the whole name', () => {
    expect(values('\\%\\\\\\{')).toEqual(['%', '\\', '{', '']);
    expect(kinds('\\%\\\\\\{')).toEqual(['Command', 'Command', 'Command', 'EndOfInput']);
  });

  it('stops a command name at the first non-letter', () => {
    expect(values('\\section*{A}')).toEqual(['section', '*', '{', 'A', '}', '']);
    expect(values('\\alpha2')).toEqual(['alpha', '2', '']);
  });

  it('keeps a trailing lone backslash as text', () => {
    expect(kinds('a\\')).toEqual(['Text', 'Text', 'EndOfInput']);
    expect(values('a\\')).toEqual(['a', '\\', '']);
  });

  it('lexes $$ greedily before $', () => {
    expect(kinds('$$x$')).toEqual(['MathDisplayDelim', 'Text', 'MathInlineDelim', 'EndOfInput']);
    expect(kinds('$$$')).toEqual(['MathDisplayDelim', 'MathInlineDelim', 'EndOfInput']);
  });

  it('lexes \\( \\) \\[ \\] as one-character commands', () => {
    expect(values('\\(x\\)')).toEqual(['(', 'x', ')', '']);
    expect(values('\\[x\\]')).toEqual(['[', 'x', ']', '']);
  });

  it('runs a comment to the end of the line without the newline', () => {
    const tokens = [...tokenize('a % note\nb')];

    expect(tokens.map(token => token.kind)).toEqual(['Text', 'Comment', 'Text', 'EndOfInput']);
    expect(tokens[1].value).toBe(' note');
    expect(tokens[1].location.end).toEqual({ line: 1, column: 9, offset: 8, byteOffset: 8 });
    expect(tokens[2].value).toBe('\nb');
    expect(tokens[2].location.end).toEqual({ line: 2, column: 2, offset: 10, byteOffset: 10 });
  });

  it('runs a comment at the end of input to the end', () => {
    expect(values('x%tail')).toEqual(['x', 'tail', '']);
  });

  it('emits special characters on their own', () => {
    expect(kinds('x~y')).toEqual(['Text', 'SpecialChar', 'Text', 'EndOfInput']);
    expect(values('a_1^2&#')).toEqual(['a', '_', '1', '^', '2', '&', '#', '']);
    expect(values('\\foo[opt]')).toEqual(['foo', '[', 'opt', ']', '']);
  });

  it('preserves whitespace and newlines inside text', () => {
    expect(values('one\n\n two')).toEqual(['one\n\n two', '']);
  });

  it('tracks lines and columns across newlines', () => {
    const tokens = [...tokenize('a\n\\b{c}')];
    const command = tokens[1];

    expect(command.kind).toBe('Command');
    expect(command.location.start).toEqual({ line: 2, column: 1, offset: 2, byteOffset: 2 });
    expect(tokens[tokens.length - 1].location.start).toEqual({ line: 2, column: 6, offset: 7, byteOffset: 7 });
  });

  it('tracks UTF-8 byte offsets beside code unit offsets', () => {
    const source = 'é\\b€😀';
    const tokens = [...tokenize(source)];

    expect(tokens.map(token => token.value)).toEqual(['é', 'b', '€😀', '']);
    expect(tokens[1].location).toEqual({
      start: { line: 1, column: 2, offset: 1, byteOffset: 2 },
      end: { line: 1, column: 4, offset: 3, byteOffset: 4 }
    });
    expect(tokens[3].location.start).toEqual({ line: 1, column: 7, offset: 6, byteOffset: 11 });
    expect(tokens[3].location.start.byteOffset).toBe(Buffer.byteLength(source));
  });

  it('takes a whole astral character after a backslash', () => {
    const tokens = [...tokenize('\\😀x')];

    expect(tokens.map(token => token.value)).toEqual(['😀', 'x', '']);
    expect(tokens[0].location.end).toEqual({ line: 1, column: 4, offset: 3, byteOffset: 5 });
  });

  it('produces tokens lazily', () => {
    const iterator = tokenize('\\a\\b');
    const first = iterator.next();

    expect(first.done).toBe(false);
    const token: Token | void = first.value;
    expect(token).toMatchObject({ kind: 'Command', value: 'a' });
  });
});
