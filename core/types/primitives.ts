/**
 * Primitive types shared by the lexer, the parser and the AST.
 */

// Position and source location tracking
export interface Position {
  line: number;
  column: number;
  /** UTF-16 code unit index into the source string */
  offset: number;
  /** Byte index into the UTF-8 encoding of the source */
  byteOffset: number;
}

export interface SourceLocation {
  start: Position;
  /** Exclusive */
  end: Position;
}

export const ORIGIN: Position = Object.freeze({ line: 1, column: 1, offset: 0, byteOffset: 0 });

export function comparePositions(a: Position, b: Position): number {
  return a.offset - b.offset;
}

/**
 * UTF-8 bytes contributed by the code unit at `index`. A surrogate pair
 * counts four bytes on its high half and none on its low half; a lone
 * surrogate counts as the three-byte replacement character.
 */
export function utf8Width(text: string, index: number): number {
  const unit = text.charCodeAt(index);
  if (unit < 0x80) return 1;
  if (unit < 0x800) return 2;
  if (unit >= 0xd800 && unit <= 0xdbff) {
    const next = text.charCodeAt(index + 1);
    return next >= 0xdc00 && next <= 0xdfff ? 4 : 3;
  }
  if (unit >= 0xdc00 && unit <= 0xdfff) {
    const previous = index > 0 ? text.charCodeAt(index - 1) : NaN;
    return previous >= 0xd800 && previous <= 0xdbff ? 0 : 3;
  }
  return 3;
}
