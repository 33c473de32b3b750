import type { Token } from '@core/types';
import { TokenStreamError } from '@core/errors';

const COMPACT_AFTER = 1024;

/**
 * Buffered cursor over a lazy token sequence.
 *
 * Tokens are pulled from the source iterator only as far as `peek` needs;
 * `pushBack` lets the parser return the unused tail of a split Text token.
 */
export class TokenStream {
  private readonly iterator: Iterator<Token>;
  private buffer: Token[] = [];
  private head = 0;
  private last?: Token;
  private finished = false;

  constructor(tokens: Iterable<Token>) {
    this.iterator = tokens[Symbol.iterator]();
  }

  /**
   * Look at the token `ahead` positions from the cursor without consuming it.
   * Looking past EndOfInput keeps returning the EndOfInput token.
   */
  peek(ahead = 0): Token {
    while (this.buffer.length - this.head <= ahead) {
      const tail = this.buffer[this.buffer.length - 1] ?? this.last;
      if (tail?.kind === 'EndOfInput') {
        return tail;
      }
      this.buffer.push(this.pull());
    }
    return this.buffer[this.head + ahead];
  }

  /**
   * Consume the current token. Consuming EndOfInput is allowed once.
   */
  next(): Token {
    const token = this.peek();
    if (this.finished) {
      throw new TokenStreamError('Token requested after end of input', token.location);
    }
    this.head++;
    this.compact();
    if (token.kind === 'EndOfInput') {
      this.finished = true;
    }
    this.last = token;
    return token;
  }

  pushBack(token: Token): void {
    if (this.head > 0) {
      this.buffer[--this.head] = token;
    } else {
      this.buffer.unshift(token);
    }
  }

  // Drop consumed tokens once they make up most of the buffer
  private compact(): void {
    if (this.head >= COMPACT_AFTER && this.head * 2 >= this.buffer.length) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
  }

  private pull(): Token {
    const result = this.iterator.next();
    if (result.done) {
      throw new TokenStreamError('Token sequence ended without an EndOfInput token', this.last?.location);
    }
    return result.value;
  }
}
