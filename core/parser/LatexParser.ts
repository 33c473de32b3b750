import type {
  Arity,
  CommandArgument,
  CommandNode,
  DocumentNode,
  EnvironmentNode,
  GroupNode,
  MathDelimiter,
  MathNode,
  Position,
  SourceLocation,
  Token,
  TexNode
} from '@core/types';
import { ORIGIN, comparePositions, isSpecialCharacter, utf8Width } from '@core/types';
import {
  DiagnosticCode,
  TexSyntaxError,
  formatMessage,
  type Diagnostic,
  type ParserErrorMessageKey
} from '@core/errors';
import { TokenStream } from '@core/lexer';
import { SymbolTable } from '@core/registry';
import { getTextContent } from '@core/ast/query';
import { parserLogger as logger } from '@core/utils/logger';
import { NestingStack } from './NestingStack';
import { readDefinition, isDefinitionCommand } from './definitions';
import type { OptionalArgumentSpacing, ParseResult, ParserOptions } from './types';

/** Escapes that stand for the literal character */
const ESCAPED_LITERALS = new Set(['#', '$', '%', '&', '_', '{', '}']);

/** Commands that open or close scopes and so never serve as a bare argument */
const STRUCTURAL_COMMANDS = new Set(['begin', 'end', '(', ')', '[', ']']);

const BLANK = /^\s*$/;

const MATH_DELIMITERS: Record<string, MathDelimiter> = {
  MathInlineDelim: '$',
  MathDisplayDelim: '$$'
};

/**
 * Split a Text token after `length` code units, recomputing positions.
 */
export function splitText(token: Token, length: number): [Token, Token | undefined] {
  const { start } = token.location;
  let { line, column, offset, byteOffset } = start;
  for (let i = 0; i < length; i++) {
    if (token.value[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
    byteOffset += utf8Width(token.value, i);
    offset++;
  }
  const middle: Position = { line, column, offset, byteOffset };
  const head: Token = { kind: 'Text', value: token.value.slice(0, length), location: { start, end: middle } };
  if (length >= token.value.length) {
    return [head, undefined];
  }
  const tail: Token = {
    kind: 'Text',
    value: token.value.slice(length),
    location: { start: middle, end: token.location.end }
  };
  return [head, tail];
}

function leadingWhitespace(value: string): number {
  const match = /^\s*/.exec(value);
  return match ? match[0].length : 0;
}

/**
 * Recursive-descent LaTeX parser.
 *
 * One instance parses one token sequence. It owns the symbol table and the
 * nesting stack for that parse and never throws on malformed input: every
 * structural problem becomes a diagnostic and the tree is closed off.
 */
export class LatexParser {
  private readonly stream: TokenStream;
  private readonly stack = new NestingStack();
  private readonly diagnostics: Diagnostic[] = [];
  private readonly spacing: OptionalArgumentSpacing;
  private previousEnd: Position = ORIGIN;
  /** Lookahead answers by the offset of the `[` they were asked for */
  private readonly bracketAnswers = new Map<number, boolean>();
  readonly symbols: SymbolTable;

  constructor(tokens: Iterable<Token>, options: ParserOptions = {}) {
    this.stream = new TokenStream(tokens);
    this.symbols = options.symbols ? options.symbols.clone() : SymbolTable.withBuiltins();
    this.spacing = options.optionalArgumentSpacing ?? 'strict';

    const rejected = [
      ...(options.commands ? this.symbols.defineCommands(options.commands) : []),
      ...(options.environments ? this.symbols.defineEnvironments(options.environments) : [])
    ];
    if (rejected.length > 0) {
      logger.warn('Ignoring invalid arity entries', { names: rejected });
    }
  }

  parse(): ParseResult {
    const children = this.parseContent();
    const end = this.consume();

    const ast: DocumentNode = {
      type: 'Document',
      children,
      location: { start: ORIGIN, end: end.location.end }
    };

    const diagnostics = [...this.diagnostics].sort((a, b) => comparePositions(a.position, b.position));
    logger.debug('Parsed document', { nodes: children.length, diagnostics: diagnostics.length });
    return { ast, diagnostics };
  }

  // ── Token access ──────────────────────────────────────────

  peek(ahead = 0): Token {
    return this.stream.peek(ahead);
  }

  consume(): Token {
    const token = this.stream.next();
    this.previousEnd = token.location.end;
    return token;
  }

  /**
   * Consume the first `length` characters of the current Text token
   */
  consumeTextPrefix(length: number): Token {
    const [head, tail] = splitText(this.stream.next(), length);
    if (tail) {
      this.stream.pushBack(tail);
    }
    this.previousEnd = head.location.end;
    return head;
  }

  get lastEnd(): Position {
    return this.previousEnd;
  }

  report(
    code: DiagnosticCode,
    key: ParserErrorMessageKey,
    values: Record<string, string | number>,
    location: SourceLocation
  ): void {
    const diagnostic = new TexSyntaxError(code, formatMessage(key, values), location);
    logger.debug('Recovered from syntax error', { code, line: location.start.line, column: location.start.column });
    this.diagnostics.push(diagnostic);
  }

  // ── Scopes ────────────────────────────────────────────────

  /**
   * Level of the scope the token would close, -1 when it is a closer with
   * nothing to close, undefined when it is not a closer here.
   */
  private closerTarget(token: Token): number | undefined {
    switch (token.kind) {
      case 'GroupClose':
        return this.stack.nearest('Group');
      case 'MathInlineDelim':
      case 'MathDisplayDelim':
        return this.stack.top()?.kind === 'Math' ? this.stack.topLevel() : undefined;
      case 'SpecialChar': {
        if (token.value !== ']') return undefined;
        // A bracket inside a nested scope is plain text, never a stray closer
        const level = this.stack.nearest('Optional', ['Group', 'Environment', 'Math']);
        return level === -1 ? undefined : level;
      }
      case 'Command':
        if (token.value === 'end') return this.stack.nearest('Environment');
        if (token.value === ')' || token.value === ']') return this.stack.nearest('Math');
        return undefined;
      default:
        return undefined;
    }
  }

  /**
   * Parse nodes until end of input or a closer that belongs to this scope or
   * an enclosing one. The stopping token is left unconsumed.
   */
  private parseContent(): TexNode[] {
    const children: TexNode[] = [];

    for (;;) {
      const token = this.peek();
      if (token.kind === 'EndOfInput') {
        return children;
      }

      const target = this.closerTarget(token);
      if (target === -1) {
        this.dropUnexpectedClose();
        continue;
      }
      if (target !== undefined) {
        return children;
      }

      children.push(this.parseNode());
    }
  }

  private dropUnexpectedClose(): void {
    const token = this.consume();
    let label = token.kind === 'Command' ? `\\${token.value}` : token.value;

    if (token.kind === 'Command' && token.value === 'end') {
      const name = this.readMandatoryArgument();
      if (name) {
        label = `\\end{${getTextContent(name)}}`;
      }
    }

    this.report(
      DiagnosticCode.UNEXPECTED_CLOSE,
      'UNEXPECTED_CLOSE',
      { token: label },
      { start: token.location.start, end: this.lastEnd }
    );
  }

  private parseNode(): TexNode {
    const token = this.peek();

    switch (token.kind) {
      case 'GroupOpen':
        return this.parseGroup();
      case 'MathInlineDelim':
      case 'MathDisplayDelim':
        return this.parseMath();
      case 'Command':
        return this.parseCommand();
      case 'Comment': {
        this.consume();
        return { type: 'Comment', content: token.value, location: token.location };
      }
      case 'SpecialChar': {
        this.consume();
        if (isSpecialCharacter(token.value)) {
          return { type: 'SpecialChar', char: token.value, location: token.location };
        }
        return { type: 'Text', content: token.value, location: token.location };
      }
      default: {
        this.consume();
        return { type: 'Text', content: token.value, location: token.location };
      }
    }
  }

  parseGroup(): GroupNode {
    const open = this.consume();
    const level = this.stack.push({ kind: 'Group', opener: open.location });
    const children = this.parseContent();
    const closer = this.peek();

    let end: Position;
    if (closer.kind === 'GroupClose' && this.closerTarget(closer) === level) {
      this.consume();
      end = closer.location.end;
    } else {
      this.report(DiagnosticCode.UNTERMINATED_GROUP, 'UNTERMINATED_GROUP', {}, open.location);
      end = this.lastEnd;
    }

    this.stack.pop();
    return { type: 'Group', optional: false, children, location: { start: open.location.start, end } };
  }

  private parseMath(): MathNode {
    const open = this.consume();
    const delimiter: MathDelimiter =
      open.kind === 'Command' ? (open.value === '(' ? '\\(' : '\\[') : MATH_DELIMITERS[open.kind];
    const level = this.stack.push({ kind: 'Math', delimiter, opener: open.location });
    const children = this.parseContent();
    const closer = this.peek();

    let end: Position;
    if (closer.kind !== 'EndOfInput' && this.closerTarget(closer) === level) {
      this.consume();
      end = closer.location.end;
      const found = closerDelimiter(closer);
      if (found !== expectedCloser(delimiter)) {
        this.report(
          DiagnosticCode.MATH_DELIMITER_MISMATCH,
          'MATH_DELIMITER_MISMATCH',
          { found, expected: delimiter },
          closer.location
        );
      }
    } else {
      this.report(DiagnosticCode.UNTERMINATED_MATH, 'UNTERMINATED_MATH', { delimiter }, open.location);
      end = this.lastEnd;
    }

    this.stack.pop();
    return {
      type: 'Math',
      display: delimiter === '$$' || delimiter === '\\[',
      delimiter,
      children,
      location: { start: open.location.start, end }
    };
  }

  // ── Commands ──────────────────────────────────────────────

  private parseCommand(): TexNode {
    const token = this.peek();
    const name = token.value;

    if (name === '(' || name === '[') {
      return this.parseMath();
    }

    if (name === 'begin') {
      return this.parseEnvironment();
    }

    this.consume();

    if (ESCAPED_LITERALS.has(name)) {
      return { type: 'Text', content: name, escaped: true, location: token.location };
    }

    if (isDefinitionCommand(name)) {
      const starred = this.consumeStar(token);
      return readDefinition(this, token, starred);
    }

    const starred = this.symbols.hasCommand(name) && this.consumeStar(token);
    const args = this.readArguments(name, this.symbols.commandArity(name), token);

    return {
      type: 'Command',
      name,
      starred,
      args,
      location: { start: token.location.start, end: this.lastEnd }
    };
  }

  /**
   * Consume a `*` written directly after the command name
   */
  consumeStar(command: Token): boolean {
    const next = this.peek();
    if (
      next.kind === 'Text' &&
      next.value.startsWith('*') &&
      next.location.start.offset === command.location.end.offset
    ) {
      this.consumeTextPrefix(1);
      return true;
    }
    return false;
  }

  readArguments(name: string, arity: Arity, anchor: Token): CommandArgument[] {
    const args: CommandArgument[] = [];

    for (let i = 0; i < arity.optional; i++) {
      const group = this.readOptionalArgument();
      if (!group) break;
      args.push({ kind: 'optional', node: group });
    }

    for (let i = 0; i < arity.mandatory; i++) {
      const node = this.readMandatoryArgument();
      if (!node) {
        this.report(
          DiagnosticCode.MISSING_ARGUMENT,
          'MISSING_ARGUMENT',
          { name, expected: arity.mandatory, found: i },
          anchor.location
        );
        break;
      }
      args.push({ kind: 'mandatory', node });
    }

    return args;
  }

  /**
   * A bracketed optional argument, or undefined when none follows.
   * Nothing is consumed in the undefined case.
   */
  readOptionalArgument(): GroupNode | undefined {
    let ahead = 0;
    let token = this.peek();
    if (this.spacing === 'lenient' && token.kind === 'Text' && BLANK.test(token.value)) {
      ahead = 1;
      token = this.peek(1);
    }

    if (token.kind !== 'SpecialChar' || token.value !== '[' || !this.hasClosingBracket(ahead + 1)) {
      return undefined;
    }

    if (ahead > 0) {
      this.consume();
    }

    const open = this.consume();
    const level = this.stack.push({ kind: 'Optional', opener: open.location });
    const children = this.parseContent();
    const closer = this.peek();

    let end: Position;
    if (closer.kind === 'SpecialChar' && this.closerTarget(closer) === level) {
      this.consume();
      end = closer.location.end;
    } else {
      this.report(DiagnosticCode.UNTERMINATED_GROUP, 'UNTERMINATED_OPTIONAL', {}, open.location);
      end = this.lastEnd;
    }

    this.stack.pop();
    return { type: 'Group', optional: true, children, location: { start: open.location.start, end } };
  }

  /**
   * Whether a `]` closes the bracket opened before token `from`, looking
   * ahead without consuming. The bracket must close before the enclosing
   * brace level does and before any unmatched `\end`, `\)` or `\]`.
   *
   * Every `[` met at the opener's own level gets the same answer, so a run
   * of unclosed brackets is scanned once rather than once per bracket.
   */
  private hasClosingBracket(from: number): boolean {
    const opener = this.peek(from - 1).location.start.offset;
    const known = this.bracketAnswers.get(opener);
    if (known !== undefined) {
      return known;
    }

    const sameLevel = [opener];
    const settle = (answer: boolean): boolean => {
      for (const offset of sameLevel) {
        this.bracketAnswers.set(offset, answer);
      }
      return answer;
    };

    let braces = 0;
    let environments = 0;
    let maths = 0;

    for (let i = from; ; i++) {
      const token = this.peek(i);
      switch (token.kind) {
        case 'EndOfInput':
          return settle(false);
        case 'GroupOpen':
          braces++;
          break;
        case 'GroupClose':
          if (braces === 0) return settle(false);
          braces--;
          break;
        case 'SpecialChar':
          if (braces > 0 || environments > 0 || maths > 0) break;
          if (token.value === ']') return settle(true);
          if (token.value === '[') sameLevel.push(token.location.start.offset);
          break;
        case 'Command':
          if (braces > 0) break;
          if (token.value === 'begin') environments++;
          if (token.value === '(' || token.value === '[') maths++;
          if (token.value === 'end') {
            if (environments === 0) return settle(false);
            environments--;
          }
          if (token.value === ')' || token.value === ']') {
            if (maths === 0) return settle(false);
            maths--;
          }
          break;
        default:
          break;
      }
    }
  }

  /**
   * One mandatory argument: a brace group, or a single bare token.
   * Leading whitespace is skipped. Returns undefined, consuming nothing,
   * when no argument can start here.
   */
  readMandatoryArgument(): TexNode | undefined {
    let token = this.peek();

    if (token.kind === 'Text') {
      const skip = leadingWhitespace(token.value);
      if (skip === token.value.length) {
        const next = this.peek(1);
        if (!this.canStartArgument(next)) {
          return undefined;
        }
        this.consume();
        token = next;
      } else if (skip > 0) {
        this.consumeTextPrefix(skip);
        token = this.peek();
      }
    }

    if (!this.canStartArgument(token)) {
      return undefined;
    }

    switch (token.kind) {
      case 'GroupOpen':
        return this.parseGroup();
      case 'Text': {
        const first = String.fromCodePoint(token.value.codePointAt(0) ?? 0);
        const head = this.consumeTextPrefix(first.length);
        return { type: 'Text', content: head.value, location: head.location };
      }
      case 'SpecialChar': {
        this.consume();
        if (isSpecialCharacter(token.value)) {
          return { type: 'SpecialChar', char: token.value, location: token.location };
        }
        return { type: 'Text', content: token.value, location: token.location };
      }
      default: {
        this.consume();
        if (ESCAPED_LITERALS.has(token.value)) {
          return { type: 'Text', content: token.value, escaped: true, location: token.location };
        }
        return { type: 'Command', name: token.value, starred: false, args: [], location: token.location };
      }
    }
  }

  private canStartArgument(token: Token): boolean {
    switch (token.kind) {
      case 'GroupOpen':
        return true;
      case 'Text':
        return token.value.length > 0;
      case 'SpecialChar':
        return this.closerTarget(token) === undefined;
      case 'Command':
        return !STRUCTURAL_COMMANDS.has(token.value);
      default:
        return false;
    }
  }

  // ── Environments ──────────────────────────────────────────

  private parseEnvironment(): TexNode {
    const begin = this.consume();
    const nameNode = this.readMandatoryArgument();

    if (!nameNode) {
      this.report(DiagnosticCode.MISSING_ARGUMENT, 'MISSING_ENVIRONMENT_NAME', {}, begin.location);
      const command: CommandNode = {
        type: 'Command',
        name: 'begin',
        starred: false,
        args: [],
        location: begin.location
      };
      return command;
    }

    const name = getTextContent(nameNode).trim();
    const args = this.readArguments(`begin{${name}}`, this.symbols.environmentArity(name), begin);
    const level = this.stack.push({ kind: 'Environment', name, opener: begin.location });
    const children = this.parseContent();
    const closer = this.peek();

    let end: Position;
    if (closer.kind === 'Command' && this.closerTarget(closer) === level) {
      const endToken = this.consume();
      const endName = this.readMandatoryArgument();
      end = this.lastEnd;
      const location = { start: endToken.location.start, end };

      if (!endName) {
        this.report(DiagnosticCode.ENVIRONMENT_MISMATCH, 'ENVIRONMENT_MISSING_NAME', { expected: name }, location);
      } else {
        const found = getTextContent(endName).trim();
        if (found !== name) {
          this.report(DiagnosticCode.ENVIRONMENT_MISMATCH, 'ENVIRONMENT_MISMATCH', { found, expected: name }, location);
        }
      }
    } else {
      this.report(DiagnosticCode.UNTERMINATED_ENVIRONMENT, 'UNTERMINATED_ENVIRONMENT', { name }, begin.location);
      end = this.lastEnd;
    }

    this.stack.pop();
    const environment: EnvironmentNode = {
      type: 'Environment',
      name,
      args,
      children,
      location: { start: begin.location.start, end }
    };
    return environment;
  }
}

function closerDelimiter(token: Token): string {
  if (token.kind === 'Command') {
    return `\\${token.value}`;
  }
  return token.value;
}

function expectedCloser(delimiter: MathDelimiter): string {
  switch (delimiter) {
    case '\\(':
      return '\\)';
    case '\\[':
      return '\\]';
    default:
      return delimiter;
  }
}
