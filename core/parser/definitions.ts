import type {
  Arity,
  CommandArgument,
  CommandNode,
  GroupNode,
  Position,
  SourceLocation,
  Token,
  TexNode
} from '@core/types';
import { ZERO_ARITY } from '@core/types';
import { DiagnosticCode, type ParserErrorMessageKey } from '@core/errors';
import type { SymbolTable } from '@core/registry';
import { getTextContent } from '@core/ast/query';

/**
 * The parts of the parser a definition reader drives
 */
export interface DefinitionContext {
  readonly symbols: SymbolTable;
  readonly lastEnd: Position;
  peek(ahead?: number): Token;
  consume(): Token;
  consumeTextPrefix(length: number): Token;
  parseGroup(): GroupNode;
  readOptionalArgument(): GroupNode | undefined;
  readMandatoryArgument(): TexNode | undefined;
  readArguments(name: string, arity: Arity, anchor: Token): CommandArgument[];
  report(
    code: DiagnosticCode,
    key: ParserErrorMessageKey,
    values: Record<string, string | number>,
    location: SourceLocation
  ): void;
}

type DefinitionReader = (ctx: DefinitionContext, token: Token, args: CommandArgument[]) => void;

const ARGUMENT_COUNT = /^[0-9]$/;
const PARAMETER = /#[1-9]/g;
const LET_EQUALS = /^\s*=\s*/;

const READERS: Record<string, DefinitionReader> = {
  newcommand: readNewCommand,
  renewcommand: readNewCommand,
  providecommand: readNewCommand,
  DeclareRobustCommand: readNewCommand,
  def: readDef,
  gdef: readDef,
  edef: readDef,
  xdef: readDef,
  let: readLet,
  DeclareMathOperator: readMathOperator,
  newenvironment: readNewEnvironment,
  renewenvironment: readNewEnvironment
};

export function isDefinitionCommand(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(READERS, name);
}

/**
 * Read a macro or environment definition and register what it defines.
 *
 * Registration happens once the whole definition has been read, so the body
 * of a definition is parsed with the arities in force before it.
 */
export function readDefinition(ctx: DefinitionContext, token: Token, starred: boolean): CommandNode {
  const args: CommandArgument[] = [];
  READERS[token.value](ctx, token, args);
  return {
    type: 'Command',
    name: token.value,
    starred,
    args,
    location: { start: token.location.start, end: ctx.lastEnd }
  };
}

/**
 * `\foo` or `{\foo}`
 */
function macroName(node: TexNode): string | undefined {
  if (node.type === 'Command') {
    return node.name;
  }
  if (node.type === 'Group') {
    const significant = node.children.filter(child => child.type !== 'Text' || child.content.trim() !== '');
    const [only] = significant;
    if (significant.length === 1 && only.type === 'Command') {
      return only.name;
    }
  }
  return undefined;
}

function reportMissingName(ctx: DefinitionContext, token: Token): void {
  ctx.report(
    DiagnosticCode.INVALID_MACRO_DEFINITION,
    'MISSING_MACRO_NAME',
    { name: token.value },
    token.location
  );
}

/**
 * `[n][default]` after a macro or environment name. Returns the arity the
 * definition declares for the thing it defines.
 */
function readDeclaredArity(ctx: DefinitionContext, defined: string, args: CommandArgument[]): Arity {
  const count = ctx.readOptionalArgument();
  if (!count) {
    return ZERO_ARITY;
  }
  args.push({ kind: 'optional', node: count });

  const value = getTextContent(count).trim();
  let total = 0;
  if (ARGUMENT_COUNT.test(value)) {
    total = Number(value);
  } else {
    ctx.report(
      DiagnosticCode.INVALID_MACRO_DEFINITION,
      'INVALID_ARGUMENT_COUNT',
      { value, name: defined },
      count.location
    );
  }

  const fallback = ctx.readOptionalArgument();
  if (!fallback) {
    return { optional: 0, mandatory: total };
  }
  args.push({ kind: 'optional', node: fallback });
  return { optional: 1, mandatory: Math.max(total - 1, 0) };
}

function readBody(ctx: DefinitionContext, token: Token, args: CommandArgument[], expected: number): void {
  const body = ctx.readMandatoryArgument();
  if (body) {
    args.push({ kind: 'mandatory', node: body });
    return;
  }
  ctx.report(
    DiagnosticCode.MISSING_ARGUMENT,
    'MISSING_ARGUMENT',
    { name: token.value, expected, found: expected - 1 },
    token.location
  );
}

// \newcommand{\name}[n][default]{body}
function readNewCommand(ctx: DefinitionContext, token: Token, args: CommandArgument[]): void {
  const target = ctx.readMandatoryArgument();
  const name = target && macroName(target);
  if (!target || !name) {
    if (target) args.push({ kind: 'mandatory', node: target });
    reportMissingName(ctx, token);
    return;
  }
  args.push({ kind: 'mandatory', node: target });

  const arity = readDeclaredArity(ctx, name, args);
  readBody(ctx, token, args, 2);

  if (token.value === 'providecommand' && ctx.symbols.hasCommand(name)) {
    return;
  }
  ctx.symbols.defineCommand(name, arity);
}

// \def\name<parameter text>{body}
function readDef(ctx: DefinitionContext, token: Token, args: CommandArgument[]): void {
  const next = ctx.peek();
  if (next.kind !== 'Command') {
    reportMissingName(ctx, token);
    return;
  }
  const target = ctx.readMandatoryArgument();
  if (!target || target.type !== 'Command') {
    reportMissingName(ctx, token);
    return;
  }
  args.push({ kind: 'mandatory', node: target });

  let raw = '';
  let start: Position | undefined;
  for (let part = ctx.peek(); !isParameterEnd(part); part = ctx.peek()) {
    start ??= part.location.start;
    raw += sourceText(ctx.consume());
  }
  if (start) {
    args.push({
      kind: 'parameters',
      node: { type: 'Text', content: raw, location: { start, end: ctx.lastEnd } }
    });
  }

  if (ctx.peek().kind === 'GroupOpen') {
    args.push({ kind: 'mandatory', node: ctx.parseGroup() });
  } else {
    ctx.report(
      DiagnosticCode.MISSING_ARGUMENT,
      'MISSING_ARGUMENT',
      { name: token.value, expected: 2, found: 1 },
      token.location
    );
  }

  const count = raw.match(PARAMETER)?.length ?? 0;
  ctx.symbols.defineCommand(target.name, { optional: 0, mandatory: count });
}

function isParameterEnd(token: Token): boolean {
  return token.kind === 'GroupOpen' || token.kind === 'GroupClose' || token.kind === 'EndOfInput';
}

function sourceText(token: Token): string {
  switch (token.kind) {
    case 'Command':
      return `\\${token.value}`;
    case 'Comment':
      return `%${token.value}`;
    default:
      return token.value;
  }
}

// \let\a\b, \let\a=\b
function readLet(ctx: DefinitionContext, token: Token, args: CommandArgument[]): void {
  const target = ctx.readMandatoryArgument();
  if (!target || target.type !== 'Command') {
    if (target) args.push({ kind: 'mandatory', node: target });
    reportMissingName(ctx, token);
    return;
  }
  args.push({ kind: 'mandatory', node: target });

  const next = ctx.peek();
  const equals = next.kind === 'Text' ? LET_EQUALS.exec(next.value) : null;
  if (equals) {
    const head = ctx.consumeTextPrefix(equals[0].length);
    args.push({ kind: 'parameters', node: { type: 'Text', content: head.value, location: head.location } });
  }

  const source = ctx.readMandatoryArgument();
  if (!source) {
    readBody(ctx, token, args, 2);
    return;
  }
  args.push({ kind: 'mandatory', node: source });

  const arity = source.type === 'Command' ? ctx.symbols.lookupCommand(source.name) : undefined;
  ctx.symbols.defineCommand(target.name, arity ?? ZERO_ARITY);
}

// \DeclareMathOperator{\name}{text}
function readMathOperator(ctx: DefinitionContext, token: Token, args: CommandArgument[]): void {
  args.push(...ctx.readArguments(token.value, { optional: 0, mandatory: 2 }, token));
  const [target] = args;
  const name = target ? macroName(target.node) : undefined;
  if (!name) {
    if (target) reportMissingName(ctx, token);
    return;
  }
  ctx.symbols.defineCommand(name, ZERO_ARITY);
}

// \newenvironment{name}[n][default]{begin code}{end code}
function readNewEnvironment(ctx: DefinitionContext, token: Token, args: CommandArgument[]): void {
  const target = ctx.readMandatoryArgument();
  const name = target ? getTextContent(target).trim() : '';
  if (!target || name === '') {
    if (target) args.push({ kind: 'mandatory', node: target });
    reportMissingName(ctx, token);
    return;
  }
  args.push({ kind: 'mandatory', node: target });

  const arity = readDeclaredArity(ctx, name, args);
  args.push(...ctx.readArguments(token.value, { optional: 0, mandatory: 2 }, token));
  ctx.symbols.defineEnvironment(name, arity);
}
