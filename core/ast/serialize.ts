import type { CommandArgument, MathDelimiter, TexNode } from '@core/types';

const CLOSING_DELIMITER: Record<MathDelimiter, string> = {
  '$': '$',
  '$$': '$$',
  '\\(': '\\)',
  '\\[': '\\]'
};

const LETTER_NAME = /^[A-Za-z]+$/;
const STARTS_WITH_LETTER = /^[A-Za-z]/;

/**
 * Accumulates output, separating a letter-named command from letters that
 * follow it so the name is not extended on re-parse.
 */
class LatexWriter {
  private readonly parts: string[] = [];
  private afterLetterCommand = false;
  private sealed = false;

  text(value: string): void {
    if (value === '') return;
    if (this.afterLetterCommand && STARTS_WITH_LETTER.test(value)) {
      this.parts.push(' ');
    }
    this.parts.push(value);
    this.afterLetterCommand = false;
  }

  command(name: string, starred = false): void {
    this.text(`\\${name}`);
    if (starred) {
      this.text('*');
      return;
    }
    this.afterLetterCommand = LETTER_NAME.test(name);
  }

  /**
   * Closing delimiter of a scope. Nothing is closed once the output ends in
   * a lone backslash: the lexer only yields one at the end of the source, so
   * every scope still open there was left unterminated.
   */
  close(value: string): void {
    if (!this.sealed) {
      this.text(value);
    }
  }

  seal(): void {
    this.sealed = true;
  }

  toString(): string {
    return this.parts.join('');
  }
}

/**
 * Turn a tree back into LaTeX source.
 *
 * Whitespace the lexer kept as Text is written back unchanged; whitespace
 * skipped before a mandatory argument is not, so output may differ from the
 * original source while parsing to the same structure.
 */
export function serialize(node: TexNode): string {
  const writer = new LatexWriter();
  write(node, writer);
  return writer.toString();
}

function write(node: TexNode, out: LatexWriter): void {
  switch (node.type) {
    case 'Document':
      writeAll(node.children, out);
      break;
    case 'Text':
      if (node.escaped) {
        out.command(node.content);
      } else {
        out.text(node.content);
        if (node.content === '\\') out.seal();
      }
      break;
    case 'SpecialChar':
      out.text(node.char);
      break;
    case 'Comment':
      out.text(`%${node.content}`);
      break;
    case 'Group':
      out.text(node.optional ? '[' : '{');
      writeAll(node.children, out);
      out.close(node.optional ? ']' : '}');
      break;
    case 'Math':
      out.text(node.delimiter);
      writeAll(node.children, out);
      out.close(CLOSING_DELIMITER[node.delimiter]);
      break;
    case 'Command':
      out.command(node.name, node.starred);
      writeArguments(node.args, out);
      break;
    case 'Environment':
      out.text(`\\begin{${node.name}}`);
      writeArguments(node.args, out);
      writeAll(node.children, out);
      out.close(`\\end{${node.name}}`);
      break;
  }
}

function writeAll(nodes: TexNode[], out: LatexWriter): void {
  for (const node of nodes) {
    write(node, out);
  }
}

function writeArguments(args: CommandArgument[], out: LatexWriter): void {
  for (const arg of args) {
    write(arg.node, out);
  }
}
