import chalk from 'chalk';
import { ErrorSeverity, type Diagnostic } from '@core/errors';
import { formatLocationForError } from './locationFormatter';

export interface DiagnosticDisplayOptions {
  /** Source text the diagnostic points into; no excerpt without it */
  source?: string;
  filePath?: string;
  /** Lines shown above and below the offending line (default 1) */
  contextLines?: number;
  useColors?: boolean;
}

type Paint = (text: string) => string;

const plain: Paint = text => text;

function painter(useColors: boolean, paint: Paint): Paint {
  return useColors ? paint : plain;
}

/**
 * Render a diagnostic as a header, its location and, when the source is
 * given, an excerpt with a caret under the offending span:
 *
 *     error[UNTERMINATED_GROUP]: Group opened here is never closed
 *       --> line 1, column 1
 *       1 | {unterminated
 *         | ^
 */
export function formatDiagnostic(diagnostic: Diagnostic, options: DiagnosticDisplayOptions = {}): string {
  const { source, filePath, contextLines = 1, useColors = true } = options;
  const isWarning = diagnostic.severity === ErrorSeverity.Warning;
  const label = isWarning ? 'warning' : 'error';

  const header = painter(useColors, isWarning ? chalk.yellow.bold : chalk.red.bold)(
    `${label}[${diagnostic.code}]: ${diagnostic.message}`
  );
  const where = painter(useColors, chalk.blue)(`  --> ${formatLocationForError(diagnostic.location, filePath)}`);

  const parts = [header, where];
  if (source !== undefined) {
    parts.push(...formatExcerpt(diagnostic, source, contextLines, useColors));
  }
  return parts.join('\n');
}

function formatExcerpt(diagnostic: Diagnostic, source: string, contextLines: number, useColors: boolean): string[] {
  const lines = source.split('\n');
  const { start, end } = diagnostic.location;
  const index = start.line - 1;
  if (index < 0 || index >= lines.length) {
    return [];
  }

  const first = Math.max(0, index - contextLines);
  const last = Math.min(lines.length - 1, index + contextLines);
  const width = String(last + 1).length;
  const dim = painter(useColors, chalk.gray);
  const red = painter(useColors, chalk.red);

  const result: string[] = [];
  for (let i = first; i <= last; i++) {
    const gutter = `  ${String(i + 1).padStart(width)} | `;
    if (i !== index) {
      result.push(dim(`${gutter}${lines[i]}`));
      continue;
    }

    const content = lines[i];
    result.push(`${gutter}${content}`);
    const span =
      end.line === start.line ? end.column - start.column : content.length - start.column + 1;
    const caret = '^'.repeat(Math.max(1, span));
    result.push(`  ${' '.repeat(width)} | ${' '.repeat(start.column - 1)}${red(caret)}`);
  }
  return result;
}

/**
 * "2 errors, 1 warning"; empty string when there is nothing to report
 */
export function summarizeDiagnostics(diagnostics: readonly Diagnostic[]): string {
  const warnings = diagnostics.filter(d => d.severity === ErrorSeverity.Warning).length;
  const errors = diagnostics.length - warnings;
  const parts: string[] = [];
  if (errors > 0) parts.push(`${errors} error${errors === 1 ? '' : 's'}`);
  if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
  return parts.join(', ');
}
