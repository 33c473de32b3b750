import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { parseLatex } from '@core/parser';
import { formatTree, serialize } from '@core/ast';
import { ConfigLoader, toParserOptions } from '@core/config/loader';
import type { TexastConfig } from '@core/config/types';
import { ErrorSeverity, TexError, TexFileNotFoundError, type Diagnostic } from '@core/errors';
import { formatDiagnostic, summarizeDiagnostics } from '@core/utils/diagnosticFormatter';
import { cliLogger as logger, loggerFactory } from '@core/utils/logger';
import type { DocumentNode } from '@core/types';
import { ArgumentParser, type CLIOptions } from './parsers/ArgumentParser';

export type { CLIOptions, OutputFormat } from './parsers/ArgumentParser';

/**
 * Side effects of a CLI run, replaceable in tests
 */
export interface CLIDependencies {
  readFile(filePath: string): Promise<string>;
  loadConfig(projectPath: string): TexastConfig;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const defaultDependencies: CLIDependencies = {
  readFile: filePath => fs.readFile(filePath, 'utf8'),
  loadConfig: projectPath => new ConfigLoader(projectPath).load(),
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  }
};

export const USAGE = `Usage: texast <file> [options]

Options:
  -f, --format <json|tree|latex>  Output format (default: tree)
      --lenient                   Allow whitespace before optional arguments
      --strict                    Exit with status 1 on any error diagnostic
  -c, --config <dir>              Directory containing texast.config.json
  -d, --debug                     Log parser activity to stderr
      --no-color                  Plain diagnostic output
  -h, --help                      Show this help
`;

function render(ast: DocumentNode, options: CLIOptions): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify(ast, null, 2);
    case 'latex':
      return serialize(ast);
    case 'tree':
      return formatTree(ast);
  }
}

async function readSource(filePath: string, deps: CLIDependencies): Promise<string> {
  try {
    return await deps.readFile(filePath);
  } catch (error) {
    throw new TexFileNotFoundError(filePath, error);
  }
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(args: string[], deps: CLIDependencies = defaultDependencies): Promise<number> {
  let options: CLIOptions;
  try {
    options = new ArgumentParser().parseArgs(args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.stderr(`${chalk.red(message)}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    deps.stdout(USAGE);
    return 0;
  }

  if (options.debug) {
    loggerFactory.setLevel('debug');
  }

  const useColors = !options.noColor;
  const filePath = path.resolve(options.input);

  let source: string;
  let config: TexastConfig;
  try {
    source = await readSource(filePath, deps);
    config = deps.loadConfig(options.config ?? path.dirname(filePath));
  } catch (error) {
    if (error instanceof TexError) {
      deps.stderr(`${useColors ? chalk.red(error.toString()) : error.toString()}\n`);
      return 1;
    }
    throw error;
  }

  const parserOptions = toParserOptions(config);
  if (options.lenient) {
    parserOptions.optionalArgumentSpacing = 'lenient';
  }

  logger.debug('Parsing file', { filePath, format: options.format });
  const { ast, diagnostics } = parseLatex(source, parserOptions);

  deps.stdout(`${render(ast, options)}\n`);
  reportDiagnostics(diagnostics, source, options.input, useColors, deps);

  const failed = diagnostics.some(diagnostic => diagnostic.severity === ErrorSeverity.Error);
  return options.strict && failed ? 1 : 0;
}

function reportDiagnostics(
  diagnostics: Diagnostic[],
  source: string,
  filePath: string,
  useColors: boolean,
  deps: CLIDependencies
): void {
  if (diagnostics.length === 0) {
    return;
  }
  for (const diagnostic of diagnostics) {
    deps.stderr(`${formatDiagnostic(diagnostic, { source, filePath, useColors })}\n\n`);
  }
  deps.stderr(`${summarizeDiagnostics(diagnostics)}\n`);
}
