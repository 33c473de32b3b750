import { cliLogger as logger } from '@core/utils/logger';

export type OutputFormat = 'json' | 'tree' | 'latex';

export interface CLIOptions {
  input: string;
  format: OutputFormat;
  /** Accept whitespace before an optional argument's `[` */
  lenient?: boolean;
  /** Exit with status 1 when any error-severity diagnostic is produced */
  strict?: boolean;
  /** Directory holding texast.config.json (default: the input's directory) */
  config?: string;
  debug?: boolean;
  noColor?: boolean;
  help?: boolean;
}

export class ArgumentParser {
  parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      input: '',
      format: 'tree'
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      switch (arg) {
        case '--format':
        case '-f':
          options.format = this.normalizeFormat(this.valueFor(arg, args[++i]));
          break;
        case '--lenient':
          options.lenient = true;
          break;
        case '--strict':
          options.strict = true;
          break;
        case '--config':
        case '-c':
          options.config = this.valueFor(arg, args[++i]);
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--no-color':
          options.noColor = true;
          break;
        case '--help':
        case '-h':
          options.help = true;
          break;
        default:
          if (!arg.startsWith('-') && !options.input) {
            options.input = arg;
          } else {
            throw new Error(`Unknown option: ${arg}`);
          }
      }
    }

    this.validateOptions(options);
    return options;
  }

  validateOptions(options: CLIOptions): void {
    // Help can be used without an input file
    if (!options.input && !options.help) {
      throw new Error('No input file specified');
    }
  }

  normalizeFormat(format: string): OutputFormat {
    switch (format.toLowerCase()) {
      case 'json':
        return 'json';
      case 'tree':
        return 'tree';
      case 'latex':
      case 'tex':
        return 'latex';
      default:
        logger.warn(`Unknown format '${format}', defaulting to tree`);
        return 'tree';
    }
  }

  private valueFor(flag: string, value: string | undefined): string {
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  }
}
