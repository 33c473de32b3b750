import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { Arity } from '@core/types';
import { TexConfigError } from '@core/errors';
import { toArity } from '@core/registry';
import type { ParserOptions } from '@core/parser/types';
import { configLogger as logger } from '@core/utils/logger';
import type { ParserConfig, TexastConfig } from './types';

export const GLOBAL_CONFIG_FILE = 'texast.json';
export const PROJECT_CONFIG_FILE = 'texast.config.json';

const SPACING_MODES = ['strict', 'lenient'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSpacingMode(value: unknown): value is (typeof SPACING_MODES)[number] {
  return SPACING_MODES.some(mode => mode === value);
}

/**
 * Load texast configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: TexastConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/texast.json
    this.globalConfigPath = path.join(os.homedir(), '.config', GLOBAL_CONFIG_FILE);

    // Project config location: <project>/texast.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
  }

  /**
   * Load and merge configurations (project overrides global)
   * @throws TexConfigError when a file holds an invalid value
   */
  load(): TexastConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Load a single config file. A missing or unreadable file counts as empty.
   */
  private loadConfigFile(filePath: string): TexastConfig {
    let raw: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      logger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }

    logger.debug('Loaded config file', { filePath });
    return validateConfig(raw, filePath);
  }
}

/**
 * Check a parsed JSON value against the config shape, normalising arity
 * tuples to objects.
 */
export function validateConfig(raw: unknown, filePath?: string): TexastConfig {
  if (!isRecord(raw)) {
    throw new TexConfigError('Configuration must be a JSON object', { filePath });
  }
  if (raw.parser === undefined) {
    return {};
  }
  if (!isRecord(raw.parser)) {
    throw new TexConfigError('"parser" must be an object', { filePath, key: 'parser' });
  }

  const { optionalArgumentSpacing, commands, environments } = raw.parser;
  const parser: ParserConfig = {};

  if (optionalArgumentSpacing !== undefined) {
    if (!isSpacingMode(optionalArgumentSpacing)) {
      throw new TexConfigError(
        `"parser.optionalArgumentSpacing" must be one of ${SPACING_MODES.join(', ')}`,
        { filePath, key: 'parser.optionalArgumentSpacing' }
      );
    }
    parser.optionalArgumentSpacing = optionalArgumentSpacing;
  }
  if (commands !== undefined) {
    parser.commands = validateArities(commands, 'parser.commands', filePath);
  }
  if (environments !== undefined) {
    parser.environments = validateArities(environments, 'parser.environments', filePath);
  }

  return { parser };
}

function validateArities(value: unknown, key: string, filePath?: string): Record<string, Arity> {
  if (!isRecord(value)) {
    throw new TexConfigError(`"${key}" must be an object`, { filePath, key });
  }

  const result: Record<string, Arity> = {};
  for (const [name, entry] of Object.entries(value)) {
    const arity = toArity(entry);
    if (!arity) {
      throw new TexConfigError(
        `"${key}.${name}" must be [optional, mandatory] with counts from 0 to 9`,
        { filePath, key: `${key}.${name}` }
      );
    }
    result[name] = arity;
  }
  return result;
}

function mergeConfigs(global: TexastConfig, project: TexastConfig): TexastConfig {
  if (!global.parser && !project.parser) {
    return {};
  }

  const merged: ParserConfig = {};
  const spacing = project.parser?.optionalArgumentSpacing ?? global.parser?.optionalArgumentSpacing;
  if (spacing) {
    merged.optionalArgumentSpacing = spacing;
  }
  if (global.parser?.commands || project.parser?.commands) {
    merged.commands = { ...global.parser?.commands, ...project.parser?.commands };
  }
  if (global.parser?.environments || project.parser?.environments) {
    merged.environments = { ...global.parser?.environments, ...project.parser?.environments };
  }
  return { parser: merged };
}

/**
 * Parser options described by a loaded configuration
 */
export function toParserOptions(config: TexastConfig): ParserOptions {
  const options: ParserOptions = {};
  if (config.parser?.optionalArgumentSpacing) {
    options.optionalArgumentSpacing = config.parser.optionalArgumentSpacing;
  }
  if (config.parser?.commands) {
    options.commands = config.parser.commands;
  }
  if (config.parser?.environments) {
    options.environments = config.parser.environments;
  }
  return options;
}
