import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import * as os from 'os';
import { ConfigLoader, toParserOptions, validateConfig } from './loader';
import { TexConfigError } from '@core/errors';
import { configLogger } from '@core/utils/logger';

// Mock fs module
vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn()
}));

import * as fs from 'fs';

describe('Configuration System', () => {
  const globalConfigPath = path.join(os.homedir(), '.config', 'texast.json');
  const projectConfigPath = path.join('/test/project', 'texast.config.json');
  let mockFiles: Record<string, string>;

  beforeEach(() => {
    mockFiles = {};
    vi.mocked(fs.existsSync).mockImplementation(filePath => String(filePath) in mockFiles);
    vi.mocked(fs.readFileSync).mockImplementation(filePath => {
      const key = String(filePath);
      if (key in mockFiles) {
        return mockFiles[key];
      }
      throw new Error(`ENOENT: ${key}`);
    });
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  describe('ConfigLoader', () => {
    it('returns an empty config when no file exists', () => {
      expect(new ConfigLoader('/test/project').load()).toEqual({});
    });

    it('reads the global config', () => {
      mockFiles[globalConfigPath] = JSON.stringify({ parser: { commands: { affil: [1, 1] } } });

      expect(new ConfigLoader('/test/project').load()).toEqual({
        parser: { commands: { affil: { optional: 1, mandatory: 1 } } }
      });
    });

    it('lets project values override global ones', () => {
      mockFiles[globalConfigPath] = JSON.stringify({
        parser: {
          optionalArgumentSpacing: 'lenient',
          commands: { a: [0, 1], b: [0, 1] }
        }
      });
      mockFiles[projectConfigPath] = JSON.stringify({
        parser: {
          commands: { b: { optional: 0, mandatory: 2 } },
          environments: { thm: [1, 0] }
        }
      });

      expect(new ConfigLoader('/test/project').load()).toEqual({
        parser: {
          optionalArgumentSpacing: 'lenient',
          commands: {
            a: { optional: 0, mandatory: 1 },
            b: { optional: 0, mandatory: 2 }
          },
          environments: { thm: { optional: 1, mandatory: 0 } }
        }
      });
    });

    it('caches the loaded config', () => {
      mockFiles[projectConfigPath] = '{}';
      const loader = new ConfigLoader('/test/project');

      loader.load();
      loader.load();

      expect(fs.readFileSync).toHaveBeenCalledTimes(1);
    });

    it('treats malformed JSON as empty and warns', () => {
      const warn = vi.spyOn(configLogger, 'warn');
      mockFiles[projectConfigPath] = '{ parser: ';

      expect(new ConfigLoader('/test/project').load()).toEqual({});
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe(`Failed to load config from ${projectConfigPath}`);
    });

    it('throws on an invalid arity', () => {
      mockFiles[projectConfigPath] = JSON.stringify({ parser: { commands: { bad: [0, 12] } } });

      expect(() => new ConfigLoader('/test/project').load()).toThrow(TexConfigError);
    });
  });

  describe('validateConfig', () => {
    it('names the offending key', () => {
      try {
        validateConfig({ parser: { environments: { proof: 'two' } } }, 'texast.config.json');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TexConfigError);
        if (error instanceof TexConfigError) {
          expect(error.details).toEqual({ key: 'parser.environments.proof' });
          expect(error.filePath).toBe('texast.config.json');
        }
      }
    });

    it('rejects unknown spacing modes', () => {
      expect(() => validateConfig({ parser: { optionalArgumentSpacing: 'loose' } })).toThrow(
        '"parser.optionalArgumentSpacing" must be one of strict, lenient'
      );
    });

    it('rejects non-object configs', () => {
      expect(() => validateConfig([])).toThrow('Configuration must be a JSON object');
      expect(() => validateConfig({ parser: 3 })).toThrow('"parser" must be an object');
    });

    it('ignores unrelated top-level keys', () => {
      expect(validateConfig({ editor: { tabs: 2 } })).toEqual({});
    });
  });

  describe('toParserOptions', () => {
    it('copies the parser section', () => {
      expect(
        toParserOptions({
          parser: {
            optionalArgumentSpacing: 'strict',
            commands: { affil: { optional: 0, mandatory: 1 } }
          }
        })
      ).toEqual({
        optionalArgumentSpacing: 'strict',
        commands: { affil: { optional: 0, mandatory: 1 } }
      });
      expect(toParserOptions({})).toEqual({});
    });
  });
});
