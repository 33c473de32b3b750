import { ZERO_ARITY, type Arity, type ArityRecord } from '@core/types';
import { registryLogger } from '@core/utils/logger';
import builtins from './builtins.json';

const MAX_ARGUMENTS = 9;

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_ARGUMENTS;
}

/**
 * Read an arity from either the `[optional, mandatory]` tuple form or the
 * `{ optional, mandatory }` object form. Returns undefined for anything else.
 */
export function toArity(value: unknown): Arity | undefined {
  if (Array.isArray(value)) {
    const [optional, mandatory] = value;
    if (value.length === 2 && isCount(optional) && isCount(mandatory)) {
      return { optional, mandatory };
    }
    return undefined;
  }

  if (typeof value === 'object' && value !== null && 'optional' in value && 'mandatory' in value) {
    const { optional, mandatory } = value;
    if (isCount(optional) && isCount(mandatory)) {
      return { optional, mandatory };
    }
  }

  return undefined;
}

function loadBuiltins(record: Record<string, unknown>, target: Map<string, Arity>): void {
  for (const [name, value] of Object.entries(record)) {
    const arity = toArity(value);
    if (arity) {
      target.set(name, arity);
    } else {
      registryLogger.warn('Skipping malformed built-in arity', { name });
    }
  }
}

let builtinTable: SymbolTable | undefined;

/**
 * Command and environment arities known to one parse.
 *
 * A table is seeded with the built-in entries, extended by the caller, and
 * mutated by macro definitions met during the parse. Registering a name
 * that already exists replaces the entry.
 */
export class SymbolTable {
  private readonly commands: Map<string, Arity>;
  private readonly environments: Map<string, Arity>;

  private constructor(commands: Map<string, Arity>, environments: Map<string, Arity>) {
    this.commands = commands;
    this.environments = environments;
  }

  /**
   * A table holding only the built-in LaTeX commands and environments
   */
  static withBuiltins(): SymbolTable {
    if (!builtinTable) {
      builtinTable = SymbolTable.empty();
      loadBuiltins(builtins.commands, builtinTable.commands);
      loadBuiltins(builtins.environments, builtinTable.environments);
    }
    return builtinTable.clone();
  }

  static empty(): SymbolTable {
    return new SymbolTable(new Map(), new Map());
  }

  hasCommand(name: string): boolean {
    return this.commands.has(name);
  }

  lookupCommand(name: string): Arity | undefined {
    return this.commands.get(name);
  }

  /**
   * Arity of a command, falling back to zero arguments for unknown names
   */
  commandArity(name: string): Arity {
    return this.commands.get(name) ?? ZERO_ARITY;
  }

  defineCommand(name: string, arity: Arity): void {
    const previous = this.commands.get(name);
    this.commands.set(name, { optional: arity.optional, mandatory: arity.mandatory });
    registryLogger.debug(previous ? 'Redefined command' : 'Defined command', { name, ...arity });
  }

  lookupEnvironment(name: string): Arity | undefined {
    return this.environments.get(name);
  }

  environmentArity(name: string): Arity {
    return this.environments.get(name) ?? ZERO_ARITY;
  }

  defineEnvironment(name: string, arity: Arity): void {
    const previous = this.environments.get(name);
    this.environments.set(name, { optional: arity.optional, mandatory: arity.mandatory });
    registryLogger.debug(previous ? 'Redefined environment' : 'Defined environment', { name, ...arity });
  }

  /**
   * Register every entry of a record; entries that are not valid arities are
   * reported back by name instead of being registered.
   */
  defineCommands(record: ArityRecord): string[] {
    return this.defineAll(record, (name, arity) => this.defineCommand(name, arity));
  }

  defineEnvironments(record: ArityRecord): string[] {
    return this.defineAll(record, (name, arity) => this.defineEnvironment(name, arity));
  }

  /**
   * Independent copy; mutations on either side do not leak into the other
   */
  clone(): SymbolTable {
    return new SymbolTable(new Map(this.commands), new Map(this.environments));
  }

  get commandCount(): number {
    return this.commands.size;
  }

  get environmentCount(): number {
    return this.environments.size;
  }

  private defineAll(record: ArityRecord, define: (name: string, arity: Arity) => void): string[] {
    const rejected: string[] = [];
    for (const [name, value] of Object.entries(record)) {
      const arity = toArity(value);
      if (arity) {
        define(name, arity);
      } else {
        rejected.push(name);
      }
    }
    return rejected;
  }
}
