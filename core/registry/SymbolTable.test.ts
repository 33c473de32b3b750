import { describe, it, expect } from 'vitest';
import { ZERO_ARITY } from '@core/types';
import { SymbolTable, toArity } from './SymbolTable';

describe('toArity', () => {
  it('accepts the tuple and object forms', () => {
    expect(toArity([1, 2])).toEqual({ optional: 1, mandatory: 2 });
    expect(toArity({ optional: 0, mandatory: 3 })).toEqual({ optional: 0, mandatory: 3 });
  });

  it('rejects counts outside 0 to 9 and other shapes', () => {
    expect(toArity([1, -1])).toBeUndefined();
    expect(toArity([0, 10])).toBeUndefined();
    expect(toArity([0.5, 1])).toBeUndefined();
    expect(toArity([1])).toBeUndefined();
    expect(toArity([0, 1, 2])).toBeUndefined();
    expect(toArity('1')).toBeUndefined();
    expect(toArity(null)).toBeUndefined();
    expect(toArity({ optional: 1 })).toBeUndefined();
  });
});

describe('SymbolTable', () => {
  it('is seeded with the built-in commands and environments', () => {
    const table = SymbolTable.withBuiltins();

    expect(table.lookupCommand('textbf')).toEqual({ optional: 0, mandatory: 1 });
    expect(table.lookupCommand('section')).toEqual({ optional: 1, mandatory: 1 });
    expect(table.lookupCommand('frac')).toEqual({ optional: 0, mandatory: 2 });
    expect(table.lookupEnvironment('tabular')).toEqual({ optional: 1, mandatory: 1 });
    expect(table.commandCount).toBeGreaterThan(50);
  });

  it('treats unknown names as zero-arity', () => {
    const table = SymbolTable.withBuiltins();

    expect(table.hasCommand('mystery')).toBe(false);
    expect(table.lookupCommand('mystery')).toBeUndefined();
    expect(table.commandArity('mystery')).toEqual(ZERO_ARITY);
    expect(table.environmentArity('mystery')).toEqual(ZERO_ARITY);
  });

  it('replaces an entry on redefinition', () => {
    const table = SymbolTable.withBuiltins();
    table.defineCommand('textbf', { optional: 1, mandatory: 2 });

    expect(table.commandArity('textbf')).toEqual({ optional: 1, mandatory: 2 });
  });

  it('hands out independent tables', () => {
    const first = SymbolTable.withBuiltins();
    first.defineCommand('mine', { optional: 0, mandatory: 1 });
    const second = SymbolTable.withBuiltins();

    expect(first.hasCommand('mine')).toBe(true);
    expect(second.hasCommand('mine')).toBe(false);
  });

  it('clones without sharing entries', () => {
    const original = SymbolTable.empty();
    original.defineEnvironment('box', { optional: 0, mandatory: 1 });
    const copy = original.clone();
    copy.defineEnvironment('frame', { optional: 0, mandatory: 0 });

    expect(copy.lookupEnvironment('box')).toEqual({ optional: 0, mandatory: 1 });
    expect(original.lookupEnvironment('frame')).toBeUndefined();
    expect(original.environmentCount).toBe(1);
    expect(copy.environmentCount).toBe(2);
  });

  it('registers a record and reports the entries it rejected', () => {
    const table = SymbolTable.empty();
    const rejected = table.defineCommands({
      affil: [1, 1],
      email: { optional: 0, mandatory: 1 },
      broken: [0, 12]
    });

    expect(rejected).toEqual(['broken']);
    expect(table.commandArity('affil')).toEqual({ optional: 1, mandatory: 1 });
    expect(table.commandArity('email')).toEqual({ optional: 0, mandatory: 1 });
    expect(table.hasCommand('broken')).toBe(false);
  });
});
