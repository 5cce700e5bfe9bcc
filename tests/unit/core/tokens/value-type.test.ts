/**
 * @arch propweave.test.unit
 */
/**
 * Tests for expected value types.
 */
import { describe, it, expect } from 'vitest';
import { Types } from '../../../../src/core/tokens/value-type.js';
import { TypeTokens } from '../../../../src/core/tokens/token.js';

class Animal {}
class Dog extends Animal {}

describe('Types', () => {
  it('should pair primitives with their tokens', () => {
    expect(Types.int.token).toEqual(TypeTokens.int);
    expect(Types.int.accepts(2)).toBe(true);
    expect(Types.int.accepts(2.5)).toBe(false);
    expect(Types.int.accepts(2 ** 31)).toBe(false);
    expect(Types.long.accepts(2n)).toBe(true);
    expect(Types.string.accepts('x')).toBe(true);
    expect(Types.boolean.accepts(0)).toBe(false);
    expect(Types.unknown.accepts(undefined)).toBe(true);
  });

  it('should check collection elements', () => {
    const names = Types.listOf(Types.string);

    expect(names.token).toEqual(TypeTokens.list(TypeTokens.string));
    expect(names.accepts(['a', 'b'])).toBe(true);
    expect(names.accepts(['a', 1])).toBe(false);
    expect(Types.setOf(Types.int).accepts(new Set([1, 2]))).toBe(true);
    expect(Types.setOf(Types.int).accepts([1, 2])).toBe(false);
  });

  it('should check map keys and values', () => {
    const scores = Types.mapOf(Types.string, Types.int);

    expect(scores.token).toEqual(TypeTokens.map(TypeTokens.string, TypeTokens.int));
    expect(scores.accepts(new Map([['a', 1]]))).toBe(true);
    expect(scores.accepts(new Map([[1, 1]]))).toBe(false);
  });

  it('should name instance types after their constructor', () => {
    const animals = Types.instanceOf(Animal);

    expect(animals.token).toEqual(TypeTokens.object('Animal'));
    expect(animals.accepts(new Dog())).toBe(true);
    expect(animals.accepts({})).toBe(false);
  });

  it('should use the given guard for named objects', () => {
    const named = Types.object('Named', (v): v is { name: string } =>
      typeof v === 'object' && v !== null && 'name' in v && typeof v.name === 'string'
    );

    expect(named.token).toEqual(TypeTokens.object('Named'));
    expect(named.accepts({ name: 'x' })).toBe(true);
    expect(named.accepts({})).toBe(false);
  });
});
