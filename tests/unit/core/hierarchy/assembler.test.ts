/**
 * @arch propweave.test.unit
 */
/**
 * Tests for post-order registry assembly.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { assembleRegistries, registrySupertypes } from '../../../../src/core/hierarchy/assembler.js';
import { walkHierarchy } from '../../../../src/core/hierarchy/walker.js';
import { ProblemCollector } from '../../../../src/core/collector/problems.js';
import { DEFAULT_CONVENTIONS } from '../../../../src/core/conventions/options.js';
import type { CollectedType } from '../../../../src/core/collector/types.js';
import type { HostType } from '../../../../src/core/host/types.js';
import { EMPTY_CACHE } from '../../../../src/core/registry/cache.js';
import { TypeTokens } from '../../../../src/core/tokens/token.js';
import { ErrorCodes, SystemError } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';
import { FakeHostModel } from '../../../support/fake-model.js';

describe('registrySupertypes', () => {
  it('should list the superclass first and drop excluded types and the root', () => {
    const model = new FakeHostModel();
    const external = model.defineInterface('External', { excluded: true });
    const named = model.defineInterface('Named');
    const base = model.defineClass('Base', { extends: model.rootType });
    const root = model.defineClass('Root', { extends: base, implements: [external, named] });

    expect(registrySupertypes(model, root).map((type) => type.name)).toEqual(['Base', 'Named']);
    expect(registrySupertypes(model, base)).toEqual([]);
  });
});

describe('assembleRegistries', () => {
  let model: FakeHostModel;

  const assemble = (root: HostType) => {
    const collected = walkHierarchy(root, {
      model,
      conventions: DEFAULT_CONVENTIONS,
      cache: EMPTY_CACHE,
      problems: new ProblemCollector(),
    });
    return assembleRegistries(root, { model, collected, cache: EMPTY_CACHE });
  };

  beforeEach(() => {
    logger.setLevel('silent');
    model = new FakeHostModel();
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  it('should build one registry per collected type', () => {
    const named = model.defineInterface('Named');
    const root = model.defineClass('Person', { implements: [named] });
    model.addMethod(named, { name: 'getName', returns: TypeTokens.string, abstract: true });
    model.addBean(root, 'age', TypeTokens.int);

    const built = assemble(root);
    const person = built.get('Person');

    expect([...built.keys()]).toEqual(['Named', 'Person']);
    expect(person?.names).toEqual(['age', 'name']);
    expect(person?.localNames).toEqual(['age']);
    expect(person?.findProperty('name')?.declaringType).toBe(named);
  });

  it('should keep the local descriptor over an inherited one', () => {
    const animal = model.defineClass('Animal');
    const dog = model.defineClass('Dog', { extends: animal });
    model.addMethod(animal, { name: 'getSound', returns: TypeTokens.string });
    model.addMethod(dog, { name: 'getSound', returns: TypeTokens.string });

    const registry = assemble(dog).get('Dog');

    expect(registry?.findProperty('sound')?.declaringType).toBe(dog);
    expect(registry?.findProperty('sound')?.getter?.declaringType).toBe(dog);
  });

  it('should union ignored names across every supertype', () => {
    const account = model.defineClass('Account');
    const audited = model.defineInterface('Audited');
    const savings = model.defineClass('Savings', { extends: account, implements: [audited] });
    model.addField(account, 'secret', TypeTokens.string, ['ignoreProperty']);
    model.addMethod(audited, { name: 'getSecret', returns: TypeTokens.string, abstract: true });
    model.addMethod(savings, { name: 'getSecret', returns: TypeTokens.string });

    const built = assemble(savings);

    expect(built.get('Audited')?.has('secret')).toBe(true);
    expect(built.get('Savings')?.has('secret')).toBe(false);
    expect([...(built.get('Savings')?.ignoredNames ?? [])]).toEqual(['secret']);
  });

  it('should fail when a supertype was never collected', () => {
    const base = model.defineClass('Base');
    const root = model.defineClass('Root', { extends: base });
    const rootOnly = new Map<string, CollectedType>([
      ['Root', { type: root, properties: new Map(), ignoredNames: new Set() }],
    ]);

    try {
      assembleRegistries(root, { model, collected: rootOnly, cache: EMPTY_CACHE });
      expect.fail('expected an engine state error');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.ENGINE_STATE);
        expect(error.message).toBe('No collected members for Base while assembling Root');
      }
    }
  });
});
