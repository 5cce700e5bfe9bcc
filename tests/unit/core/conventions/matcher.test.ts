/**
 * @arch propweave.test.unit
 */
/**
 * Tests for naming-convention matching.
 */
import { describe, it, expect } from 'vitest';
import {
  matchPrefix,
  matchSuffix,
  removePrefix,
  removeSuffix,
  deriveName,
  matchName,
} from '../../../../src/core/conventions/matcher.js';
import { ConventionViolationError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('matchPrefix', () => {
  it('should return the first matching prefix', () => {
    expect(matchPrefix('isActive', ['get', 'is'])).toBe('is');
    expect(matchPrefix('getName', ['get', 'g'])).toBe('get');
  });

  it('should require the name to be longer than the prefix', () => {
    expect(matchPrefix('get', ['get'])).toBeUndefined();
  });

  it('should match any non-empty name with the empty prefix', () => {
    expect(matchPrefix('name', [''])).toBe('');
    expect(matchPrefix('', [''])).toBeUndefined();
  });
});

describe('matchSuffix', () => {
  it('should match names ending with the suffix', () => {
    expect(matchSuffix('nameProperty', ['Property'])).toBe('Property');
    expect(matchSuffix('Property', ['Property'])).toBeUndefined();
    expect(matchSuffix('nameValue', ['Property'])).toBeUndefined();
  });
});

describe('removePrefix', () => {
  it('should lower-case the first remaining letter', () => {
    expect(removePrefix('getFirstName', 'get')).toBe('firstName');
    expect(removePrefix('m_count', 'm_')).toBe('count');
  });

  it('should keep the name for the empty prefix', () => {
    expect(removePrefix('Name', '')).toBe('Name');
  });
});

describe('removeSuffix', () => {
  it('should cut the suffix and keep case', () => {
    expect(removeSuffix('firstNameProperty', 'Property')).toBe('firstName');
    expect(removeSuffix('name', '')).toBe('name');
  });
});

describe('deriveName', () => {
  it('should throw when nothing is left', () => {
    try {
      deriveName('Property', 'Property', 'suffix');
      expect.fail('expected a convention violation');
    } catch (error) {
      expect(error).toBeInstanceOf(ConventionViolationError);
      if (error instanceof ConventionViolationError) {
        expect(error.code).toBe(ErrorCodes.CONVENTION_VIOLATION);
        expect(error.message).toBe("Removing suffix 'Property' from 'Property' leaves an empty property name");
      }
    }
  });
});

describe('matchName', () => {
  it('should derive property names', () => {
    expect(matchName('getCount', ['get', 'is'], 'prefix')).toBe('count');
    expect(matchName('countProperty', ['Property'], 'suffix')).toBe('count');
  });

  it('should return undefined when no affix matches', () => {
    expect(matchName('count', ['get'], 'prefix')).toBeUndefined();
  });
});
