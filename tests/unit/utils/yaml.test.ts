/**
 * @arch propweave.test.unit
 */
/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema, formatZodError } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const schema = z.object({
  name: z.string(),
  tags: z.array(z.string()).default([]),
});

describe('parseYaml', () => {
  it('should parse valid YAML string', () => {
    expect(parseYaml('name: test\ncount: 2\n')).toEqual({ name: 'test', count: 2 });
  });

  it('should return no value for an empty document', () => {
    expect([null, undefined]).toContain(parseYaml(''));
  });

  it('should throw SystemError on invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('name: test\n', schema)).toEqual({ name: 'test', tags: [] });
  });

  it('should validate an empty document as an empty object', () => {
    const optional = z.object({ name: z.string().default('none') });

    expect(parseYamlWithSchema('', optional)).toEqual({ name: 'none' });
  });

  it('should report validation failures with paths', () => {
    try {
      parseYamlWithSchema('tags: [1]\n', schema);
      expect.fail('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(error.message).toContain('name: Required');
        expect(error.message).toContain('tags.0: Expected string, received number');
      }
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: loaded\n');

    await expect(loadYamlWithSchema('/config.yaml', schema)).resolves.toEqual({ name: 'loaded', tags: [] });
    expect(mockReadFile).toHaveBeenCalledWith('/config.yaml');
  });

  it('should add the file path to system errors', async () => {
    mockReadFile.mockResolvedValue('tags: nope\n');

    await expect(loadYamlWithSchema('/config.yaml', schema)).rejects.toThrow('(file: /config.yaml)');
  });

  it('should wrap read failures as parse errors', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/missing.yaml', schema)).rejects.toMatchObject({
      code: ErrorCodes.PARSE_ERROR,
      message: 'Failed to load YAML file: /missing.yaml',
    });
  });
});

describe('formatZodError', () => {
  it('should join issues with their paths', () => {
    const result = z.object({ a: z.number(), b: z.string() }).safeParse({ a: 'x', b: 1 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe(
        'a: Expected number, received string; b: Expected string, received number'
      );
    }
  });
});
