/**
 * @arch propweave.test.unit
 * @intent:cli-output
 */
/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { createCheckCommand } from '../../../../src/cli/commands/check.js';
import type { Workspace } from '../../../../src/cli/workspace.js';
import { PropertyRegistryBuilder } from '../../../../src/core/builder/builder.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import type { HostType } from '../../../../src/core/host/types.js';
import { TypeTokens } from '../../../../src/core/tokens/token.js';
import { ErrorCodes, HostModelError } from '../../../../src/utils/errors.js';
import { FakeHostModel } from '../../../support/fake-model.js';

let mockWorkspace: Workspace | undefined;

vi.mock('../../../../src/cli/workspace.js', () => ({
  openWorkspace: vi.fn(async () => {
    if (!mockWorkspace) {
      throw new Error('No workspace configured');
    }
    return mockWorkspace;
  }),
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

import { openWorkspace } from '../../../../src/cli/workspace.js';
import { logger } from '../../../../src/utils/logger.js';

function workspaceOf(model: FakeHostModel, types: HostType[]): Workspace {
  return {
    config: getDefaultConfig(),
    builder: PropertyRegistryBuilder.create(model),
    getType: (name) => {
      const type = types.find((candidate) => candidate.name === name);
      if (!type) {
        throw new HostModelError(ErrorCodes.TYPE_NOT_FOUND, `No class or interface named '${name}' in the project`);
      }
      return type;
    },
    listTypes: () => types,
  };
}

describe('check command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let model: FakeHostModel;
  let counter: HostType;
  let sample: HostType;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    model = new FakeHostModel();
    counter = model.defineClass('Counter');
    model.addBean(counter, 'count', TypeTokens.int);

    const base = model.defineClass('Base');
    const inherited = model.addMethod(base, { name: 'getName', returns: TypeTokens.string });
    sample = model.defineClass('Sample');
    model.inherit(sample, inherited);
    model.addMethod(sample, { name: 'getName', returns: TypeTokens.string });

    mockWorkspace = workspaceOf(model, [counter, sample]);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  function printed(): string {
    return consoleLogSpy.mock.calls.map((call: unknown[]) => String(call[0])).join('\n');
  }

  describe('createCheckCommand', () => {
    it('should create a command with correct name', () => {
      expect(createCheckCommand().name()).toBe('check');
    });

    it('should have an optional variadic types argument', () => {
      const args = createCheckCommand().registeredArguments;

      expect(args.length).toBe(1);
      expect(args[0].name()).toBe('types');
      expect(args[0].required).toBe(false);
      expect(args[0].variadic).toBe(true);
    });

    it('should have all options', () => {
      const optionNames = createCheckCommand().options.map((opt) => opt.long);

      expect(optionNames).toEqual(['--config', '--project', '--files', '--json']);
    });

    it('should default the config path', () => {
      const configOption = createCheckCommand().options.find((opt) => opt.long === '--config');

      expect(configOption?.defaultValue).toBe('propweave.config.yaml');
    });
  });

  describe('command execution', () => {
    it('should pass command options to the workspace', async () => {
      await createCheckCommand().parseAsync(['node', 'check', 'Counter', '--project', 'tsconfig.json']);

      expect(openWorkspace).toHaveBeenCalledWith(
        expect.objectContaining({ config: 'propweave.config.yaml', project: 'tsconfig.json' })
      );
    });

    it('should report passing types without exiting', async () => {
      await createCheckCommand().parseAsync(['node', 'check', 'Counter']);

      expect(printed()).toContain('Counter (1 properties)');
      expect(printed()).toContain('Checked 1 types: 1 passed, 0 failed');
      expect(processExitSpy).not.toHaveBeenCalled();
    });

    it('should report every problem and exit with 1', async () => {
      await expect(createCheckCommand().parseAsync(['node', 'check', 'Sample'])).rejects.toThrow(
        'process.exit called'
      );

      expect(printed()).toContain('    name: Duplicate getter on Sample: Base.getName() and Sample.getName()');
      expect(printed()).toContain('Checked 1 types: 0 passed, 1 failed');
      expect(processExitSpy).toHaveBeenCalledWith(1);
    });

    it('should check every listed type when none are named', async () => {
      await expect(createCheckCommand().parseAsync(['node', 'check', '--json'])).rejects.toThrow(
        'process.exit called'
      );

      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toEqual({
        results: [
          { type: 'Counter', status: 'pass', properties: 1 },
          {
            type: 'Sample',
            status: 'fail',
            problems: { name: ['Duplicate getter on Sample: Base.getName() and Sample.getName()'] },
          },
        ],
        summary: { total: 2, passed: 1, failed: 1 },
      });
    });

    it('should log unknown types and exit with 1', async () => {
      await expect(createCheckCommand().parseAsync(['node', 'check', 'Missing'])).rejects.toThrow(
        'process.exit called'
      );

      expect(logger.error).toHaveBeenCalledWith("No class or interface named 'Missing' in the project");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });
});
