/**
 * @arch propweave.test.unit
 * @intent:cli-output
 */
/**
 * Tests for the human formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { PropertyRegistry } from '../../../../src/core/registry/property-registry.js';
import { buildAccountRegistries } from '../../../support/registries.js';

describe('HumanFormatter', () => {
  describe('formatRegistry', () => {
    it('should list properties with kind, access and value type', () => {
      const { account } = buildAccountRegistries();
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatRegistry(account)).toBe(
        [
          'Account (2 properties, 2 local)',
          '  balance  long    rw  long',
          '  owner    object  rw  string',
          '  ignored: secret',
        ].join('\n')
      );
    });

    it('should mark inherited properties with their declaring type', () => {
      const { premium } = buildAccountRegistries();
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatRegistry(premium)).toBe(
        [
          'Premium (3 properties, 1 local)',
          '  balance  long    rw  long  (from Account)',
          '  level    int     r-  int',
          '  owner    object  rw  string  (from Account)',
          '  ignored: secret',
        ].join('\n')
      );
    });

    it('should list only local properties when asked', () => {
      const { premium } = buildAccountRegistries();
      const formatter = new HumanFormatter({ colors: false, localOnly: true });

      expect(formatter.formatRegistry(premium)).toBe(
        ['Premium (3 properties, 1 local)', '  level  int     r-  int', '  ignored: secret'].join('\n')
      );
    });

    it('should say so when there are no properties', () => {
      const registry = new PropertyRegistry({ id: 'Empty', name: 'Empty', isInterface: false }, [], [], []);
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatRegistry(registry)).toBe('Empty (0 properties, 0 local)\n  (no properties)');
    });
  });

  describe('formatCheck', () => {
    it('should list each type and every problem message', () => {
      const formatter = new HumanFormatter({ colors: false });

      const output = formatter.formatCheck([
        { type: 'Account', status: 'pass', properties: 2 },
        { type: 'Clash', status: 'fail', problems: { code: ['first problem', 'second problem'] } },
      ]);

      expect(output).toBe(
        [
          '✓ Account (2 properties)',
          '✗ Clash',
          '    code: first problem',
          '    code: second problem',
          '',
          'Checked 2 types: 1 passed, 1 failed',
        ].join('\n')
      );
    });

    it('should summarise an empty run', () => {
      const formatter = new HumanFormatter({ colors: false });

      expect(formatter.formatCheck([])).toBe('\nChecked 0 types: 0 passed, 0 failed');
    });
  });
});
