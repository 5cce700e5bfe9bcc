/**
 * @arch propweave.cli.formatter
 */
import chalk from 'chalk';
import type { PropertyRegistry } from '../../core/registry/property-registry.js';
import type { PropertyDescriptor } from '../../core/descriptors/types.js';
import { describeToken } from '../../core/tokens/token.js';
import type { CheckResult, FormatOptions, IRegistryFormatter } from './types.js';

type Color = 'red' | 'green' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IRegistryFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      localOnly: options.localOnly ?? false,
    };
  }

  formatRegistry(registry: PropertyRegistry): string {
    const properties = this.options.localOnly ? registry.localProperties : registry.properties;
    const lines = [
      `${this.colorize(registry.type.name, 'bold')} (${registry.size} properties, ${registry.localNames.length} local)`,
    ];

    const nameWidth = Math.max(0, ...properties.map((property) => property.name.length));
    for (const property of properties) {
      lines.push(this.formatProperty(property, nameWidth, registry.isLocal(property.name)));
    }
    if (properties.length === 0) {
      lines.push(`  ${this.colorize('(no properties)', 'dim')}`);
    }

    const ignored = [...registry.ignoredNames].sort();
    if (ignored.length > 0) {
      lines.push(`  ${this.colorize(`ignored: ${ignored.join(', ')}`, 'dim')}`);
    }
    return lines.join('\n');
  }

  formatCheck(results: readonly CheckResult[]): string {
    const lines: string[] = [];
    for (const result of results) {
      if (result.status === 'pass') {
        lines.push(`${this.colorize('✓', 'green')} ${result.type} (${result.properties ?? 0} properties)`);
        continue;
      }
      lines.push(`${this.colorize('✗', 'red')} ${result.type}`);
      for (const [name, messages] of Object.entries(result.problems ?? {})) {
        for (const message of messages) {
          lines.push(`    ${name}: ${message}`);
        }
      }
    }

    const failed = results.filter((result) => result.status === 'fail').length;
    lines.push('');
    lines.push(`Checked ${results.length} types: ${results.length - failed} passed, ${failed} failed`);
    return lines.join('\n');
  }

  private formatProperty(property: PropertyDescriptor, nameWidth: number, local: boolean): string {
    const access = `${property.isReadable() ? 'r' : '-'}${property.isWritable() ? 'w' : '-'}`;
    const line = `  ${property.name.padEnd(nameWidth)}  ${property.kind.padEnd(6)}  ${access}  ${describeToken(property.valueType)}`;
    return local ? line : `${line}${this.colorize(`  (from ${property.declaringType.name})`, 'dim')}`;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
