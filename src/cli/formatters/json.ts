/**
 * @arch propweave.cli.formatter
 */
import type { PropertyRegistry } from '../../core/registry/property-registry.js';
import type { PropertyDescriptor } from '../../core/descriptors/types.js';
import { describeToken } from '../../core/tokens/token.js';
import type { CheckResult, FormatOptions, IRegistryFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IRegistryFormatter {
  private localOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.localOnly = options.localOnly ?? false;
  }

  formatRegistry(registry: PropertyRegistry): string {
    const properties = this.localOnly ? registry.localProperties : registry.properties;
    return JSON.stringify(
      {
        type: registry.type.name,
        properties: properties.map((property) => this.transformProperty(property, registry.isLocal(property.name))),
        ignored: [...registry.ignoredNames].sort(),
      },
      null,
      2
    );
  }

  formatCheck(results: readonly CheckResult[]): string {
    const failed = results.filter((result) => result.status === 'fail').length;
    return JSON.stringify(
      {
        results,
        summary: { total: results.length, passed: results.length - failed, failed },
      },
      null,
      2
    );
  }

  private transformProperty(property: PropertyDescriptor, local: boolean): Record<string, unknown> {
    return {
      name: property.name,
      kind: property.kind,
      value_type: describeToken(property.valueType),
      mutability: [...property.mutability],
      members: property.members,
      declaring_type: property.declaringType.name,
      local,
      tags: property.tags,
    };
  }
}
