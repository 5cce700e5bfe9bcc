/**
 * @arch propweave.cli.types
 *
 * Formatter type definitions.
 */
import type { PropertyRegistry } from '../../core/registry/property-registry.js';

export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Only list properties declared on the type itself */
  localOnly: boolean;
}

/**
 * Outcome of building one type during `check`.
 */
export interface CheckResult {
  type: string;
  status: 'pass' | 'fail';
  /** Number of properties, when the build succeeded */
  properties?: number;
  /** Problems grouped by property name, when it failed */
  problems?: Record<string, readonly string[]>;
}

export interface IRegistryFormatter {
  formatRegistry(registry: PropertyRegistry): string;
  formatCheck(results: readonly CheckResult[]): string;
}
