/**
 * @arch propweave.core.conventions
 *
 * Naming-convention matching: which configured prefix or suffix a member
 * name carries, and the property name left once it is removed.
 */
import { ConventionViolationError } from '../../utils/errors.js';

export type AffixPosition = 'prefix' | 'suffix';

/**
 * First prefix the name starts with while being strictly longer than it.
 * The empty prefix matches every non-empty name.
 */
export function matchPrefix(name: string, prefixes: readonly string[]): string | undefined {
  return prefixes.find((prefix) => name.length > prefix.length && name.startsWith(prefix));
}

/**
 * First suffix the name ends with while being strictly longer than it.
 */
export function matchSuffix(name: string, suffixes: readonly string[]): string | undefined {
  return suffixes.find((suffix) => name.length > suffix.length && name.endsWith(suffix));
}

/**
 * Strip a prefix bean-style: `getFirstName` minus `get` is `firstName`.
 */
export function removePrefix(name: string, prefix: string): string {
  if (prefix.length === 0) {
    return name;
  }
  const rest = name.slice(prefix.length);
  return rest.charAt(0).toLowerCase() + rest.slice(1);
}

export function removeSuffix(name: string, suffix: string): string {
  return suffix.length === 0 ? name : name.slice(0, name.length - suffix.length);
}

/**
 * Remove an affix and return the property name.
 * @throws ConventionViolationError when nothing is left of the name
 */
export function deriveName(rawName: string, affix: string, position: AffixPosition): string {
  const derived = position === 'prefix' ? removePrefix(rawName, affix) : removeSuffix(rawName, affix);
  if (derived.length === 0) {
    throw new ConventionViolationError(
      `Removing ${position} '${affix}' from '${rawName}' leaves an empty property name`,
      { rawName, affix, position }
    );
  }
  return derived;
}

/**
 * Match a name against a set of affixes and derive the property name.
 * Returns undefined when no affix matches.
 */
export function matchName(
  rawName: string,
  affixes: readonly string[],
  position: AffixPosition
): string | undefined {
  const affix = position === 'prefix' ? matchPrefix(rawName, affixes) : matchSuffix(rawName, affixes);
  return affix === undefined ? undefined : deriveName(rawName, affix, position);
}
