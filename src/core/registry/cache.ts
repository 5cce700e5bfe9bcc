/**
 * @arch propweave.core.registry
 *
 * Type id to registry snapshots. A build takes one as read-only input
 * and returns a new one; the input map is never written to.
 */
import type { HostType } from '../host/types.js';
import type { PropertyRegistry } from './property-registry.js';

export type RegistryCache = ReadonlyMap<string, PropertyRegistry>;

export const EMPTY_CACHE: RegistryCache = new Map();

/**
 * A new snapshot holding `base` plus `additions`. Entries already in
 * `base` are kept.
 */
export function extendCache(base: RegistryCache, additions: Iterable<PropertyRegistry>): RegistryCache {
  const next = new Map(base);
  for (const registry of additions) {
    if (!next.has(registry.type.id)) {
      next.set(registry.type.id, registry);
    }
  }
  return next;
}

/**
 * Snapshot built from registries, keyed by their type.
 */
export function cacheOf(registries: Iterable<PropertyRegistry>): RegistryCache {
  return extendCache(EMPTY_CACHE, registries);
}

export function registryFor(cache: RegistryCache, type: HostType): PropertyRegistry | undefined {
  return cache.get(type.id);
}
