/**
 * @arch propweave.core.hierarchy
 *
 * Turns collected types into registries, supertypes first.
 */
import type { HostModel, HostType } from '../host/types.js';
import type { CollectedType } from '../collector/types.js';
import { createDescriptor } from '../descriptors/factory.js';
import type { PropertyDescriptor } from '../descriptors/types.js';
import { PropertyRegistry } from '../registry/property-registry.js';
import type { RegistryCache } from '../registry/cache.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export interface AssembleContext {
  readonly model: HostModel;
  readonly collected: ReadonlyMap<string, CollectedType>;
  readonly cache: RegistryCache;
}

/**
 * Direct supertypes that have registries of their own: the superclass,
 * then the interfaces, minus excluded types and the universal root.
 */
export function registrySupertypes(model: HostModel, type: HostType): HostType[] {
  const superclass = model.getSuperclass(type);
  const candidates = superclass ? [superclass, ...model.getInterfaces(type)] : [...model.getInterfaces(type)];
  return candidates.filter((candidate) => candidate.id !== model.rootType.id && !model.isExcluded(candidate));
}

/**
 * Depth-first, post-order assembly from `root`. Returns the newly built
 * registries keyed by type id; registries found in the cache are reused.
 */
export function assembleRegistries(root: HostType, context: AssembleContext): Map<string, PropertyRegistry> {
  const built = new Map<string, PropertyRegistry>();

  const assemble = (type: HostType): PropertyRegistry => {
    const known = context.cache.get(type.id) ?? built.get(type.id);
    if (known) {
      return known;
    }
    const collected = context.collected.get(type.id);
    if (!collected) {
      throw new SystemError(
        ErrorCodes.ENGINE_STATE,
        `No collected members for ${type.name} while assembling ${root.name}`,
        { type: type.id, root: root.id }
      );
    }

    const supers = registrySupertypes(context.model, type).map(assemble);
    const registry = mergeRegistry(collected, supers);
    built.set(type.id, registry);
    log.debug(`Assembled ${type.name}: ${registry.size} properties, ${registry.localNames.length} local`);
    return registry;
  };

  assemble(root);
  return built;
}

/**
 * Local descriptors, then inherited ones whose names are neither local
 * nor ignored. Ignored names are the union over all supertypes.
 */
function mergeRegistry(collected: CollectedType, supers: readonly PropertyRegistry[]): PropertyRegistry {
  const ignored = new Set(collected.ignoredNames);
  for (const registry of supers) {
    registry.ignoredNames.forEach((name) => ignored.add(name));
  }

  const properties = new Map<string, PropertyDescriptor>();
  for (const [name, property] of collected.properties) {
    if (ignored.has(name)) {
      continue;
    }
    properties.set(name, createDescriptor({ ...property, declaringType: collected.type }));
  }
  const localNames = [...properties.keys()];

  for (const registry of supers) {
    for (const property of registry.properties) {
      if (!properties.has(property.name) && !ignored.has(property.name)) {
        properties.set(property.name, property);
      }
    }
  }

  return new PropertyRegistry(collected.type, properties.values(), localNames, ignored);
}
