/**
 * @arch propweave.core.hierarchy
 *
 * Breadth-first walk over a type's superclass and interface graph,
 * collecting every type not already resolved.
 */
import type { HostModel, HostType } from '../host/types.js';
import type { ConventionOptions } from '../conventions/options.js';
import type { RegistryCache } from '../registry/cache.js';
import { collectType } from '../collector/collector.js';
import type { ProblemCollector } from '../collector/problems.js';
import type { CollectedType } from '../collector/types.js';

export interface WalkContext {
  readonly model: HostModel;
  readonly conventions: ConventionOptions;
  /** Types already resolved; they are neither collected nor descended into */
  readonly cache: RegistryCache;
  readonly problems: ProblemCollector;
}

/**
 * Collect every type reachable from `root`, each exactly once.
 * Interfaces are queued before the type is collected, its superclass
 * after.
 */
export function walkHierarchy(root: HostType, context: WalkContext): ReadonlyMap<string, CollectedType> {
  const { model, conventions, cache, problems } = context;
  const visited = new Set<string>([model.rootType.id, ...cache.keys()]);
  const collected = new Map<string, CollectedType>();
  const queue: HostType[] = [root];

  for (let current = queue.shift(); current; current = queue.shift()) {
    if (visited.has(current.id) || model.isExcluded(current)) {
      continue;
    }
    queue.push(...model.getInterfaces(current));
    collected.set(current.id, collectType(model, current, conventions, problems));
    visited.add(current.id);

    const superclass = model.getSuperclass(current);
    if (superclass && !visited.has(superclass.id)) {
      queue.push(superclass);
    }
  }

  return collected;
}
