/**
 * @arch propweave.core.engine
 *
 * Entry point of the engine: naming conventions and a seed cache bound
 * to a host model, and the build operations over them.
 */
import type { HostModel, HostType } from '../host/types.js';
import {
  resolveConventions,
  type ConventionOptions,
  type ConventionOptionsInput,
} from '../conventions/options.js';
import { ProblemCollector } from '../collector/problems.js';
import { walkHierarchy } from '../hierarchy/walker.js';
import { assembleRegistries } from '../hierarchy/assembler.js';
import { EMPTY_CACHE, extendCache, type RegistryCache } from '../registry/cache.js';
import type { PropertyRegistry } from '../registry/property-registry.js';
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Immutable: every `with*` call returns a new builder. Empty lists fall
 * back to the default conventions.
 */
export class PropertyRegistryBuilder {
  private constructor(
    readonly model: HostModel,
    readonly conventions: ConventionOptions,
    readonly seed: RegistryCache
  ) {}

  static create(model: HostModel, conventions: ConventionOptionsInput = {}): PropertyRegistryBuilder {
    return new PropertyRegistryBuilder(model, resolveConventions(conventions), EMPTY_CACHE);
  }

  withFieldPrefixes(...prefixes: string[]): PropertyRegistryBuilder {
    return this.withConventions({ fieldPrefixes: prefixes });
  }

  withPropertySuffixes(...suffixes: string[]): PropertyRegistryBuilder {
    return this.withConventions({ propertySuffixes: suffixes });
  }

  withGetterPrefixes(...prefixes: string[]): PropertyRegistryBuilder {
    return this.withConventions({ getterPrefixes: prefixes });
  }

  withSetterPrefixes(...prefixes: string[]): PropertyRegistryBuilder {
    return this.withConventions({ setterPrefixes: prefixes });
  }

  withIgnoreMarker(marker: string): PropertyRegistryBuilder {
    return this.withConventions({ ignoreMarker: marker });
  }

  /**
   * Registries to reuse instead of rebuilding. Replaces any earlier seed.
   */
  withCacheEntries(cache: RegistryCache): PropertyRegistryBuilder {
    return new PropertyRegistryBuilder(this.model, this.conventions, new Map(cache));
  }

  /**
   * Build registries for `root` and every supertype not yet in `cache`.
   * Returns a new snapshot: `cache` plus the newly built registries.
   * @throws PropertyBuildError listing every convention and duplicate
   *   problem found anywhere in the hierarchy
   */
  buildAll(root: HostType, cache: RegistryCache = this.seed): RegistryCache {
    if (cache.has(root.id)) {
      return new Map(cache);
    }

    const problems = new ProblemCollector();
    const collected = walkHierarchy(root, {
      model: this.model,
      conventions: this.conventions,
      cache,
      problems,
    });
    problems.throwIfAny(root);

    if (collected.size === 0) {
      return new Map(cache);
    }
    const built = assembleRegistries(root, { model: this.model, collected, cache });
    log.debug(`Built ${built.size} registries for ${root.name}`, { types: [...built.keys()] });
    return extendCache(cache, built.values());
  }

  /**
   * Build and return the registry of `root` alone.
   */
  build(root: HostType): PropertyRegistry {
    const registry = this.buildAll(root).get(root.id);
    if (!registry) {
      throw new SystemError(
        ErrorCodes.ENGINE_STATE,
        `${root.name} is excluded from property resolution`,
        { type: root.id }
      );
    }
    return registry;
  }

  private withConventions(overrides: ConventionOptionsInput): PropertyRegistryBuilder {
    const conventions = resolveConventions({ ...this.conventions, ...overrides });
    return new PropertyRegistryBuilder(this.model, conventions, this.seed);
  }
}
