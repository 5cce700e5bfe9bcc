/**
 * @arch propweave.core.collector
 *
 * Collects the property members of exactly one type.
 */
import type { HostField, HostMethod, HostModel, HostType } from '../host/types.js';
import type { ConventionOptions } from '../conventions/options.js';
import { matchName, type AffixPosition } from '../conventions/matcher.js';
import { accessorBoxToken } from '../descriptors/access.js';
import { TypeTokens, unwrapToken, type TypeToken } from '../tokens/token.js';
import { ConventionViolationError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import type { ProblemCollector } from './problems.js';
import type { CollectedProperty, CollectedType, MethodKind } from './types.js';

interface MethodMatch {
  readonly name: string;
  readonly kind: MethodKind;
}

/**
 * Mutable while one type is scanned; `collect()` hands back a frozen
 * snapshot and the collector is dropped.
 */
export class TypeMemberCollector {
  private readonly fields = new Map<string, HostField>();
  private readonly methods = new Map<string, Map<MethodKind, HostMethod>>();
  private readonly suppressed = new Map<string, Set<MethodKind>>();
  private readonly ignored = new Set<string>();

  constructor(
    private readonly model: HostModel,
    private readonly type: HostType,
    private readonly conventions: ConventionOptions,
    private readonly problems: ProblemCollector
  ) {}

  collect(): CollectedType {
    this.scanFields();
    this.scanMethods();
    return this.freeze();
  }

  private scanFields(): void {
    for (const field of this.model.getDeclaredFields(this.type)) {
      const name = this.derive(field.name, this.conventions.fieldPrefixes, 'prefix');
      if (name === undefined) {
        continue;
      }
      if (field.tags.includes(this.conventions.ignoreMarker)) {
        log.debug(`${this.type.name}: field '${field.name}' ignores property '${name}'`);
        this.ignored.add(name);
        continue;
      }
      const existing = this.fields.get(name);
      if (existing && existing !== field) {
        this.duplicate(name, 'field', existing.name, field.name);
        continue;
      }
      this.fields.set(name, field);
    }
  }

  private scanMethods(): void {
    const rootId = this.model.rootType.id;
    for (const method of this.model.getMethods(this.type)) {
      if (method.declaringType.id === rootId) {
        continue;
      }
      const match = this.classify(method);
      if (match) {
        this.record(match, method);
      }
    }
  }

  /**
   * Accessor first, then getter, then setter. A method lands in one
   * category at most.
   */
  private classify(method: HostMethod): MethodMatch | undefined {
    const { propertySuffixes, getterPrefixes, setterPrefixes } = this.conventions;
    const arity = method.parameterTypes.length;

    if (arity === 0 && accessorBoxToken(method.returnType)) {
      const name = this.derive(method.name, propertySuffixes, 'suffix');
      if (name !== undefined) return { name, kind: 'accessor' };
    }
    if (arity === 0 && method.returnType.kind !== 'void') {
      const name = this.derive(method.name, getterPrefixes, 'prefix');
      if (name !== undefined) return { name, kind: 'getter' };
    }
    if (arity === 1) {
      const name = this.derive(method.name, setterPrefixes, 'prefix');
      if (name !== undefined) return { name, kind: 'setter' };
    }
    return undefined;
  }

  private record({ name, kind }: MethodMatch, method: HostMethod): void {
    const slots = this.methods.get(name) ?? new Map<MethodKind, HostMethod>();
    this.methods.set(name, slots);

    if (method.tags.includes(this.conventions.ignoreMarker)) {
      log.debug(`${this.type.name}: ${kind} '${method.name}' is ignored`);
      const kinds = this.suppressed.get(name) ?? new Set<MethodKind>();
      kinds.add(kind);
      this.suppressed.set(name, kinds);
      slots.delete(kind);
      return;
    }
    if (this.suppressed.get(name)?.has(kind)) {
      return;
    }

    const existing = slots.get(kind);
    if (!existing || (existing.isAbstract && !method.isAbstract)) {
      slots.set(kind, method);
      return;
    }
    if (existing === method || method.isAbstract) {
      return;
    }
    this.duplicate(
      name,
      kind,
      `${existing.declaringType.name}.${existing.name}()`,
      `${method.declaringType.name}.${method.name}()`
    );
  }

  private freeze(): CollectedType {
    const properties = new Map<string, CollectedProperty>();
    const names = [...this.methods.keys()].sort();

    for (const name of names) {
      const slots = this.methods.get(name);
      if (!slots || this.ignored.has(name)) {
        continue;
      }
      const getter = slots.get('getter');
      const setter = slots.get('setter');
      const accessor = slots.get('accessor');
      if (!getter && !setter && !accessor) {
        continue;
      }
      const field = this.fields.get(name);
      properties.set(name, {
        name,
        field,
        getter,
        setter,
        accessor,
        valueType: this.inferValueType(field, getter, setter, accessor),
      });
    }

    log.debug(`Collected ${properties.size} properties from ${this.type.name}`, {
      properties: [...properties.keys()],
      ignored: [...this.ignored],
    });
    return { type: this.type, properties, ignoredNames: new Set(this.ignored) };
  }

  /**
   * Fixed priority: field, getter return, setter parameter, accessor box.
   */
  private inferValueType(
    field: HostField | undefined,
    getter: HostMethod | undefined,
    setter: HostMethod | undefined,
    accessor: HostMethod | undefined
  ): TypeToken {
    const declared = field?.valueType
      ?? getter?.returnType
      ?? setter?.parameterTypes[0]
      ?? accessor?.returnType
      ?? TypeTokens.unknown;
    return unwrapToken(this.model.resolveType(this.type, declared));
  }

  private derive(rawName: string, affixes: readonly string[], position: AffixPosition): string | undefined {
    try {
      return matchName(rawName, affixes, position);
    } catch (error) {
      if (!(error instanceof ConventionViolationError)) {
        throw error;
      }
      this.problems.add({
        kind: 'convention-violation',
        propertyName: rawName,
        type: this.type,
        message: error.message,
      });
      return undefined;
    }
  }

  private duplicate(name: string, kind: string, first: string, second: string): void {
    this.problems.add({
      kind: 'duplicate-member',
      propertyName: name,
      type: this.type,
      message: `Duplicate ${kind} on ${this.type.name}: ${first} and ${second}`,
    });
  }
}

/**
 * Collect one type's properties.
 */
export function collectType(
  model: HostModel,
  type: HostType,
  conventions: ConventionOptions,
  problems: ProblemCollector
): CollectedType {
  return new TypeMemberCollector(model, type, conventions, problems).collect();
}
