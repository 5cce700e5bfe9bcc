/**
 * @arch propweave.core.registry
 *
 * Immutable registry of the properties visible on one type.
 */
import type { HostType } from '../host/types.js';
import type {
  DoublePropertyDescriptor,
  IntPropertyDescriptor,
  ListPropertyDescriptor,
  LongPropertyDescriptor,
  MapPropertyDescriptor,
  PropertyDescriptor,
  SetPropertyDescriptor,
} from '../descriptors/types.js';
import { TypedProperty } from '../descriptors/typed-property.js';
import { describeToken, isAssignable, TypeTokens, type TypeToken } from '../tokens/token.js';
import type { ValueType } from '../tokens/value-type.js';
import { ErrorCodes, PropertyLookupError } from '../../utils/errors.js';
import { visitProperty, type PropertyVisitor } from './visitor.js';

export class PropertyRegistry {
  private readonly byName: ReadonlyMap<string, PropertyDescriptor>;
  private readonly local: ReadonlySet<string>;
  private readonly ignored: ReadonlySet<string>;

  /**
   * @param properties - all visible descriptors, local and inherited
   * @param localNames - names declared on `type` itself
   * @param ignoredNames - names excluded at or above `type`
   */
  constructor(
    readonly type: HostType,
    properties: Iterable<PropertyDescriptor>,
    localNames: Iterable<string>,
    ignoredNames: Iterable<string>
  ) {
    const sorted = [...properties].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    this.byName = new Map(sorted.map((property) => [property.name, property]));
    this.local = new Set([...localNames].filter((name) => this.byName.has(name)));
    this.ignored = new Set(ignoredNames);
  }

  /** All property names, sorted */
  get names(): readonly string[] {
    return [...this.byName.keys()];
  }

  get localNames(): readonly string[] {
    return this.names.filter((name) => this.local.has(name));
  }

  get ignoredNames(): ReadonlySet<string> {
    return this.ignored;
  }

  get properties(): readonly PropertyDescriptor[] {
    return [...this.byName.values()];
  }

  get localProperties(): readonly PropertyDescriptor[] {
    return this.properties.filter((property) => this.local.has(property.name));
  }

  get size(): number {
    return this.byName.size;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  isLocal(name: string): boolean {
    return this.local.has(name);
  }

  isIgnored(name: string): boolean {
    return this.ignored.has(name);
  }

  findProperty(name: string): PropertyDescriptor | undefined {
    return this.byName.get(name);
  }

  /**
   * @throws PropertyLookupError when no property has that name
   */
  requireProperty(name: string): PropertyDescriptor {
    const property = this.byName.get(name);
    if (!property) {
      throw new PropertyLookupError(
        ErrorCodes.PROPERTY_NOT_FOUND,
        `Property '${name}' not found on ${this.type.name}`,
        { property: name, type: this.type.name, available: this.names }
      );
    }
    return property;
  }

  /**
   * Look a property up as a given value type.
   * @throws PropertyLookupError when missing or of an incompatible type
   */
  getProperty<V>(name: string, valueType: ValueType<V>): TypedProperty<V> {
    const property = this.requireProperty(name);
    this.checkType(property, valueType.token);
    return new TypedProperty(property, valueType);
  }

  getIntProperty(name: string): IntPropertyDescriptor {
    const property = this.requireProperty(name);
    if (property.kind !== 'int') throw this.mismatch(property, TypeTokens.int);
    return property;
  }

  getLongProperty(name: string): LongPropertyDescriptor {
    const property = this.requireProperty(name);
    if (property.kind !== 'long') throw this.mismatch(property, TypeTokens.long);
    return property;
  }

  getDoubleProperty(name: string): DoublePropertyDescriptor {
    const property = this.requireProperty(name);
    if (property.kind !== 'double') throw this.mismatch(property, TypeTokens.double);
    return property;
  }

  getListProperty<E>(name: string, element: ValueType<E>): ListPropertyDescriptor {
    const property = this.requireProperty(name);
    const expected = TypeTokens.list(element.token);
    if (property.kind !== 'list') throw this.mismatch(property, expected);
    this.checkType(property, expected);
    return property;
  }

  getSetProperty<E>(name: string, element: ValueType<E>): SetPropertyDescriptor {
    const property = this.requireProperty(name);
    const expected = TypeTokens.set(element.token);
    if (property.kind !== 'set') throw this.mismatch(property, expected);
    this.checkType(property, expected);
    return property;
  }

  getMapProperty<K, V>(name: string, key: ValueType<K>, value: ValueType<V>): MapPropertyDescriptor {
    const property = this.requireProperty(name);
    const expected = TypeTokens.map(key.token, value.token);
    if (property.kind !== 'map') throw this.mismatch(property, expected);
    this.checkType(property, expected);
    return property;
  }

  /**
   * Dispatch the named property to the visitor callback for its variant.
   */
  acceptProperty<R>(name: string, visitor: PropertyVisitor<R>): R {
    return visitProperty(this.requireProperty(name), visitor);
  }

  private checkType(property: PropertyDescriptor, expected: TypeToken): void {
    if (!isAssignable(property.valueType, expected)) {
      throw this.mismatch(property, expected);
    }
  }

  private mismatch(property: PropertyDescriptor, expected: TypeToken): PropertyLookupError {
    const actual = describeToken(property.valueType);
    const wanted = describeToken(expected);
    return new PropertyLookupError(
      ErrorCodes.TYPE_MISMATCH,
      `Property '${property.name}' of ${this.type.name} is ${actual}, not ${wanted}`,
      { property: property.name, type: this.type.name, actual, expected: wanted }
    );
  }
}
