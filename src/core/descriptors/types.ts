/**
 * @arch propweave.core.types
 *
 * Property descriptor variants. The variant is picked once, when the
 * descriptor is built, from the property's resolved value type.
 */
import type { HostField, HostMethod, HostType } from '../host/types.js';
import type { TypeToken } from '../tokens/token.js';

export type Mutability = 'read' | 'write';

export type MemberKind = 'field' | 'getter' | 'setter' | 'accessor';

export type PropertyKind = 'int' | 'long' | 'double' | 'object' | 'list' | 'set' | 'map';

/**
 * Run-time shape of an observable box returned by an accessor method.
 */
export interface ReadableBox<V> {
  getValue(): V;
}

export interface WritableBox<V> extends ReadableBox<V> {
  setValue(value: V): void;
}

interface PropertyDescriptorBase {
  readonly kind: PropertyKind;
  readonly name: string;
  /** The type whose members produced this descriptor */
  readonly declaringType: HostType;
  readonly valueType: TypeToken;
  readonly mutability: ReadonlySet<Mutability>;
  /** Member kinds present, in field/getter/setter/accessor order */
  readonly members: readonly MemberKind[];
  readonly field?: HostField;
  readonly getter?: HostMethod;
  readonly setter?: HostMethod;
  readonly accessor?: HostMethod;
  /** Union of the marker tags found on the members */
  readonly tags: readonly string[];

  isReadable(): boolean;
  isWritable(): boolean;
  getValue(instance: object): unknown;
  setValue(instance: object, value: unknown): void;
}

export interface IntPropertyDescriptor extends PropertyDescriptorBase {
  readonly kind: 'int';
  get(instance: object): number;
  set(instance: object, value: number): void;
  getValue(instance: object): number | undefined;
}

export interface LongPropertyDescriptor extends PropertyDescriptorBase {
  readonly kind: 'long';
  get(instance: object): bigint;
  set(instance: object, value: bigint): void;
  getValue(instance: object): bigint | undefined;
}

export interface DoublePropertyDescriptor extends PropertyDescriptorBase {
  readonly kind: 'double';
  get(instance: object): number;
  set(instance: object, value: number): void;
  getValue(instance: object): number | undefined;
}

interface BoxedPropertyDescriptor extends PropertyDescriptorBase {
  /** The value exactly as read, `null` included */
  getValueRaw(instance: object): unknown;
}

export interface ObjectPropertyDescriptor extends BoxedPropertyDescriptor {
  readonly kind: 'object';
}

interface CollectionPropertyDescriptor extends BoxedPropertyDescriptor {
  /** The box returned by a writable accessor, if there is one */
  getBox(instance: object): WritableBox<unknown> | undefined;
  /** The box returned by any accessor, if there is one */
  getReadOnlyBox(instance: object): ReadableBox<unknown> | undefined;
}

export interface ListPropertyDescriptor extends CollectionPropertyDescriptor {
  readonly kind: 'list';
  readonly elementType: TypeToken;
}

export interface SetPropertyDescriptor extends CollectionPropertyDescriptor {
  readonly kind: 'set';
  readonly elementType: TypeToken;
}

export interface MapPropertyDescriptor extends CollectionPropertyDescriptor {
  readonly kind: 'map';
  readonly keyType: TypeToken;
  readonly entryType: TypeToken;
}

export type PropertyDescriptor =
  | IntPropertyDescriptor
  | LongPropertyDescriptor
  | DoublePropertyDescriptor
  | ObjectPropertyDescriptor
  | ListPropertyDescriptor
  | SetPropertyDescriptor
  | MapPropertyDescriptor;

/**
 * Everything the factory needs to build one descriptor.
 */
export interface DescriptorSource {
  readonly name: string;
  readonly declaringType: HostType;
  /** Resolved and unwrapped value type */
  readonly valueType: TypeToken;
  readonly field?: HostField;
  readonly getter?: HostMethod;
  readonly setter?: HostMethod;
  readonly accessor?: HostMethod;
}
