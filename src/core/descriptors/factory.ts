/**
 * @arch propweave.core.descriptors
 *
 * Descriptor factory. Dispatches on the resolved value type into one of
 * the closed set of descriptor variants.
 */
import { describeToken, isInt, matchesToken, type TypeToken } from '../tokens/token.js';
import { ErrorCodes, PropertyAccessError } from '../../utils/errors.js';
import { bindAccess, isWritableBox, type PropertyAccess } from './access.js';
import type {
  DescriptorSource,
  DoublePropertyDescriptor,
  IntPropertyDescriptor,
  ListPropertyDescriptor,
  LongPropertyDescriptor,
  MapPropertyDescriptor,
  MemberKind,
  ObjectPropertyDescriptor,
  PropertyDescriptor,
  SetPropertyDescriptor,
  WritableBox,
} from './types.js';

/**
 * Build the descriptor for one property.
 */
export function createDescriptor(source: DescriptorSource): PropertyDescriptor {
  const token = source.valueType;
  switch (token.kind) {
    case 'primitive':
      if (token.name === 'int') return createIntDescriptor(source);
      if (token.name === 'long') return createLongDescriptor(source);
      if (token.name === 'double') return createDoubleDescriptor(source);
      return createObjectDescriptor(source);
    case 'list':
      return createListDescriptor(source, token.element);
    case 'set':
      return createSetDescriptor(source, token.element);
    case 'map':
      return createMapDescriptor(source, token.key, token.value);
    default:
      return createObjectDescriptor(source);
  }
}

function commonParts(source: DescriptorSource, access: PropertyAccess) {
  const members: MemberKind[] = [];
  const tags = new Set<string>();
  const handles = [
    ['field', source.field],
    ['getter', source.getter],
    ['setter', source.setter],
    ['accessor', source.accessor],
  ] as const;
  for (const [kind, handle] of handles) {
    if (handle) {
      members.push(kind);
      handle.tags.forEach((tag) => tags.add(tag));
    }
  }

  return {
    name: source.name,
    declaringType: source.declaringType,
    valueType: source.valueType,
    mutability: access.mutability,
    members,
    field: source.field,
    getter: source.getter,
    setter: source.setter,
    accessor: source.accessor,
    tags: [...tags],
    isReadable: () => access.mutability.has('read'),
    isWritable: () => access.mutability.has('write'),
  };
}

function mismatch(source: DescriptorSource, value: unknown, expected: string): PropertyAccessError {
  const actual = value === null ? 'null' : typeof value;
  return new PropertyAccessError(
    ErrorCodes.TYPE_MISMATCH,
    `Property '${source.name}' of ${source.declaringType.name} expects ${expected}, got ${actual}`,
    { property: source.name, expected, actual }
  );
}

function createIntDescriptor(source: DescriptorSource): IntPropertyDescriptor {
  const access = bindAccess(source);

  const get = (instance: object): number => {
    const value = access.read(instance);
    if (!isInt(value)) throw mismatch(source, value, 'int');
    return value;
  };
  const set = (instance: object, value: number): void => {
    if (!isInt(value)) throw mismatch(source, value, 'int');
    access.write(instance, value);
  };

  return {
    ...commonParts(source, access),
    kind: 'int',
    get,
    set,
    getValue: (instance) => {
      const value = access.read(instance);
      if (value === undefined || value === null) return undefined;
      if (!isInt(value)) throw mismatch(source, value, 'int');
      return value;
    },
    setValue: (instance, value) => {
      if (!isInt(value)) throw mismatch(source, value, 'int');
      set(instance, value);
    },
  };
}

function createLongDescriptor(source: DescriptorSource): LongPropertyDescriptor {
  const access = bindAccess(source);
  const isLong = (value: unknown): value is bigint => typeof value === 'bigint';

  const get = (instance: object): bigint => {
    const value = access.read(instance);
    if (!isLong(value)) throw mismatch(source, value, 'long');
    return value;
  };
  const set = (instance: object, value: bigint): void => {
    if (!isLong(value)) throw mismatch(source, value, 'long');
    access.write(instance, value);
  };

  return {
    ...commonParts(source, access),
    kind: 'long',
    get,
    set,
    getValue: (instance) => {
      const value = access.read(instance);
      if (value === undefined || value === null) return undefined;
      if (!isLong(value)) throw mismatch(source, value, 'long');
      return value;
    },
    setValue: (instance, value) => {
      if (!isLong(value)) throw mismatch(source, value, 'long');
      set(instance, value);
    },
  };
}

function createDoubleDescriptor(source: DescriptorSource): DoublePropertyDescriptor {
  const access = bindAccess(source);
  const isDouble = (value: unknown): value is number => typeof value === 'number';

  const get = (instance: object): number => {
    const value = access.read(instance);
    if (!isDouble(value)) throw mismatch(source, value, 'double');
    return value;
  };
  const set = (instance: object, value: number): void => {
    if (!isDouble(value)) throw mismatch(source, value, 'double');
    access.write(instance, value);
  };

  return {
    ...commonParts(source, access),
    kind: 'double',
    get,
    set,
    getValue: (instance) => {
      const value = access.read(instance);
      if (value === undefined || value === null) return undefined;
      if (!isDouble(value)) throw mismatch(source, value, 'double');
      return value;
    },
    setValue: (instance, value) => {
      if (!isDouble(value)) throw mismatch(source, value, 'double');
      set(instance, value);
    },
  };
}

/**
 * Read/write for boxed values: `null` reads as `undefined`, writes of
 * `undefined` or `null` are passed through, anything else must match the
 * value type.
 */
function boxedParts(source: DescriptorSource, access: PropertyAccess) {
  return {
    ...commonParts(source, access),
    getValue: (instance: object): unknown => access.read(instance) ?? undefined,
    getValueRaw: (instance: object): unknown => access.read(instance),
    setValue: (instance: object, value: unknown): void => {
      if (value !== undefined && value !== null && !matchesToken(value, source.valueType)) {
        throw mismatch(source, value, describeToken(source.valueType));
      }
      access.write(instance, value);
    },
  };
}

function collectionParts(source: DescriptorSource, access: PropertyAccess) {
  return {
    ...boxedParts(source, access),
    getReadOnlyBox: access.readBox,
    getBox: (instance: object): WritableBox<unknown> | undefined => {
      const box = access.readBox(instance);
      return isWritableBox(box) ? box : undefined;
    },
  };
}

function createObjectDescriptor(source: DescriptorSource): ObjectPropertyDescriptor {
  return { ...boxedParts(source, bindAccess(source)), kind: 'object' };
}

function createListDescriptor(source: DescriptorSource, elementType: TypeToken): ListPropertyDescriptor {
  return { ...collectionParts(source, bindAccess(source)), kind: 'list', elementType };
}

function createSetDescriptor(source: DescriptorSource, elementType: TypeToken): SetPropertyDescriptor {
  return { ...collectionParts(source, bindAccess(source)), kind: 'set', elementType };
}

function createMapDescriptor(
  source: DescriptorSource,
  keyType: TypeToken,
  entryType: TypeToken
): MapPropertyDescriptor {
  return { ...collectionParts(source, bindAccess(source)), kind: 'map', keyType, entryType };
}
