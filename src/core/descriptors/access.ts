/**
 * @arch propweave.core.descriptors
 *
 * Read and write strategies bound to a property's member handles.
 */
import type { HostMethod } from '../host/types.js';
import type { BoxToken, TypeToken } from '../tokens/token.js';
import { ErrorCodes, PropertyAccessError } from '../../utils/errors.js';
import type { DescriptorSource, Mutability, ReadableBox, WritableBox } from './types.js';

export type Reader = (instance: object) => unknown;
export type Writer = (instance: object, value: unknown) => void;

export interface PropertyAccess {
  readonly mutability: ReadonlySet<Mutability>;
  readonly read: Reader;
  readonly write: Writer;
  readonly readBox: (instance: object) => ReadableBox<unknown> | undefined;
}

export function isReadableBox(value: unknown): value is ReadableBox<unknown> {
  return typeof value === 'object'
    && value !== null
    && 'getValue' in value
    && typeof value.getValue === 'function';
}

export function isWritableBox(value: unknown): value is WritableBox<unknown> {
  return isReadableBox(value)
    && 'setValue' in value
    && typeof value.setValue === 'function';
}

/**
 * The box type an accessor returns, looking through an optional wrapper.
 */
export function accessorBoxToken(returnType: TypeToken): BoxToken | undefined {
  if (returnType.kind === 'box') {
    return returnType;
  }
  if (returnType.kind === 'optional' && returnType.value.kind === 'box') {
    return returnType.value;
  }
  return undefined;
}

/**
 * Call a member handle, wrapping whatever it throws.
 */
export function invokeMember(
  propertyName: string,
  method: HostMethod,
  instance: object,
  args: readonly unknown[]
): unknown {
  try {
    return method.invoke(instance, args);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PropertyAccessError(
      ErrorCodes.INVOCATION_FAILURE,
      `Calling ${method.declaringType.name}.${method.name}() for property '${propertyName}' failed: ${reason}`,
      { property: propertyName, member: method.name, type: method.declaringType.name },
      { cause: error }
    );
  }
}

/**
 * Mutability rules: an accessor grants read, and write when its box is
 * writable; a getter grants read; a setter grants write.
 */
export function resolveMutability(source: DescriptorSource): ReadonlySet<Mutability> {
  const mutability = new Set<Mutability>();
  const box = source.accessor ? accessorBoxToken(source.accessor.returnType) : undefined;
  if (source.getter || source.accessor) {
    mutability.add('read');
  }
  if (source.setter || box?.writable) {
    mutability.add('write');
  }
  return mutability;
}

/**
 * Bind read and write strategies. The bean getter wins over the accessor
 * box for reads, and the bean setter wins for writes.
 */
export function bindAccess(source: DescriptorSource): PropertyAccess {
  const { name, getter, setter, accessor } = source;
  const mutability = resolveMutability(source);

  const readBox = (instance: object): ReadableBox<unknown> | undefined => {
    if (!accessor) {
      return undefined;
    }
    const box = invokeMember(name, accessor, instance, []);
    if (!isReadableBox(box)) {
      throw new PropertyAccessError(
        ErrorCodes.INVOCATION_FAILURE,
        `Accessor ${accessor.declaringType.name}.${accessor.name}() for property '${name}' did not return an observable box`,
        { property: name, member: accessor.name }
      );
    }
    return box;
  };

  const read: Reader = (instance) => {
    if (getter) {
      return invokeMember(name, getter, instance, []);
    }
    const box = mutability.has('read') ? readBox(instance) : undefined;
    if (!box) {
      throw new PropertyAccessError(
        ErrorCodes.WRITE_ONLY,
        `Property '${name}' of ${source.declaringType.name} is write-only`,
        { property: name, type: source.declaringType.name }
      );
    }
    return readFromBox(name, box);
  };

  const write: Writer = (instance, value) => {
    if (setter) {
      invokeMember(name, setter, instance, [value]);
      return;
    }
    const box = mutability.has('write') ? readBox(instance) : undefined;
    if (!box) {
      throw new PropertyAccessError(
        ErrorCodes.READ_ONLY,
        `Property '${name}' of ${source.declaringType.name} is read-only`,
        { property: name, type: source.declaringType.name }
      );
    }
    if (!isWritableBox(box)) {
      throw new PropertyAccessError(
        ErrorCodes.READ_ONLY,
        `Box returned for property '${name}' of ${source.declaringType.name} cannot be written`,
        { property: name, type: source.declaringType.name }
      );
    }
    writeToBox(name, box, value);
  };

  return { mutability, read, write, readBox };
}

function readFromBox(name: string, box: ReadableBox<unknown>): unknown {
  try {
    return box.getValue();
  } catch (error) {
    throw boxFailure(name, 'read', error);
  }
}

function writeToBox(name: string, box: WritableBox<unknown>, value: unknown): void {
  try {
    box.setValue(value);
  } catch (error) {
    throw boxFailure(name, 'write', error);
  }
}

function boxFailure(name: string, direction: 'read' | 'write', error: unknown): PropertyAccessError {
  const reason = error instanceof Error ? error.message : String(error);
  return new PropertyAccessError(
    ErrorCodes.INVOCATION_FAILURE,
    `Box ${direction} for property '${name}' failed: ${reason}`,
    { property: name },
    { cause: error }
  );
}
