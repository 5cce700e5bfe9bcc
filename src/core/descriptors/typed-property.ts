/**
 * @arch propweave.core.descriptors
 */
import type { ValueType } from '../tokens/value-type.js';
import { describeToken } from '../tokens/token.js';
import { ErrorCodes, PropertyLookupError } from '../../utils/errors.js';
import type { PropertyDescriptor } from './types.js';

/**
 * A descriptor viewed through the value type a caller asked for.
 * Reads are checked against that type, so callers get `V` back without a
 * cast.
 */
export class TypedProperty<V> {
  constructor(
    readonly descriptor: PropertyDescriptor,
    private readonly expected: ValueType<V>
  ) {}

  get name(): string {
    return this.descriptor.name;
  }

  isReadable(): boolean {
    return this.descriptor.isReadable();
  }

  isWritable(): boolean {
    return this.descriptor.isWritable();
  }

  getValue(instance: object): V | undefined {
    const value = this.descriptor.getValue(instance);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!this.expected.accepts(value)) {
      throw new PropertyLookupError(
        ErrorCodes.TYPE_MISMATCH,
        `Property '${this.name}' holds a value that is not ${describeToken(this.expected.token)}`,
        { property: this.name, expected: describeToken(this.expected.token) }
      );
    }
    return value;
  }

  setValue(instance: object, value: V): void {
    this.descriptor.setValue(instance, value);
  }
}
