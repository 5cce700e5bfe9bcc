/**
 * @arch propweave.core.registry
 */
import type {
  DoublePropertyDescriptor,
  IntPropertyDescriptor,
  ListPropertyDescriptor,
  LongPropertyDescriptor,
  MapPropertyDescriptor,
  ObjectPropertyDescriptor,
  PropertyDescriptor,
  SetPropertyDescriptor,
} from '../descriptors/types.js';

/**
 * One callback per descriptor variant.
 */
export interface PropertyVisitor<R> {
  visitInt(property: IntPropertyDescriptor): R;
  visitLong(property: LongPropertyDescriptor): R;
  visitDouble(property: DoublePropertyDescriptor): R;
  visitObject(property: ObjectPropertyDescriptor): R;
  visitList(property: ListPropertyDescriptor): R;
  visitSet(property: SetPropertyDescriptor): R;
  visitMap(property: MapPropertyDescriptor): R;
}

export function visitProperty<R>(property: PropertyDescriptor, visitor: PropertyVisitor<R>): R {
  switch (property.kind) {
    case 'int':
      return visitor.visitInt(property);
    case 'long':
      return visitor.visitLong(property);
    case 'double':
      return visitor.visitDouble(property);
    case 'object':
      return visitor.visitObject(property);
    case 'list':
      return visitor.visitList(property);
    case 'set':
      return visitor.visitSet(property);
    case 'map':
      return visitor.visitMap(property);
  }
}
