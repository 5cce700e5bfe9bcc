/**
 * @arch propweave.core.types
 *
 * Frozen output of collecting one type's members.
 */
import type { HostField, HostMethod, HostType } from '../host/types.js';
import type { TypeToken } from '../tokens/token.js';

export type MethodKind = 'getter' | 'setter' | 'accessor';

/**
 * Everything found for one property name on one type.
 */
export interface CollectedProperty {
  readonly name: string;
  readonly field?: HostField;
  readonly getter?: HostMethod;
  readonly setter?: HostMethod;
  readonly accessor?: HostMethod;
  /** Resolved against the collected type and unwrapped */
  readonly valueType: TypeToken;
}

export interface CollectedType {
  readonly type: HostType;
  /** Only names with at least a getter, setter or accessor */
  readonly properties: ReadonlyMap<string, CollectedProperty>;
  /** Names excluded at this type by a field marker */
  readonly ignoredNames: ReadonlySet<string>;
}
