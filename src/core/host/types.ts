/**
 * @arch propweave.core.types
 *
 * The host object model the engine reads types and members from.
 * The engine never touches a compiler API directly; it only sees these
 * handles.
 */
import type { TypeToken } from '../tokens/token.js';

/**
 * A class or interface known to the host model.
 */
export interface HostType {
  /** Stable identity, used as the registry cache key */
  readonly id: string;
  readonly name: string;
  readonly isInterface: boolean;
}

interface HostMemberBase {
  readonly name: string;
  readonly declaringType: HostType;
  /** Marker tags on the member, e.g. `ignoreProperty` */
  readonly tags: readonly string[];
}

export interface HostField extends HostMemberBase {
  readonly memberKind: 'field';
  readonly valueType: TypeToken;
}

export interface HostMethod extends HostMemberBase {
  readonly memberKind: 'method';
  readonly parameterTypes: readonly TypeToken[];
  readonly returnType: TypeToken;
  readonly isAbstract: boolean;
  /**
   * Call the method on a live instance. Dispatch is dynamic, so an
   * override in the instance's class runs even when the handle came
   * from a supertype.
   */
  invoke(instance: object, args: readonly unknown[]): unknown;
}

export type HostMember = HostField | HostMethod;

export interface HostModel {
  /** The universal root type; its members never become properties */
  readonly rootType: HostType;

  /** Library and runtime types the walk must not descend into */
  isExcluded(type: HostType): boolean;

  /** Direct interfaces, in declaration order */
  getInterfaces(type: HostType): readonly HostType[];

  getSuperclass(type: HostType): HostType | undefined;

  /** Non-static fields declared directly on the type */
  getDeclaredFields(type: HostType): readonly HostField[];

  /** Public, non-static methods visible on the type, inherited ones included */
  getMethods(type: HostType): readonly HostMethod[];

  /**
   * Substitute the type parameters of `base`'s ancestors as bound by
   * `base`'s heritage clauses.
   */
  resolveType(base: HostType, token: TypeToken): TypeToken;
}
