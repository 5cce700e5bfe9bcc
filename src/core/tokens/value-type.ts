/**
 * @arch propweave.core.tokens
 *
 * Expected value types for typed registry lookups. Each pairs a token,
 * checked against the descriptor when the lookup happens, with a guard
 * that narrows values read through the typed view.
 */
import { isInt, TypeTokens, type TypeToken } from './token.js';

export interface ValueType<V> {
  readonly token: TypeToken;
  accepts(value: unknown): value is V;
}

type AbstractConstructor<T> = abstract new (...args: never[]) => T;

function valueType<V>(token: TypeToken, accepts: (value: unknown) => value is V): ValueType<V> {
  return { token, accepts };
}

export const Types = {
  int: valueType(TypeTokens.int, isInt),
  long: valueType(TypeTokens.long, (v): v is bigint => typeof v === 'bigint'),
  double: valueType(TypeTokens.double, (v): v is number => typeof v === 'number'),
  string: valueType(TypeTokens.string, (v): v is string => typeof v === 'string'),
  boolean: valueType(TypeTokens.boolean, (v): v is boolean => typeof v === 'boolean'),
  unknown: valueType(TypeTokens.unknown, (v): v is unknown => true),

  listOf<E>(element: ValueType<E>): ValueType<readonly E[]> {
    return valueType(
      TypeTokens.list(element.token),
      (v): v is readonly E[] => Array.isArray(v) && v.every((item) => element.accepts(item))
    );
  },

  setOf<E>(element: ValueType<E>): ValueType<ReadonlySet<E>> {
    return valueType(
      TypeTokens.set(element.token),
      (v): v is ReadonlySet<E> => v instanceof Set && [...v].every((item) => element.accepts(item))
    );
  },

  mapOf<K, V>(key: ValueType<K>, value: ValueType<V>): ValueType<ReadonlyMap<K, V>> {
    return valueType(
      TypeTokens.map(key.token, value.token),
      (v): v is ReadonlyMap<K, V> =>
        v instanceof Map && [...v].every(([k, item]) => key.accepts(k) && value.accepts(item))
    );
  },

  /**
   * Instances of a class. The token is named after the constructor, so it
   * matches properties typed as that class or any of its subclasses.
   */
  instanceOf<T extends object>(ctor: AbstractConstructor<T>): ValueType<T> {
    return valueType(TypeTokens.object(ctor.name), (v): v is T => v instanceof ctor);
  },

  /**
   * A named interface or class checked with a caller-supplied guard.
   */
  object<T>(name: string, guard: (value: unknown) => value is T): ValueType<T> {
    return valueType(TypeTokens.object(name), guard);
  },
};
