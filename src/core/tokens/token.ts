/**
 * @arch propweave.core.tokens
 *
 * Value-type tokens: a host-independent description of the type a
 * property holds. Tokens are plain data and compare structurally.
 */

export type PrimitiveName = 'int' | 'long' | 'double' | 'string' | 'boolean';

export interface PrimitiveToken {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
}

export interface ListToken {
  readonly kind: 'list';
  readonly element: TypeToken;
}

export interface SetToken {
  readonly kind: 'set';
  readonly element: TypeToken;
}

export interface MapToken {
  readonly kind: 'map';
  readonly key: TypeToken;
  readonly value: TypeToken;
}

/** An observable box: `getValue()`, plus `setValue(v)` when writable. */
export interface BoxToken {
  readonly kind: 'box';
  readonly value: TypeToken;
  readonly writable: boolean;
}

/** A value that may be absent (`T | undefined | null`). */
export interface OptionalToken {
  readonly kind: 'optional';
  readonly value: TypeToken;
}

/** A named class or interface, with the names of all its supertypes. */
export interface ObjectToken {
  readonly kind: 'object';
  readonly name: string;
  readonly supertypes: readonly string[];
}

/** An unresolved type parameter, scoped to the type that declares it. */
export interface VariableToken {
  readonly kind: 'variable';
  readonly name: string;
  readonly scope: string;
}

export interface VoidToken {
  readonly kind: 'void';
}

export interface UnknownToken {
  readonly kind: 'unknown';
}

export type TypeToken =
  | PrimitiveToken
  | ListToken
  | SetToken
  | MapToken
  | BoxToken
  | OptionalToken
  | ObjectToken
  | VariableToken
  | VoidToken
  | UnknownToken;

export const TypeTokens = {
  int: { kind: 'primitive', name: 'int' } as const satisfies PrimitiveToken,
  long: { kind: 'primitive', name: 'long' } as const satisfies PrimitiveToken,
  double: { kind: 'primitive', name: 'double' } as const satisfies PrimitiveToken,
  string: { kind: 'primitive', name: 'string' } as const satisfies PrimitiveToken,
  boolean: { kind: 'primitive', name: 'boolean' } as const satisfies PrimitiveToken,
  void: { kind: 'void' } as const satisfies VoidToken,
  unknown: { kind: 'unknown' } as const satisfies UnknownToken,

  primitive(name: PrimitiveName): PrimitiveToken {
    return { kind: 'primitive', name };
  },
  list(element: TypeToken): ListToken {
    return { kind: 'list', element };
  },
  set(element: TypeToken): SetToken {
    return { kind: 'set', element };
  },
  map(key: TypeToken, value: TypeToken): MapToken {
    return { kind: 'map', key, value };
  },
  box(value: TypeToken, writable = true): BoxToken {
    return { kind: 'box', value, writable };
  },
  optional(value: TypeToken): OptionalToken {
    return { kind: 'optional', value };
  },
  object(name: string, supertypes: readonly string[] = []): ObjectToken {
    return { kind: 'object', name, supertypes };
  },
  variable(name: string, scope: string): VariableToken {
    return { kind: 'variable', name, scope };
  },
};

/** Key under which a type parameter's binding is stored. */
export function variableKey(scope: string, name: string): string {
  return `${scope}<${name}>`;
}

/**
 * Strip box and optional wrappers down to the contained type.
 */
export function unwrapToken(token: TypeToken): TypeToken {
  let current = token;
  while (current.kind === 'box' || current.kind === 'optional') {
    current = current.value;
  }
  return current;
}

/**
 * Replace bound type parameters. Unbound variables are left in place.
 */
export function substituteToken(
  token: TypeToken,
  bindings: ReadonlyMap<string, TypeToken>
): TypeToken {
  switch (token.kind) {
    case 'variable':
      return bindings.get(variableKey(token.scope, token.name)) ?? token;
    case 'list':
      return TypeTokens.list(substituteToken(token.element, bindings));
    case 'set':
      return TypeTokens.set(substituteToken(token.element, bindings));
    case 'map':
      return TypeTokens.map(substituteToken(token.key, bindings), substituteToken(token.value, bindings));
    case 'box':
      return TypeTokens.box(substituteToken(token.value, bindings), token.writable);
    case 'optional':
      return TypeTokens.optional(substituteToken(token.value, bindings));
    default:
      return token;
  }
}

/**
 * Whether a property whose value type is `actual` can be viewed as
 * `expected`. Collections are covariant in their element types; objects
 * match by name or by one of their supertypes.
 */
export function isAssignable(actual: TypeToken, expected: TypeToken): boolean {
  if (expected.kind === 'unknown') {
    return true;
  }
  switch (actual.kind) {
    case 'primitive':
      return expected.kind === 'primitive' && expected.name === actual.name;
    case 'list':
      return expected.kind === 'list' && isAssignable(actual.element, expected.element);
    case 'set':
      return expected.kind === 'set' && isAssignable(actual.element, expected.element);
    case 'map':
      return expected.kind === 'map'
        && isAssignable(actual.key, expected.key)
        && isAssignable(actual.value, expected.value);
    case 'box':
      return expected.kind === 'box'
        && (actual.writable || !expected.writable)
        && isAssignable(actual.value, expected.value);
    case 'optional':
      return expected.kind === 'optional' && isAssignable(actual.value, expected.value);
    case 'object':
      return expected.kind === 'object'
        && (expected.name === actual.name || actual.supertypes.includes(expected.name));
    case 'variable':
      return expected.kind === 'variable' && expected.name === actual.name && expected.scope === actual.scope;
    case 'void':
      return expected.kind === 'void';
    case 'unknown':
      return false;
  }
}

/**
 * Shallow run-time check of a value against a token. Element types of
 * collections and object classes are not inspected.
 */
export function matchesToken(value: unknown, token: TypeToken): boolean {
  switch (token.kind) {
    case 'primitive':
      return matchesPrimitive(value, token.name);
    case 'list':
      return Array.isArray(value);
    case 'set':
      return value instanceof Set;
    case 'map':
      return value instanceof Map;
    case 'optional':
      return value === undefined || value === null || matchesToken(value, token.value);
    case 'object':
      return typeof value === 'object' && value !== null;
    default:
      return true;
  }
}

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;

/**
 * Whole numbers in the signed 32-bit range; wider integers belong to `long`.
 */
export function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX;
}

function matchesPrimitive(value: unknown, name: PrimitiveName): boolean {
  switch (name) {
    case 'int':
      return isInt(value);
    case 'long':
      return typeof value === 'bigint';
    case 'double':
      return typeof value === 'number';
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * Human-readable rendering, used in error messages and CLI output.
 */
export function describeToken(token: TypeToken): string {
  switch (token.kind) {
    case 'primitive':
      return token.name;
    case 'list':
      return `List<${describeToken(token.element)}>`;
    case 'set':
      return `Set<${describeToken(token.element)}>`;
    case 'map':
      return `Map<${describeToken(token.key)}, ${describeToken(token.value)}>`;
    case 'box':
      return `${token.writable ? 'Box' : 'ReadOnlyBox'}<${describeToken(token.value)}>`;
    case 'optional':
      return `${describeToken(token.value)} | undefined`;
    case 'object':
      return token.name;
    case 'variable':
      return token.name;
    case 'void':
      return 'void';
    case 'unknown':
      return 'unknown';
  }
}
