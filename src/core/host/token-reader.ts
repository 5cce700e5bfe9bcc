/**
 * @arch propweave.infra
 * @intent:ast-analysis
 *
 * Reads compiler types into value-type tokens.
 */
import { Node, ts, type Signature, type Symbol as MorphSymbol, type Type, type TypeNode } from 'ts-morph';
import { TypeTokens, type PrimitiveName, type TypeToken } from '../tokens/token.js';

/** Type aliases read as sized numeric primitives (`type int = number`) */
const NUMERIC_ALIASES: ReadonlySet<string> = new Set(['int', 'long', 'double']);

const MAX_DEPTH = 12;

/**
 * Maps the declaration owning a type parameter to its scope id, or
 * undefined when the owner is not a class or interface.
 */
export type ScopeResolver = (owner: Node) => string | undefined;

export class TokenReader {
  constructor(private readonly scopeOf: ScopeResolver) {}

  /**
   * @param location - node the type was read at; member types of boxes
   *   are instantiated there
   * @param hint - the written type annotation, if any. Only annotations
   *   keep `int`/`long`/`double`, since those aliases erase to `number`
   *   and `bigint` in the type itself.
   */
  read(type: Type, location: Node, hint?: TypeNode): TypeToken {
    return this.readAt(type, location, hint, 0);
  }

  private readAt(type: Type, location: Node, hint: TypeNode | undefined, depth: number): TypeToken {
    const alias = hint ? numericAlias(hint) : undefined;
    if (alias) {
      return TypeTokens.primitive(alias);
    }
    if (depth > MAX_DEPTH) {
      return TypeTokens.unknown;
    }
    if (type.isTypeParameter()) {
      return this.readVariable(type);
    }
    if (type.isBoolean()) {
      return TypeTokens.boolean;
    }
    if (type.isUnion()) {
      return this.readUnion(type, location, hint, depth);
    }

    const flags = type.getFlags();
    if (flags & ts.TypeFlags.Void) return TypeTokens.void;
    if (flags & ts.TypeFlags.StringLike) return TypeTokens.string;
    if (flags & ts.TypeFlags.NumberLike) return TypeTokens.double;
    if (flags & ts.TypeFlags.BigIntLike) return TypeTokens.long;
    if (flags & ts.TypeFlags.BooleanLike) return TypeTokens.boolean;
    if (!type.isObject()) return TypeTokens.unknown;

    const args = type.getTypeArguments();
    const hints = argumentHints(hint);
    const readArg = (index: number): TypeToken => {
      const arg = args[index];
      return arg ? this.readAt(arg, location, hints[index], depth + 1) : TypeTokens.unknown;
    };

    switch (type.getSymbol()?.getName()) {
      case 'Array':
      case 'ReadonlyArray':
        return TypeTokens.list(readArg(0));
      case 'Set':
      case 'ReadonlySet':
        return TypeTokens.set(readArg(0));
      case 'Map':
      case 'ReadonlyMap':
        return TypeTokens.map(readArg(0), readArg(1));
    }

    return this.readBox(type, location, hints, depth) ?? this.readObject(type);
  }

  private readVariable(type: Type): TypeToken {
    const symbol = type.getSymbol();
    const owner = symbol?.getDeclarations()[0]?.getParent();
    const scope = owner ? this.scopeOf(owner) : undefined;
    return symbol && scope ? TypeTokens.variable(symbol.getName(), scope) : TypeTokens.unknown;
  }

  /**
   * `T | undefined | null` reads as optional T; boolean and literal
   * unions collapse to their primitive. Other unions are unknown.
   */
  private readUnion(type: Type, location: Node, hint: TypeNode | undefined, depth: number): TypeToken {
    const members = type.getUnionTypes();
    const present = members.filter((member) => !member.isUndefined() && !member.isNull());
    const first = present[0];

    let inner: TypeToken = TypeTokens.unknown;
    if (present.length > 0 && present.every((member) => member.isBooleanLiteral())) {
      inner = TypeTokens.boolean;
    } else if (present.length === 1 && first) {
      inner = this.readAt(first, location, presentHint(hint), depth + 1);
    } else if (present.length > 0 && present.every((member) => member.isStringLiteral())) {
      inner = TypeTokens.string;
    } else if (present.length > 0 && present.every((member) => member.isNumberLiteral())) {
      inner = TypeTokens.double;
    }
    return present.length < members.length ? TypeTokens.optional(inner) : inner;
  }

  /**
   * A type with a zero-argument `getValue()` is an observable box;
   * a one-argument `setValue()` makes it writable.
   */
  private readBox(
    type: Type,
    location: Node,
    hints: readonly (TypeNode | undefined)[],
    depth: number
  ): TypeToken | undefined {
    const getValue = type.getProperty('getValue');
    const getter = getValue
      ? callSignatures(getValue, location).find((signature) => signature.getParameters().length === 0)
      : undefined;
    if (!getValue || !getter) {
      return undefined;
    }
    const setValue = type.getProperty('setValue');
    const writable = setValue !== undefined
      && callSignatures(setValue, location).some((signature) => signature.getParameters().length === 1);
    const valueHint = hints.length === 1 ? hints[0] : returnTypeNode(getValue);
    return TypeTokens.box(this.readAt(getter.getReturnType(), location, valueHint, depth + 1), writable);
  }

  private readObject(type: Type): TypeToken {
    const name = type.getSymbol()?.getName();
    if (!name || name.startsWith('__')) {
      return TypeTokens.object(type.getText());
    }
    return TypeTokens.object(name, supertypeNames(type));
  }
}

function numericAlias(hint: TypeNode): PrimitiveName | undefined {
  if (!Node.isTypeReference(hint)) {
    return undefined;
  }
  const name = hint.getTypeName().getText().split('.').pop();
  return name !== undefined && NUMERIC_ALIASES.has(name) && isPrimitiveName(name) ? name : undefined;
}

function isPrimitiveName(name: string): name is PrimitiveName {
  return name === 'int' || name === 'long' || name === 'double' || name === 'string' || name === 'boolean';
}

/**
 * Written type arguments of an annotation: `int[]`, `readonly int[]`
 * and `Map<string, int>` all give their element nodes.
 */
function argumentHints(hint: TypeNode | undefined): readonly (TypeNode | undefined)[] {
  if (!hint) return [];
  if (Node.isArrayTypeNode(hint)) return [hint.getElementTypeNode()];
  if (Node.isTypeOperatorTypeNode(hint)) return argumentHints(hint.getTypeNode());
  if (Node.isTypeReference(hint)) return hint.getTypeArguments();
  return [];
}

function presentHint(hint: TypeNode | undefined): TypeNode | undefined {
  if (!hint || !Node.isUnionTypeNode(hint)) {
    return hint;
  }
  const present = hint.getTypeNodes().filter((node) => node.getText() !== 'undefined' && node.getText() !== 'null');
  return present.length === 1 ? present[0] : undefined;
}

function callSignatures(symbol: MorphSymbol, location: Node): Signature[] {
  return symbol.getTypeAtLocation(location).getCallSignatures();
}

function returnTypeNode(symbol: MorphSymbol): TypeNode | undefined {
  for (const declaration of symbol.getDeclarations()) {
    if (Node.isMethodDeclaration(declaration) || Node.isMethodSignature(declaration)) {
      return declaration.getReturnTypeNode();
    }
  }
  return undefined;
}

/**
 * Names of base classes and implemented or extended interfaces, nearest
 * first.
 */
function supertypeNames(type: Type): string[] {
  const names: string[] = [];
  const seen = new Set<string>();

  const visit = (current: Type): void => {
    const implemented = (current.getSymbol()?.getDeclarations() ?? []).flatMap((declaration) =>
      Node.isClassDeclaration(declaration) ? declaration.getImplements().map((clause) => clause.getType()) : []
    );
    for (const base of [...current.getBaseTypes(), ...implemented]) {
      const name = base.getSymbol()?.getName();
      if (name && !seen.has(name)) {
        seen.add(name);
        names.push(name);
        visit(base);
      }
    }
  };

  visit(type);
  return names;
}
