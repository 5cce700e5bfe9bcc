/**
 * @arch propweave.infra
 * @intent:ast-analysis
 *
 * Host model over a ts-morph project: classes and interfaces are the
 * types, their declared members the fields and methods, and live
 * instances are driven through ordinary property access.
 */
import {
  Node,
  Project,
  Scope,
  ts,
  type ClassDeclaration,
  type ExpressionWithTypeArguments,
  type InterfaceDeclaration,
  type MethodDeclaration,
  type MethodSignature,
  type ParameterDeclaration,
  type PropertyDeclaration,
  type Symbol as MorphSymbol,
  type TypeNode,
} from 'ts-morph';
import { substituteToken, TypeTokens, variableKey, type TypeToken } from '../tokens/token.js';
import { ErrorCodes, HostModelError } from '../../utils/errors.js';
import { TokenReader } from './token-reader.js';
import type { HostField, HostMethod, HostModel, HostType } from './types.js';

type TypeDeclaration = ClassDeclaration | InterfaceDeclaration;
type MethodNode = MethodDeclaration | MethodSignature;

interface Heritage {
  readonly target: TypeDeclaration;
  readonly typeArguments: readonly TypeNode[];
}

export interface MorphProjectOptions {
  /** tsconfig.json whose files make up the project */
  tsConfigFilePath?: string;
  /** Source files to add explicitly */
  files?: readonly string[];
}

const ROOT_TYPE: HostType = { id: 'Object', name: 'Object', isInterface: false };

export class MorphHostModel implements HostModel {
  readonly rootType: HostType = ROOT_TYPE;

  private readonly types = new Map<TypeDeclaration, HostType>();
  private readonly declarations = new Map<string, TypeDeclaration>();
  private readonly methodHandles = new Map<MethodNode, HostMethod>();
  private readonly bindings = new Map<TypeDeclaration, ReadonlyMap<string, TypeToken>>();
  private readonly tokens: TokenReader;

  constructor(readonly project: Project) {
    this.tokens = new TokenReader((owner) => (isTypeDeclaration(owner) ? this.typeOf(owner).id : undefined));
  }

  /**
   * Open a project from a tsconfig, explicit files, or both.
   */
  static open(options: MorphProjectOptions): MorphHostModel {
    const project = options.tsConfigFilePath
      ? new Project({ tsConfigFilePath: options.tsConfigFilePath })
      : new Project({
          skipAddingFilesFromTsConfig: true,
          compilerOptions: { strict: true, target: ts.ScriptTarget.ES2022 },
        });
    if (options.files && options.files.length > 0) {
      project.addSourceFilesAtPaths([...options.files]);
    }
    return new MorphHostModel(project);
  }

  /**
   * Find a class or interface by name across the project's source files.
   */
  findType(name: string): HostType | undefined {
    for (const sourceFile of this.project.getSourceFiles()) {
      const declaration = sourceFile.getClass(name) ?? sourceFile.getInterface(name);
      if (declaration) {
        return this.typeOf(declaration);
      }
    }
    return undefined;
  }

  /**
   * @throws HostModelError when no class or interface has that name
   */
  getType(name: string): HostType {
    const type = this.findType(name);
    if (!type) {
      throw new HostModelError(ErrorCodes.TYPE_NOT_FOUND, `No class or interface named '${name}' in the project`, {
        name,
      });
    }
    return type;
  }

  /**
   * Every class and interface declared in non-excluded source files.
   */
  listTypes(): HostType[] {
    return this.project
      .getSourceFiles()
      .flatMap((sourceFile) => [...sourceFile.getClasses(), ...sourceFile.getInterfaces()])
      .map((declaration) => this.typeOf(declaration))
      .filter((type) => !this.isExcluded(type));
  }

  isExcluded(type: HostType): boolean {
    if (type.id === ROOT_TYPE.id) {
      return true;
    }
    const sourceFile = this.declarationOf(type).getSourceFile();
    return sourceFile.isDeclarationFile() || sourceFile.isFromExternalLibrary() || sourceFile.isInNodeModules();
  }

  getInterfaces(type: HostType): readonly HostType[] {
    const declaration = this.declarationOf(type);
    const clauses = Node.isClassDeclaration(declaration) ? declaration.getImplements() : declaration.getExtends();
    return clauses.flatMap((clause) => {
      const target = resolveHeritage(clause);
      return target ? [this.typeOf(target)] : [];
    });
  }

  getSuperclass(type: HostType): HostType | undefined {
    const declaration = this.declarationOf(type);
    if (!Node.isClassDeclaration(declaration)) {
      return undefined;
    }
    const base = declaration.getBaseClass();
    return base ? this.typeOf(base) : undefined;
  }

  getDeclaredFields(type: HostType): readonly HostField[] {
    const declaration = this.declarationOf(type);
    if (!Node.isClassDeclaration(declaration)) {
      return [];
    }
    const fields: HostField[] = [];
    for (const member of declaration.getInstanceProperties()) {
      if (Node.isPropertyDeclaration(member) || Node.isParameterDeclaration(member)) {
        if (!member.getName().startsWith('#')) {
          fields.push(this.fieldOf(type, member));
        }
      }
    }
    return fields;
  }

  getMethods(type: HostType): readonly HostMethod[] {
    const declaration = this.declarationOf(type);
    const methods: HostMethod[] = [];
    for (const symbol of declaration.getType().getProperties()) {
      const handle = this.methodOf(symbol);
      if (handle) {
        methods.push(handle);
      }
    }
    return methods;
  }

  resolveType(base: HostType, token: TypeToken): TypeToken {
    return substituteToken(token, this.bindingsOf(this.declarationOf(base)));
  }

  private typeOf(declaration: TypeDeclaration): HostType {
    const known = this.types.get(declaration);
    if (known) {
      return known;
    }
    const name = declaration.getName() ?? 'default';
    const type: HostType = {
      id: `${declaration.getSourceFile().getFilePath()}#${name}`,
      name,
      isInterface: Node.isInterfaceDeclaration(declaration),
    };
    this.types.set(declaration, type);
    this.declarations.set(type.id, declaration);
    return type;
  }

  private declarationOf(type: HostType): TypeDeclaration {
    const declaration = this.declarations.get(type.id);
    if (!declaration) {
      throw new HostModelError(ErrorCodes.FOREIGN_TYPE, `Type ${type.name} does not belong to this project model`, {
        type: type.id,
      });
    }
    return declaration;
  }

  private fieldOf(owner: HostType, member: PropertyDeclaration | ParameterDeclaration): HostField {
    return {
      memberKind: 'field',
      name: member.getName(),
      declaringType: owner,
      tags: Node.isPropertyDeclaration(member) ? jsDocTags(member) : parameterTags(member),
      valueType: this.tokens.read(member.getType(), member, member.getTypeNode()),
    };
  }

  /**
   * One handle per method declaration, so a method inherited along two
   * paths is the same object both times.
   */
  private methodOf(symbol: MorphSymbol): HostMethod | undefined {
    if (symbol.getName().startsWith('#')) {
      return undefined;
    }
    const candidates = symbol.getDeclarations().filter(isPublicMethod);
    const node = candidates.find((candidate) => Node.isMethodDeclaration(candidate) && candidate.hasBody())
      ?? candidates[0];
    if (!node) {
      return undefined;
    }
    const known = this.methodHandles.get(node);
    if (known) {
      return known;
    }
    const owner = node.getParent();
    if (!isTypeDeclaration(owner)) {
      return undefined;
    }

    const name = node.getName();
    const handle: HostMethod = {
      memberKind: 'method',
      name,
      declaringType: this.typeOf(owner),
      tags: jsDocTags(node),
      parameterTypes: node.getParameters().map((parameter) =>
        this.tokens.read(parameter.getType(), parameter, parameter.getTypeNode())
      ),
      returnType: this.tokens.read(node.getReturnType(), node, node.getReturnTypeNode()),
      isAbstract: Node.isMethodSignature(node) || node.isAbstract(),
      invoke: (instance, args) => {
        const member: unknown = Reflect.get(instance, name);
        if (typeof member !== 'function') {
          throw new TypeError(`${name} is not a method of the given instance`);
        }
        return Reflect.apply(member, instance, [...args]);
      },
    };
    this.methodHandles.set(node, handle);
    return handle;
  }

  /**
   * Bindings of every ancestor's type parameters as seen from
   * `declaration`, following heritage clauses transitively.
   */
  private bindingsOf(declaration: TypeDeclaration): ReadonlyMap<string, TypeToken> {
    const known = this.bindings.get(declaration);
    if (known) {
      return known;
    }
    const bindings = new Map<string, TypeToken>();
    this.bindings.set(declaration, bindings);

    for (const { target, typeArguments } of heritageOf(declaration)) {
      const scope = this.typeOf(target).id;
      target.getTypeParameters().forEach((parameter, index) => {
        const argument = typeArguments[index];
        const key = variableKey(scope, parameter.getName());
        if (!bindings.has(key)) {
          bindings.set(key, argument ? this.tokens.read(argument.getType(), argument, argument) : TypeTokens.unknown);
        }
      });
      for (const [key, token] of this.bindingsOf(target)) {
        if (!bindings.has(key)) {
          bindings.set(key, substituteToken(token, bindings));
        }
      }
    }
    return bindings;
  }
}

function isTypeDeclaration(node: Node | undefined): node is TypeDeclaration {
  return node !== undefined && (Node.isClassDeclaration(node) || Node.isInterfaceDeclaration(node));
}

function isPublicMethod(node: Node): node is MethodNode {
  if (Node.isMethodSignature(node)) {
    return true;
  }
  return Node.isMethodDeclaration(node) && !node.isStatic() && node.getScope() === Scope.Public;
}

function jsDocTags(node: PropertyDeclaration | MethodNode): string[] {
  return node.getJsDocs().flatMap((doc) => doc.getTags().map((tag) => tag.getTagName()));
}

/** Parameter JSDoc is not exposed by ts-morph's JSDocable API. */
function parameterTags(node: ParameterDeclaration): string[] {
  return ts.getJSDocTags(node.compilerNode).map((tag) => tag.tagName.text);
}

function resolveHeritage(clause: ExpressionWithTypeArguments): TypeDeclaration | undefined {
  const symbol = clause.getExpression().getSymbol();
  const target = symbol?.isAlias() ? symbol.getAliasedSymbol() : symbol;
  return target?.getDeclarations().find(isTypeDeclaration);
}

function heritageOf(declaration: TypeDeclaration): Heritage[] {
  const heritage: Heritage[] = [];
  if (Node.isClassDeclaration(declaration)) {
    const base = declaration.getBaseClass();
    const clause = declaration.getExtends();
    if (base && clause) {
      heritage.push({ target: base, typeArguments: clause.getTypeArguments() });
    }
  }
  const clauses = Node.isClassDeclaration(declaration) ? declaration.getImplements() : declaration.getExtends();
  for (const clause of clauses) {
    const target = resolveHeritage(clause);
    if (target) {
      heritage.push({ target, typeArguments: clause.getTypeArguments() });
    }
  }
  return heritage;
}
