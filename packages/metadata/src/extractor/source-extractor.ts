/**
 * Source extractor - builds TypeDescriptors from TypeScript declarations.
 *
 * Top-level class and interface declarations of one source file are
 * converted syntactically (no Program, no TypeChecker). Members map as:
 * - method declarations/signatures → MethodDescriptor (overload signatures
 *   replace the implementation signature)
 * - property declarations and constructor parameter properties → fields
 * - constructor declarations → ConstructorDescriptor
 *
 * `#private` members are skipped: nothing outside the class can reach them.
 */

import * as fs from "node:fs";
import * as ts from "typescript";
import type { Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import type {
  ConstructorDescriptor,
  FieldDescriptor,
  MethodDescriptor,
  TypeDescriptor,
  TypeParameterDescriptor,
} from "../types/descriptor.js";
import type { ReferenceTypeRef } from "../types/type-ref.js";
import { typeRefsEqual } from "../relations/type-ops.js";
import {
  convertTypeNode,
  inferInitializerType,
  type TypeNodeContext,
} from "./type-nodes.js";
import {
  getAccessibility,
  hasAbstractModifier,
  hasReadonlyModifier,
  hasStaticModifier,
  isParameterProperty,
} from "./modifiers.js";

export type ExtractionResult = {
  readonly descriptors: readonly TypeDescriptor[];
  /** Warnings for constructs that were lowered or skipped */
  readonly diagnostics: readonly Diagnostic[];
};

type ExtractionContext = {
  readonly sourceFile: ts.SourceFile;
  readonly diagnostics: Diagnostic[];
};

const warn = (
  ctx: ExtractionContext,
  code: DiagnosticCode,
  node: ts.Node,
  message: string
): void => {
  const start = node.getStart(ctx.sourceFile);
  const { line, character } =
    ctx.sourceFile.getLineAndCharacterOfPosition(start);
  ctx.diagnostics.push({
    code,
    severity: "warning",
    message,
    location: {
      file: ctx.sourceFile.fileName,
      line: line + 1,
      column: character + 1,
      length: node.getEnd() - start,
    },
  });
};

const typeNodeContext = (
  ctx: ExtractionContext,
  scope: ReadonlySet<string>
): TypeNodeContext => ({
  typeParameters: scope,
  onUnsupported: (node, reason) =>
    warn(
      ctx,
      "PLN2001",
      node,
      `Unsupported type annotation (${reason}) mapped to Object`
    ),
});

/**
 * Get a member name, or undefined for names no descriptor can carry.
 */
const memberName = (
  ctx: ExtractionContext,
  name: ts.PropertyName
): string | undefined => {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) {
    return name.text;
  }
  if (ts.isPrivateIdentifier(name)) {
    return undefined;
  }
  warn(ctx, "PLN2002", name, "Computed member name skipped");
  return undefined;
};

const convertTypeParameters = (
  ctx: ExtractionContext,
  params: ts.NodeArray<ts.TypeParameterDeclaration> | undefined,
  outerScope: ReadonlySet<string>
): {
  readonly descriptors: readonly TypeParameterDescriptor[];
  readonly scope: ReadonlySet<string>;
} => {
  const scope = new Set(outerScope);
  for (const param of params ?? []) {
    scope.add(param.name.text);
  }
  const typeCtx = typeNodeContext(ctx, scope);
  const descriptors = (params ?? []).map((param) =>
    param.constraint
      ? { name: param.name.text, constraint: convertTypeNode(param.constraint, typeCtx) }
      : { name: param.name.text }
  );
  return { descriptors, scope };
};

const convertHeritage = (
  ctx: ExtractionContext,
  expr: ts.ExpressionWithTypeArguments,
  scope: ReadonlySet<string>
): ReferenceTypeRef | undefined => {
  const target = expr.expression;
  const name = ts.isIdentifier(target)
    ? target.text
    : ts.isPropertyAccessExpression(target)
      ? target.getText(ctx.sourceFile)
      : undefined;
  if (!name) {
    warn(ctx, "PLN2001", expr, "Unsupported heritage expression skipped");
    return undefined;
  }
  const typeCtx = typeNodeContext(ctx, scope);
  const args = (expr.typeArguments ?? []).map((arg) => convertTypeNode(arg, typeCtx));
  return args.length > 0
    ? { kind: "referenceType", name, typeArguments: args }
    : { kind: "referenceType", name };
};

/**
 * Drop implementation signatures of overloaded functions: when several
 * declarations share a name and some have no body, only the body-less
 * overload signatures are visible to callers.
 */
const visibleSignatures = <T extends ts.FunctionLikeDeclarationBase>(
  declarations: readonly T[],
  keyOf: (declaration: T) => string | undefined
): readonly (readonly [string, T])[] => {
  const groups = new Map<string, T[]>();
  for (const declaration of declarations) {
    const key = keyOf(declaration);
    if (key === undefined) continue;
    const group = groups.get(key) ?? [];
    group.push(declaration);
    groups.set(key, group);
  }

  return [...groups.entries()].flatMap(([key, group]) => {
    const hasOverloads = group.some((d) => !d.body) && group.some((d) => d.body);
    const visible = hasOverloads ? group.filter((d) => !d.body) : group;
    return visible.map((d) => [key, d] as const);
  });
};

const convertMethod = (
  ctx: ExtractionContext,
  node: ts.MethodDeclaration | ts.MethodSignature,
  name: string,
  scope: ReadonlySet<string>,
  isInterface: boolean
): MethodDescriptor => {
  const typeParams = convertTypeParameters(ctx, node.typeParameters, scope);
  const typeCtx = typeNodeContext(ctx, typeParams.scope);
  return {
    name,
    typeParameters: typeParams.descriptors,
    parameters: node.parameters.map((p) => convertTypeNode(p.type, typeCtx)),
    returnType: convertTypeNode(node.type, typeCtx),
    accessibility: getAccessibility(node),
    isStatic: hasStaticModifier(node),
    isAbstract: isInterface || hasAbstractModifier(node),
    isBridge: false,
  };
};

const convertField = (
  ctx: ExtractionContext,
  node: ts.PropertyDeclaration | ts.ParameterDeclaration,
  name: string,
  scope: ReadonlySet<string>
): FieldDescriptor => {
  const typeCtx = typeNodeContext(ctx, scope);
  const type =
    node.type !== undefined
      ? convertTypeNode(node.type, typeCtx)
      : (inferInitializerType(node.initializer) ?? convertTypeNode(undefined, typeCtx));
  return {
    name,
    type,
    accessibility: getAccessibility(node),
    isStatic: hasStaticModifier(node),
    isReadonly: hasReadonlyModifier(node),
  };
};

type ClassExtraction = {
  readonly descriptor: TypeDescriptor;
  /** True when the class declares no constructor of its own */
  readonly implicitConstructor: boolean;
};

const convertClass = (
  ctx: ExtractionContext,
  node: ts.ClassDeclaration,
  name: string
): ClassExtraction => {
  const typeParams = convertTypeParameters(ctx, node.typeParameters, new Set());
  const scope = typeParams.scope;

  let superclass: ReferenceTypeRef | undefined;
  const interfaces: ReferenceTypeRef[] = [];
  for (const clause of node.heritageClauses ?? []) {
    for (const expr of clause.types) {
      const heritage = convertHeritage(ctx, expr, scope);
      if (!heritage) continue;
      if (clause.token === ts.SyntaxKind.ExtendsKeyword) {
        superclass = heritage;
      } else {
        interfaces.push(heritage);
      }
    }
  }

  const methodNodes = node.members.filter(ts.isMethodDeclaration);
  const methods = visibleSignatures(methodNodes, (m) =>
    memberName(ctx, m.name)
  ).map(([methodName, m]) => convertMethod(ctx, m, methodName, scope, false));

  const constructorNodes = node.members.filter(ts.isConstructorDeclaration);
  const constructors: ConstructorDescriptor[] = visibleSignatures(
    constructorNodes,
    () => "constructor"
  ).map(([, c]) => ({
    parameters: c.parameters.map((p) =>
      convertTypeNode(p.type, typeNodeContext(ctx, scope))
    ),
    accessibility: getAccessibility(c),
  }));

  const fields: FieldDescriptor[] = [];
  for (const member of node.members) {
    if (ts.isPropertyDeclaration(member)) {
      const fieldName = memberName(ctx, member.name);
      if (fieldName !== undefined) {
        fields.push(convertField(ctx, member, fieldName, scope));
      }
    }
  }
  const implementation = constructorNodes.find((c) => c.body);
  for (const param of implementation?.parameters ?? []) {
    if (isParameterProperty(param) && ts.isIdentifier(param.name)) {
      fields.push(convertField(ctx, param, param.name.text, scope));
    }
  }

  return {
    descriptor: {
      name,
      kind: "class",
      typeParameters: typeParams.descriptors,
      superclass,
      interfaces,
      methods,
      fields,
      constructors,
      isAbstract: hasAbstractModifier(node),
    },
    implicitConstructor: constructorNodes.length === 0,
  };
};

const convertInterface = (
  ctx: ExtractionContext,
  node: ts.InterfaceDeclaration
): TypeDescriptor => {
  const typeParams = convertTypeParameters(ctx, node.typeParameters, new Set());
  const scope = typeParams.scope;

  const interfaces = (node.heritageClauses ?? [])
    .flatMap((clause) => clause.types)
    .map((expr) => convertHeritage(ctx, expr, scope))
    .filter((heritage): heritage is ReferenceTypeRef => heritage !== undefined);

  const methods: MethodDescriptor[] = [];
  for (const member of node.members) {
    if (ts.isMethodSignature(member)) {
      const name = memberName(ctx, member.name);
      if (name !== undefined) {
        methods.push(convertMethod(ctx, member, name, scope, true));
      }
    }
  }

  return {
    name: node.name.text,
    kind: "interface",
    typeParameters: typeParams.descriptors,
    interfaces,
    methods,
    fields: [],
    constructors: [],
    isAbstract: true,
  };
};

/**
 * Classes without a declared constructor take their superclass's
 * constructors when the superclass is declared in the same file, and a
 * zero-parameter constructor otherwise.
 */
const resolveImplicitConstructors = (
  classes: readonly ClassExtraction[]
): ReadonlyMap<string, TypeDescriptor> => {
  const byName = new Map(classes.map((c) => [c.descriptor.name, c]));
  const resolved = new Map<string, TypeDescriptor>();

  const resolve = (
    extraction: ClassExtraction,
    visiting: ReadonlySet<string>
  ): TypeDescriptor => {
    const name = extraction.descriptor.name;
    const done = resolved.get(name);
    if (done) return done;

    let descriptor = extraction.descriptor;
    if (extraction.implicitConstructor) {
      const parentName = descriptor.superclass?.name;
      const parent = parentName !== undefined ? byName.get(parentName) : undefined;
      const constructors =
        parent && !visiting.has(parent.descriptor.name)
          ? resolve(parent, new Set([...visiting, name])).constructors
          : [{ parameters: [], accessibility: "public" as const }];
      descriptor = { ...descriptor, constructors };
    }
    resolved.set(name, descriptor);
    return descriptor;
  };

  for (const extraction of classes) {
    resolve(extraction, new Set());
  }
  return resolved;
};

/**
 * Combine repeated declarations of one interface. Members and heritage
 * accumulate in declaration order.
 */
const mergeInterfaces = (
  earlier: TypeDescriptor,
  later: TypeDescriptor
): TypeDescriptor => ({
  ...earlier,
  typeParameters:
    earlier.typeParameters.length > 0
      ? earlier.typeParameters
      : later.typeParameters,
  interfaces: [
    ...earlier.interfaces,
    ...later.interfaces.filter(
      (edge) => !earlier.interfaces.some((known) => typeRefsEqual(known, edge))
    ),
  ],
  methods: [...earlier.methods, ...later.methods],
});

/**
 * Extract descriptors for the top-level classes and interfaces of a
 * TypeScript source text, in declaration order.
 */
export const extractDescriptorsFromSource = (
  sourceText: string,
  fileName: string
): Result<ExtractionResult, Diagnostic[]> => {
  const sourceFile = ts.createSourceFile(
    fileName,
    sourceText,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const ctx: ExtractionContext = { sourceFile, diagnostics: [] };

  const order: string[] = [];
  const classes: ClassExtraction[] = [];
  const interfaces = new Map<string, TypeDescriptor>();

  for (const statement of sourceFile.statements) {
    if (ts.isClassDeclaration(statement) && statement.name) {
      order.push(statement.name.text);
      classes.push(convertClass(ctx, statement, statement.name.text));
    } else if (ts.isInterfaceDeclaration(statement)) {
      const name = statement.name.text;
      const converted = convertInterface(ctx, statement);
      const earlier = interfaces.get(name);
      if (earlier) {
        interfaces.set(name, mergeInterfaces(earlier, converted));
      } else {
        order.push(name);
        interfaces.set(name, converted);
      }
    }
  }

  const resolvedClasses = resolveImplicitConstructors(classes);
  const descriptors = order
    .map((name) => resolvedClasses.get(name) ?? interfaces.get(name))
    .filter((d): d is TypeDescriptor => d !== undefined);

  return {
    ok: true,
    value: { descriptors, diagnostics: ctx.diagnostics },
  };
};

/**
 * Read a TypeScript file and extract its descriptors.
 */
export const extractDescriptorsFromFile = (
  filePath: string
): Result<ExtractionResult, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        {
          code: "PLN1001",
          message: `Source file not found: ${filePath}`,
          severity: "error",
          location: undefined,
        },
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        {
          code: "PLN1002",
          message: `Failed to read source file: ${String(err)}`,
          severity: "error",
          location: undefined,
        },
      ],
    };
  }

  return extractDescriptorsFromSource(content, filePath);
};
