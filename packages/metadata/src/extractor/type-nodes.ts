/**
 * Type annotation conversion (TypeNode → TypeRef)
 *
 * Works on syntax only: no TypeChecker is created. Shapes without a
 * nominal counterpart (unions, literals, function types, object literals)
 * lower to the root type and are reported through `onUnsupported`.
 */

import * as ts from "typescript";
import type { TypeRef } from "../types/type-ref.js";
import { ROOT_TYPE_NAME } from "../types/type-ref.js";

const ROOT: TypeRef = { kind: "referenceType", name: ROOT_TYPE_NAME };

export type TypeNodeContext = {
  /** Type parameter names visible at the annotation */
  readonly typeParameters: ReadonlySet<string>;
  readonly onUnsupported: (node: ts.Node, reason: string) => void;
};

/**
 * Convert TypeScript primitive keyword to a TypeRef
 */
const convertKeyword = (kind: ts.SyntaxKind): TypeRef | undefined => {
  switch (kind) {
    case ts.SyntaxKind.StringKeyword:
      return { kind: "primitiveType", name: "string" };
    case ts.SyntaxKind.NumberKeyword:
      return { kind: "primitiveType", name: "number" };
    case ts.SyntaxKind.BooleanKeyword:
      return { kind: "primitiveType", name: "boolean" };
    case ts.SyntaxKind.BigIntKeyword:
      return { kind: "primitiveType", name: "bigint" };
    case ts.SyntaxKind.SymbolKeyword:
      return { kind: "primitiveType", name: "symbol" };
    case ts.SyntaxKind.VoidKeyword:
      return { kind: "voidType" };
    // Top types are the most general reference type
    case ts.SyntaxKind.AnyKeyword:
    case ts.SyntaxKind.UnknownKeyword:
    case ts.SyntaxKind.ObjectKeyword:
      return ROOT;
    default:
      return undefined;
  }
};

export const entityNameText = (name: ts.EntityName): string =>
  ts.isIdentifier(name)
    ? name.text
    : `${entityNameText(name.left)}.${name.right.text}`;

const isNullish = (node: ts.TypeNode): boolean =>
  node.kind === ts.SyntaxKind.UndefinedKeyword ||
  (ts.isLiteralTypeNode(node) &&
    node.literal.kind === ts.SyntaxKind.NullKeyword);

export const convertTypeNode = (
  node: ts.TypeNode | undefined,
  ctx: TypeNodeContext
): TypeRef => {
  if (!node) {
    return ROOT;
  }

  const keyword = convertKeyword(node.kind);
  if (keyword) return keyword;

  if (ts.isParenthesizedTypeNode(node)) {
    return convertTypeNode(node.type, ctx);
  }

  // readonly T[] is still an array
  if (
    ts.isTypeOperatorNode(node) &&
    node.operator === ts.SyntaxKind.ReadonlyKeyword
  ) {
    return convertTypeNode(node.type, ctx);
  }

  if (ts.isArrayTypeNode(node)) {
    return {
      kind: "arrayType",
      elementType: convertTypeNode(node.elementType, ctx),
    };
  }

  if (ts.isTypeReferenceNode(node)) {
    const name = entityNameText(node.typeName);
    const args = node.typeArguments ?? [];

    if (ctx.typeParameters.has(name) && args.length === 0) {
      return { kind: "typeParameterType", name };
    }

    const first = args[0];
    if ((name === "Array" || name === "ReadonlyArray") && first && args.length === 1) {
      return { kind: "arrayType", elementType: convertTypeNode(first, ctx) };
    }

    return args.length > 0
      ? {
          kind: "referenceType",
          name,
          typeArguments: args.map((arg) => convertTypeNode(arg, ctx)),
        }
      : { kind: "referenceType", name };
  }

  // T | undefined and T | null carry T's type
  if (ts.isUnionTypeNode(node)) {
    const present = node.types.filter((member) => !isNullish(member));
    const only = present[0];
    if (only && present.length === 1) {
      return convertTypeNode(only, ctx);
    }
  }

  ctx.onUnsupported(node, ts.SyntaxKind[node.kind]);
  return ROOT;
};

/**
 * Type of an unannotated property from its literal initializer.
 */
export const inferInitializerType = (
  initializer: ts.Expression | undefined
): TypeRef | undefined => {
  if (!initializer) return undefined;
  if (ts.isStringLiteralLike(initializer)) {
    return { kind: "primitiveType", name: "string" };
  }
  if (ts.isNumericLiteral(initializer)) {
    return { kind: "primitiveType", name: "number" };
  }
  if (ts.isBigIntLiteral(initializer)) {
    return { kind: "primitiveType", name: "bigint" };
  }
  if (
    initializer.kind === ts.SyntaxKind.TrueKeyword ||
    initializer.kind === ts.SyntaxKind.FalseKeyword
  ) {
    return { kind: "primitiveType", name: "boolean" };
  }
  return undefined;
};
