/**
 * Structural operations on TypeRefs: equality, stable keys, display names
 */

import type { TypeRef } from "../types/type-ref.js";

/**
 * Check if two TypeRefs are structurally equal.
 */
export const typeRefsEqual = (a: TypeRef, b: TypeRef): boolean => {
  switch (a.kind) {
    case "primitiveType":
      return b.kind === "primitiveType" && a.name === b.name;

    case "typeParameterType":
      return b.kind === "typeParameterType" && a.name === b.name;

    case "referenceType": {
      if (b.kind !== "referenceType") return false;
      if (a.name !== b.name) return false;
      const aArgs = a.typeArguments ?? [];
      const bArgs = b.typeArguments ?? [];
      if (aArgs.length !== bArgs.length) return false;
      return aArgs.every((aArg, i) => {
        const bArg = bArgs[i];
        return bArg !== undefined && typeRefsEqual(aArg, bArg);
      });
    }

    case "arrayType":
      return (
        b.kind === "arrayType" && typeRefsEqual(a.elementType, b.elementType)
      );

    case "voidType":
      return b.kind === "voidType";
  }
};

/**
 * Deterministic string key for a TypeRef (used in signature keys).
 */
export const stableTypeKey = (type: TypeRef): string => {
  switch (type.kind) {
    case "primitiveType":
      return `prim:${type.name}`;
    case "typeParameterType":
      return `tp:${type.name}`;
    case "referenceType": {
      const args = type.typeArguments ?? [];
      return args.length > 0
        ? `ref:${type.name}<${args.map(stableTypeKey).join(",")}>`
        : `ref:${type.name}`;
    }
    case "arrayType":
      return `arr:${stableTypeKey(type.elementType)}`;
    case "voidType":
      return "void";
  }
};

/**
 * Human-readable type name, as shown in messages and CLI output.
 *
 * Examples: `string`, `List<T>`, `string[]`, `void`
 */
export const formatTypeRef = (type: TypeRef): string => {
  switch (type.kind) {
    case "primitiveType":
    case "typeParameterType":
      return type.name;
    case "referenceType": {
      const args = type.typeArguments ?? [];
      return args.length > 0
        ? `${type.name}<${args.map(formatTypeRef).join(", ")}>`
        : type.name;
    }
    case "arrayType":
      return `${formatTypeRef(type.elementType)}[]`;
    case "voidType":
      return "void";
  }
};

export const isBooleanType = (type: TypeRef): boolean =>
  type.kind === "primitiveType" && type.name === "boolean";
