/**
 * Type parameter substitution and erasure
 *
 * Key functions:
 * - substituteTypeRef: apply type parameter bindings
 * - eraseType: drop type arguments, replace type parameters by their bound
 */

import type { TypeRef } from "../types/type-ref.js";
import { ROOT_TYPE_NAME } from "../types/type-ref.js";
import type { TypeParameterDescriptor } from "../types/descriptor.js";

/**
 * Map from type parameter name to concrete TypeRef
 */
export type InstantiationEnv = ReadonlyMap<string, TypeRef>;

export const EMPTY_ENV: InstantiationEnv = new Map();

/**
 * Apply a substitution map to a TypeRef.
 * Replaces typeParameterType nodes with their concrete values.
 */
export const substituteTypeRef = (
  type: TypeRef,
  env: InstantiationEnv
): TypeRef => {
  switch (type.kind) {
    case "typeParameterType":
      return env.get(type.name) ?? type;

    case "referenceType": {
      if (!type.typeArguments || type.typeArguments.length === 0) {
        return type;
      }
      return {
        ...type,
        typeArguments: type.typeArguments.map((arg) =>
          substituteTypeRef(arg, env)
        ),
      };
    }

    case "arrayType":
      return {
        ...type,
        elementType: substituteTypeRef(type.elementType, env),
      };

    case "primitiveType":
    case "voidType":
      return type;
  }
};

/**
 * Looks up the declared bound of a type parameter by name.
 */
export type BoundLookup = (name: string) => TypeRef | undefined;

/**
 * Build a bound lookup over several type parameter scopes.
 * Earlier scopes shadow later ones (method before declaring type).
 */
export const boundsOf = (
  ...scopes: readonly (readonly TypeParameterDescriptor[])[]
): BoundLookup => {
  return (name) => {
    for (const scope of scopes) {
      const declared = scope.find((tp) => tp.name === name);
      if (declared) return declared.constraint;
    }
    return undefined;
  };
};

/**
 * Erase a TypeRef to its raw form.
 *
 * - `List<T>` → `List`
 * - `T[]` → `<erasure of T>[]`
 * - `T extends Serializable` → `Serializable`; unbounded `T` → `Object`
 */
export const eraseType = (
  type: TypeRef,
  bounds: BoundLookup = () => undefined
): TypeRef => {
  const erase = (t: TypeRef, visiting: ReadonlySet<string>): TypeRef => {
    switch (t.kind) {
      case "primitiveType":
      case "voidType":
        return t;

      case "referenceType":
        return { kind: "referenceType", name: t.name };

      case "arrayType":
        return { kind: "arrayType", elementType: erase(t.elementType, visiting) };

      case "typeParameterType": {
        const bound = visiting.has(t.name) ? undefined : bounds(t.name);
        if (!bound) {
          return { kind: "referenceType", name: ROOT_TYPE_NAME };
        }
        return erase(bound, new Set([...visiting, t.name]));
      }
    }
  };

  return erase(type, new Set());
};
