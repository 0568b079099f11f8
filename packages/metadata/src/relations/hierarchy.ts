/**
 * Heritage relations over a TypeCatalog
 *
 * Computes type parameter instantiation through inheritance chains and the
 * supertype (assignability) relation between erased types.
 */

import type { TypeCatalog } from "../catalog.js";
import type {
  TypeDescriptor,
  TypeParameterDescriptor,
} from "../types/descriptor.js";
import type { ReferenceTypeRef, TypeRef } from "../types/type-ref.js";
import { ROOT_TYPE_NAME } from "../types/type-ref.js";
import {
  EMPTY_ENV,
  boundsOf,
  eraseType,
  substituteTypeRef,
  type InstantiationEnv,
} from "./substitution.js";
import { typeRefsEqual } from "./type-ops.js";

/**
 * Direct heritage edges of a descriptor: superclass first, then interfaces.
 */
export const heritageEdges = (
  descriptor: TypeDescriptor
): readonly ReferenceTypeRef[] =>
  descriptor.superclass
    ? [descriptor.superclass, ...descriptor.interfaces]
    : descriptor.interfaces;

/**
 * Bind a parent's type parameters to the arguments of a heritage edge,
 * themselves substituted with the child's environment.
 *
 * A raw edge (no type arguments) leaves the parent's parameters unbound.
 */
const instantiateEdge = (
  parent: TypeDescriptor,
  edge: ReferenceTypeRef,
  childEnv: InstantiationEnv
): InstantiationEnv => {
  const args = edge.typeArguments ?? [];
  const env = new Map<string, TypeRef>();
  parent.typeParameters.forEach((tp, i) => {
    const arg = args[i];
    if (arg) {
      env.set(tp.name, substituteTypeRef(arg, childEnv));
    }
  });
  return env;
};

/**
 * Get type parameter substitution for members declared on `targetName`
 * as seen from `subject`.
 *
 * Example:
 * ```typescript
 * class Parent<T> { getId(): T }
 * class Child extends Parent<string> {}
 *
 * // getInstantiation(catalog, Child, "Parent") → { "T" → string }
 * ```
 *
 * Returns undefined when `targetName` is not a supertype of `subject`.
 */
export const getInstantiation = (
  catalog: TypeCatalog,
  subject: TypeDescriptor,
  targetName: string
): InstantiationEnv | undefined => {
  const visited = new Set<string>();

  const search = (
    current: TypeDescriptor,
    env: InstantiationEnv
  ): InstantiationEnv | undefined => {
    if (current.name === targetName) return env;
    if (visited.has(current.name)) return undefined;
    visited.add(current.name);

    for (const edge of heritageEdges(current)) {
      const parent = catalog.get(edge.name);
      if (!parent) continue;
      const found = search(parent, instantiateEdge(parent, edge, env));
      if (found) return found;
    }
    return undefined;
  };

  return search(subject, EMPTY_ENV);
};

/**
 * All supertype names of a type (excluding itself), cycle-safe.
 * Names missing from the catalog are included but not expanded.
 */
export const supertypeNames = (
  catalog: TypeCatalog,
  name: string
): ReadonlySet<string> => {
  const result = new Set<string>();
  const pending = [name];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    const descriptor = catalog.get(current);
    if (!descriptor) continue;
    for (const edge of heritageEdges(descriptor)) {
      if (!result.has(edge.name)) {
        result.add(edge.name);
        pending.push(edge.name);
      }
    }
  }

  return result;
};

/**
 * Check whether a value of type `sub` may be used where `sup` is expected.
 * Both sides are compared in erased form.
 *
 * - equal types → true
 * - `Object` accepts every reference, array and type parameter type
 * - arrays are covariant in reference element types
 * - references follow superclass and interface edges
 * - primitives only accept themselves
 */
export const isAssignableFrom = (
  catalog: TypeCatalog,
  sup: TypeRef,
  sub: TypeRef
): boolean => {
  const erasedSup = eraseType(sup);
  const erasedSub = eraseType(sub);

  if (typeRefsEqual(erasedSup, erasedSub)) return true;

  if (erasedSup.kind === "referenceType" && erasedSup.name === ROOT_TYPE_NAME) {
    return (
      erasedSub.kind === "referenceType" || erasedSub.kind === "arrayType"
    );
  }

  if (erasedSup.kind === "arrayType" && erasedSub.kind === "arrayType") {
    if (
      erasedSup.elementType.kind === "primitiveType" ||
      erasedSub.elementType.kind === "primitiveType"
    ) {
      return false;
    }
    return isAssignableFrom(
      catalog,
      erasedSup.elementType,
      erasedSub.elementType
    );
  }

  if (erasedSup.kind === "referenceType" && erasedSub.kind === "referenceType") {
    return supertypeNames(catalog, erasedSub.name).has(erasedSup.name);
  }

  return false;
};

/**
 * Resolve the declared type of a member at the subject type.
 *
 * Type parameters of the declaring type are substituted through the
 * subject's heritage chain; what remains unresolved is erased to its bound.
 * The result is always in erased form (raw references, arrays of the
 * resolved component).
 */
export const resolveMemberType = (
  catalog: TypeCatalog,
  subject: TypeDescriptor,
  declaringType: TypeDescriptor,
  type: TypeRef,
  methodTypeParameters: readonly TypeParameterDescriptor[] = []
): TypeRef => {
  const inherited =
    declaringType.name === subject.name
      ? undefined
      : getInstantiation(catalog, subject, declaringType.name);

  if (!inherited) {
    return eraseType(
      type,
      boundsOf(methodTypeParameters, declaringType.typeParameters)
    );
  }

  // Names left in the substituted type belong to the method or the subject.
  // Parameters of the declaring type that a raw edge left unbound erase
  // to their own bound before substitution.
  const declaringBounds = boundsOf(declaringType.typeParameters);
  const env = new Map(inherited);
  for (const tp of declaringType.typeParameters) {
    if (!env.has(tp.name)) {
      env.set(tp.name, eraseType({ kind: "typeParameterType", name: tp.name }, declaringBounds));
    }
  }
  // Method-level parameters shadow the declaring type's
  for (const tp of methodTypeParameters) {
    env.delete(tp.name);
  }

  return eraseType(
    substituteTypeRef(type, env),
    boundsOf(methodTypeParameters, subject.typeParameters)
  );
};
