/**
 * Member enumeration over a type's hierarchy
 *
 * Methods are collected from the subject, then each of its interfaces
 * (depth first through super-interfaces), then the superclass, and so on
 * up to the root type. The first declaration seen for a signature wins;
 * later ones with the same erased signature are overridden copies.
 */

import {
  ROOT_TYPE_NAME,
  boundsOf,
  eraseType,
  stableTypeKey,
  type FieldDescriptor,
  type MethodDescriptor,
  type TypeCatalog,
  type TypeDescriptor,
  type TypeRef,
} from "@proplens/metadata";

export type EnumeratedMethod = {
  readonly method: MethodDescriptor;
  readonly declaringType: TypeDescriptor;
  /** Parameter types erased at the declaration site */
  readonly erasedParameterTypes: readonly TypeRef[];
  /** Return type erased at the declaration site */
  readonly erasedReturnType: TypeRef;
};

export type FieldLevel = {
  readonly declaringType: TypeDescriptor;
  readonly fields: readonly FieldDescriptor[];
};

const enumerate = (
  method: MethodDescriptor,
  declaringType: TypeDescriptor
): EnumeratedMethod => {
  const bounds = boundsOf(method.typeParameters, declaringType.typeParameters);
  return {
    method,
    declaringType,
    erasedParameterTypes: method.parameters.map((p) => eraseType(p, bounds)),
    erasedReturnType: eraseType(method.returnType, bounds),
  };
};

/**
 * Erased return type, name and erased parameter types.
 */
export const signatureKey = (entry: EnumeratedMethod): string =>
  `${stableTypeKey(entry.erasedReturnType)}#${entry.method.name}:${entry.erasedParameterTypes
    .map(stableTypeKey)
    .join(",")}`;

/**
 * Collect the unique, non-bridge methods visible on `subject`.
 * Types named in heritage but missing from the catalog are skipped.
 */
export const enumerateMethods = (
  catalog: TypeCatalog,
  subject: TypeDescriptor
): readonly EnumeratedMethod[] => {
  const unique = new Map<string, EnumeratedMethod>();
  const visited = new Set<string>();

  const addDeclared = (declaringType: TypeDescriptor): void => {
    for (const method of declaringType.methods) {
      if (method.isBridge) continue;
      const entry = enumerate(method, declaringType);
      const key = signatureKey(entry);
      if (!unique.has(key)) {
        unique.set(key, entry);
      }
    }
  };

  const addInterface = (name: string): void => {
    if (visited.has(name)) return;
    visited.add(name);
    const descriptor = catalog.get(name);
    if (!descriptor) return;
    addDeclared(descriptor);
    for (const parent of descriptor.interfaces) {
      addInterface(parent.name);
    }
  };

  let current: TypeDescriptor | undefined = subject;
  while (current && current.name !== ROOT_TYPE_NAME && !visited.has(current.name)) {
    visited.add(current.name);
    addDeclared(current);
    for (const iface of current.interfaces) {
      addInterface(iface.name);
    }
    current = current.superclass ? catalog.get(current.superclass.name) : undefined;
  }

  return [...unique.values()];
};

/**
 * Declared fields per hierarchy level, subject first, root type excluded.
 */
export const enumerateFieldLevels = (
  catalog: TypeCatalog,
  subject: TypeDescriptor
): readonly FieldLevel[] => {
  const levels: FieldLevel[] = [];
  const visited = new Set<string>();

  let current: TypeDescriptor | undefined = subject;
  while (current && current.name !== ROOT_TYPE_NAME && !visited.has(current.name)) {
    visited.add(current.name);
    levels.push({ declaringType: current, fields: current.fields });
    current = current.superclass ? catalog.get(current.superclass.name) : undefined;
  }

  return levels;
};
