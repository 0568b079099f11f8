/**
 * Groups enumerated methods into getter and setter candidates by
 * property name, in enumeration order.
 */

import { isBooleanType, type TypeRef } from "@proplens/metadata";
import type { EnumeratedMethod } from "./member-enumerator.js";
import {
  isGetterName,
  isSetterName,
  isValidPropertyName,
  methodToProperty,
} from "./property-namer.js";

export type AccessorCandidate = {
  readonly entry: EnumeratedMethod;
  /** Type read (return) or written (sole parameter), as declared */
  readonly declaredType: TypeRef;
  /** Same type erased at the declaration site; used for comparisons */
  readonly erasedType: TypeRef;
};

export type CandidateGroups = ReadonlyMap<string, readonly AccessorCandidate[]>;

export type ClassifiedAccessors = {
  readonly getters: CandidateGroups;
  readonly setters: CandidateGroups;
};

const addCandidate = (
  groups: Map<string, AccessorCandidate[]>,
  methodName: string,
  candidate: AccessorCandidate
): void => {
  const property = methodToProperty(methodName);
  if (property === undefined || !isValidPropertyName(property)) return;

  const existing = groups.get(property);
  if (existing) {
    existing.push(candidate);
  } else {
    groups.set(property, [candidate]);
  }
};

/**
 * Static methods never act as accessors. Names that derive an invalid
 * property name are dropped.
 */
export const classifyAccessors = (
  methods: readonly EnumeratedMethod[]
): ClassifiedAccessors => {
  const getters = new Map<string, AccessorCandidate[]>();
  const setters = new Map<string, AccessorCandidate[]>();

  for (const entry of methods) {
    const { method } = entry;
    if (method.isStatic) continue;

    const [declared, ...rest] = method.parameters;
    const [erased] = entry.erasedParameterTypes;

    if (
      declared === undefined &&
      isGetterName(method.name, isBooleanType(method.returnType))
    ) {
      addCandidate(getters, method.name, {
        entry,
        declaredType: method.returnType,
        erasedType: entry.erasedReturnType,
      });
    } else if (
      declared !== undefined &&
      erased !== undefined &&
      rest.length === 0 &&
      isSetterName(method.name)
    ) {
      addCandidate(setters, method.name, {
        entry,
        declaredType: declared,
        erasedType: erased,
      });
    }
  }

  return { getters, setters };
};
