/**
 * Invoker - the callable handle bound to one side of a property
 */

import type {
  FieldDescriptor,
  MethodDescriptor,
  TypeDescriptor,
  TypeRef,
} from "@proplens/metadata";

export type Invoker = MethodCallInvoker | FieldAccessInvoker | AmbiguousInvoker;

export type MethodCallInvoker = {
  readonly kind: "methodCall";
  readonly method: MethodDescriptor;
  readonly declaringType: TypeDescriptor;
  /** Declared type of the value read or written, resolved at the subject */
  readonly type: TypeRef;
  /** False for non-public members when visibility bypass is off */
  readonly reachable: boolean;
};

export type FieldAccessMode = "read" | "write";

export type FieldAccessInvoker = {
  readonly kind: "fieldAccess";
  readonly mode: FieldAccessMode;
  readonly field: FieldDescriptor;
  readonly declaringType: TypeDescriptor;
  readonly type: TypeRef;
  readonly reachable: boolean;
};

/**
 * Stand-in for a property whose accessors could not be disambiguated.
 * Invoking it always fails.
 */
export type AmbiguousInvoker = {
  readonly kind: "ambiguous";
  readonly propertyName: string;
  readonly subjectType: string;
  /** Type whose member triggered the ambiguity */
  readonly declaringType: string;
  readonly candidateTypes: readonly [TypeRef, TypeRef];
  readonly message: string;
  readonly type: TypeRef;
};
