/**
 * Type references used by descriptors (TypeRef and its variants)
 */

export type TypeRef =
  | PrimitiveTypeRef
  | ReferenceTypeRef
  | TypeParameterTypeRef
  | ArrayTypeRef
  | VoidTypeRef;

export type PrimitiveName = "boolean" | "number" | "bigint" | "string" | "symbol";

export type PrimitiveTypeRef = {
  readonly kind: "primitiveType";
  readonly name: PrimitiveName;
};

export type ReferenceTypeRef = {
  readonly kind: "referenceType";
  readonly name: string;
  readonly typeArguments?: readonly TypeRef[];
};

/**
 * Type parameter reference (e.g., T in Parent<T>)
 *
 * Resolved against the subject type's heritage chain; unresolved
 * parameters erase to their bound.
 */
export type TypeParameterTypeRef = {
  readonly kind: "typeParameterType";
  readonly name: string;
};

export type ArrayTypeRef = {
  readonly kind: "arrayType";
  readonly elementType: TypeRef;
};

export type VoidTypeRef = {
  readonly kind: "voidType";
};

/**
 * Name of the root reference type. Every reference, array and type
 * parameter type is assignable to it.
 */
export const ROOT_TYPE_NAME = "Object";

export const PRIMITIVE_NAMES: readonly PrimitiveName[] = [
  "boolean",
  "number",
  "bigint",
  "string",
  "symbol",
];

export const isPrimitiveName = (name: string): name is PrimitiveName =>
  PRIMITIVE_NAMES.some((candidate) => candidate === name);
