/**
 * Descriptor builders
 *
 * Small constructors for TypeRefs and descriptors so hand-written
 * descriptor tables stay readable. Every optional attribute falls back to
 * the most common declaration (public, instance, non-abstract).
 */

import type {
  ArrayTypeRef,
  PrimitiveName,
  PrimitiveTypeRef,
  ReferenceTypeRef,
  TypeParameterTypeRef,
  TypeRef,
  VoidTypeRef,
} from "./type-ref.js";
import type {
  Accessibility,
  ConstructorDescriptor,
  FieldDescriptor,
  MethodDescriptor,
  RuntimeConstructor,
  TypeDescriptor,
  TypeParameterDescriptor,
} from "./descriptor.js";

export const primitive = (name: PrimitiveName): PrimitiveTypeRef => ({
  kind: "primitiveType",
  name,
});

export const ref = (
  name: string,
  typeArguments?: readonly TypeRef[]
): ReferenceTypeRef =>
  typeArguments && typeArguments.length > 0
    ? { kind: "referenceType", name, typeArguments }
    : { kind: "referenceType", name };

export const typeParam = (name: string): TypeParameterTypeRef => ({
  kind: "typeParameterType",
  name,
});

export const arrayOf = (elementType: TypeRef): ArrayTypeRef => ({
  kind: "arrayType",
  elementType,
});

export const voidType = (): VoidTypeRef => ({ kind: "voidType" });

export type MethodOptions = {
  readonly typeParameters?: readonly TypeParameterDescriptor[];
  readonly accessibility?: Accessibility;
  readonly isStatic?: boolean;
  readonly isAbstract?: boolean;
  readonly isBridge?: boolean;
};

export const method = (
  name: string,
  parameters: readonly TypeRef[],
  returnType: TypeRef,
  options: MethodOptions = {}
): MethodDescriptor => ({
  name,
  typeParameters: options.typeParameters ?? [],
  parameters,
  returnType,
  accessibility: options.accessibility ?? "public",
  isStatic: options.isStatic ?? false,
  isAbstract: options.isAbstract ?? false,
  isBridge: options.isBridge ?? false,
});

export type FieldOptions = {
  readonly accessibility?: Accessibility;
  readonly isStatic?: boolean;
  readonly isReadonly?: boolean;
};

export const field = (
  name: string,
  type: TypeRef,
  options: FieldOptions = {}
): FieldDescriptor => ({
  name,
  type,
  accessibility: options.accessibility ?? "public",
  isStatic: options.isStatic ?? false,
  isReadonly: options.isReadonly ?? false,
});

export const ctor = (
  parameters: readonly TypeRef[] = [],
  accessibility: Accessibility = "public"
): ConstructorDescriptor => ({ parameters, accessibility });

export type TypeDefinition = {
  readonly typeParameters?: readonly TypeParameterDescriptor[];
  readonly superclass?: ReferenceTypeRef;
  readonly interfaces?: readonly ReferenceTypeRef[];
  readonly methods?: readonly MethodDescriptor[];
  readonly fields?: readonly FieldDescriptor[];
  readonly constructors?: readonly ConstructorDescriptor[];
  readonly isAbstract?: boolean;
  readonly runtime?: RuntimeConstructor;
};

export const defineClass = (
  name: string,
  definition: TypeDefinition = {}
): TypeDescriptor => ({
  name,
  kind: "class",
  typeParameters: definition.typeParameters ?? [],
  superclass: definition.superclass,
  interfaces: definition.interfaces ?? [],
  methods: definition.methods ?? [],
  fields: definition.fields ?? [],
  constructors: definition.constructors ?? [],
  isAbstract: definition.isAbstract ?? false,
  runtime: definition.runtime,
});

export const defineInterface = (
  name: string,
  definition: Omit<TypeDefinition, "superclass" | "fields" | "constructors"> = {}
): TypeDescriptor => ({
  name,
  kind: "interface",
  typeParameters: definition.typeParameters ?? [],
  interfaces: definition.interfaces ?? [],
  methods: (definition.methods ?? []).map((m) => ({ ...m, isAbstract: true })),
  fields: [],
  constructors: [],
  isAbstract: true,
  runtime: definition.runtime,
});
