/**
 * Type descriptor definitions
 *
 * A descriptor is the structural description of one nominal type: its
 * heritage and its declared members. Descriptors come from builder
 * literals, descriptor JSON files or TypeScript source extraction.
 *
 * Key Types:
 * - TypeDescriptor: complete declared structure of a class or interface
 * - MethodDescriptor / FieldDescriptor / ConstructorDescriptor: members
 * - RuntimeConstructor: the JavaScript constructor used for invocation
 */

import type { ReferenceTypeRef, TypeRef } from "./type-ref.js";

export type DescriptorKind = "class" | "interface";

export type Accessibility = "public" | "protected" | "private";

/**
 * Any JavaScript constructor function. Instances and static members are
 * reached through it when a property is invoked.
 */
export type RuntimeConstructor = abstract new (...args: never[]) => unknown;

/**
 * Type parameter declaration on a generic type or method.
 */
export type TypeParameterDescriptor = {
  readonly name: string;
  /** Upper bound (e.g., `T extends Serializable`) */
  readonly constraint?: TypeRef;
};

export type MethodDescriptor = {
  readonly name: string;
  readonly typeParameters: readonly TypeParameterDescriptor[];
  readonly parameters: readonly TypeRef[];
  readonly returnType: TypeRef;
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
  readonly isAbstract: boolean;
  /** Compiler-synthesized covariant-return duplicate */
  readonly isBridge: boolean;
};

export type FieldDescriptor = {
  readonly name: string;
  readonly type: TypeRef;
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
  readonly isReadonly: boolean;
};

export type ConstructorDescriptor = {
  readonly parameters: readonly TypeRef[];
  readonly accessibility: Accessibility;
};

export type TypeDescriptor = {
  readonly name: string;
  readonly kind: DescriptorKind;
  readonly typeParameters: readonly TypeParameterDescriptor[];
  /** Superclass edge; absent for interfaces and for roots */
  readonly superclass?: ReferenceTypeRef;
  /** `implements` for classes, `extends` for interfaces */
  readonly interfaces: readonly ReferenceTypeRef[];
  readonly methods: readonly MethodDescriptor[];
  readonly fields: readonly FieldDescriptor[];
  readonly constructors: readonly ConstructorDescriptor[];
  readonly isAbstract: boolean;
  readonly runtime?: RuntimeConstructor;
};
