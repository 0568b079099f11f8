/**
 * Reflection error taxonomy
 *
 * Thrown synchronously to the caller; the engine never recovers from or
 * logs any of them.
 */

import { formatTypeRef, type TypeRef } from "@proplens/metadata";

export type ReflectionErrorCode =
  | "PLN5001" // No such property
  | "PLN5002" // Ambiguous accessor invoked
  | "PLN5003" // No default constructor
  | "PLN5004"; // Invocation failure

export class ReflectionError extends Error {
  readonly code: ReflectionErrorCode;

  constructor(code: ReflectionErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type AccessorKind = "getter" | "setter";

export class NoSuchPropertyError extends ReflectionError {
  constructor(
    readonly propertyName: string,
    readonly kind: AccessorKind,
    readonly typeName: string
  ) {
    super(
      "PLN5001",
      `There is no ${kind} for property named '${propertyName}' in '${typeName}'`
    );
  }
}

export class AmbiguityError extends ReflectionError {
  constructor(
    readonly propertyName: string,
    readonly typeName: string,
    readonly candidateTypeA: TypeRef,
    readonly candidateTypeB: TypeRef,
    readonly declaringType: string,
    message: string
  ) {
    super("PLN5002", message);
  }

  get candidateTypeNames(): readonly [string, string] {
    return [formatTypeRef(this.candidateTypeA), formatTypeRef(this.candidateTypeB)];
  }
}

export class NoDefaultConstructorError extends ReflectionError {
  constructor(readonly typeName: string) {
    super("PLN5003", `There is no default constructor for ${typeName}`);
  }
}

const causeMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * Wraps whatever the underlying call raised; the original is kept as
 * `cause` without interpretation.
 */
export class InvocationFailure extends ReflectionError {
  constructor(
    readonly member: string,
    readonly typeName: string,
    cause: unknown
  ) {
    super(
      "PLN5004",
      `Could not invoke ${member} on '${typeName}': ${causeMessage(cause)}`,
      { cause }
    );
  }
}
