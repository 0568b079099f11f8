/**
 * Invocation of property invokers against live objects
 */

import { formatTypeRef } from "@proplens/metadata";
import { AmbiguityError, InvocationFailure } from "../errors.js";
import type {
  AmbiguousInvoker,
  FieldAccessInvoker,
  Invoker,
  MethodCallInvoker,
} from "./types.js";

const isObjectLike = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const memberLabel = (invoker: MethodCallInvoker | FieldAccessInvoker): string =>
  invoker.kind === "methodCall"
    ? `method '${invoker.method.name}'`
    : `field '${invoker.field.name}'`;

const requireReachable = (invoker: MethodCallInvoker | FieldAccessInvoker): void => {
  if (invoker.reachable) return;
  const accessibility =
    invoker.kind === "methodCall"
      ? invoker.method.accessibility
      : invoker.field.accessibility;
  throw new InvocationFailure(
    memberLabel(invoker),
    invoker.declaringType.name,
    new Error(`member is ${accessibility} and visibility bypass is disabled`)
  );
};

const invokeMethod = (
  invoker: MethodCallInvoker,
  target: unknown,
  args: readonly unknown[]
): unknown => {
  requireReachable(invoker);
  const label = memberLabel(invoker);
  const typeName = invoker.declaringType.name;

  if (!isObjectLike(target)) {
    throw new InvocationFailure(label, typeName, new TypeError(`target is ${String(target)}`));
  }
  const fn: unknown = Reflect.get(target, invoker.method.name);
  if (typeof fn !== "function") {
    throw new InvocationFailure(
      label,
      typeName,
      new TypeError(`target has no function '${invoker.method.name}'`)
    );
  }

  try {
    return Reflect.apply(fn, target, args);
  } catch (cause) {
    throw new InvocationFailure(label, typeName, cause);
  }
};

const fieldHolder = (invoker: FieldAccessInvoker, target: unknown): object => {
  const label = memberLabel(invoker);
  const typeName = invoker.declaringType.name;

  // Static fields live on the constructor, not on instances
  if (invoker.field.isStatic) {
    const runtime = invoker.declaringType.runtime;
    if (!runtime) {
      throw new InvocationFailure(
        label,
        typeName,
        new Error("no runtime constructor is bound to the declaring type")
      );
    }
    return runtime;
  }

  if (!isObjectLike(target)) {
    throw new InvocationFailure(label, typeName, new TypeError(`target is ${String(target)}`));
  }
  return target;
};

const accessField = (
  invoker: FieldAccessInvoker,
  target: unknown,
  args: readonly unknown[]
): unknown => {
  requireReachable(invoker);
  const holder = fieldHolder(invoker, target);
  const label = memberLabel(invoker);
  const typeName = invoker.declaringType.name;
  const name = invoker.field.name;

  switch (invoker.mode) {
    case "read":
      try {
        return Reflect.get(holder, name);
      } catch (cause) {
        throw new InvocationFailure(label, typeName, cause);
      }

    case "write": {
      let written: boolean;
      try {
        written = Reflect.set(holder, name, args[0]);
      } catch (cause) {
        throw new InvocationFailure(label, typeName, cause);
      }
      if (!written) {
        throw new InvocationFailure(
          label,
          typeName,
          new TypeError(`property '${name}' is not writable`)
        );
      }
      return undefined;
    }
  }
};

const failAmbiguous = (invoker: AmbiguousInvoker): never => {
  const [typeA, typeB] = invoker.candidateTypes;
  throw new AmbiguityError(
    invoker.propertyName,
    invoker.subjectType,
    typeA,
    typeB,
    invoker.declaringType,
    invoker.message
  );
};

/**
 * Invoke a property invoker.
 *
 * - methodCall: calls the method on `target` with `args`
 * - fieldAccess read: returns the field value
 * - fieldAccess write: assigns `args[0]`, returns undefined
 * - ambiguous: throws AmbiguityError
 *
 * Any failure of the underlying access surfaces as InvocationFailure.
 */
export const invoke = (
  invoker: Invoker,
  target: unknown,
  args: readonly unknown[] = []
): unknown => {
  switch (invoker.kind) {
    case "methodCall":
      return invokeMethod(invoker, target, args);
    case "fieldAccess":
      return accessField(invoker, target, args);
    case "ambiguous":
      return failAmbiguous(invoker);
  }
};

/**
 * One-line description, e.g. `method Bean.getId(): number`.
 */
export const describeInvoker = (invoker: Invoker): string => {
  switch (invoker.kind) {
    case "methodCall": {
      const params = invoker.method.parameters.map(formatTypeRef).join(", ");
      return `method ${invoker.declaringType.name}.${invoker.method.name}(${params}): ${formatTypeRef(invoker.method.returnType)}`;
    }
    case "fieldAccess":
      return `field ${invoker.declaringType.name}.${invoker.field.name} (${invoker.mode}): ${formatTypeRef(invoker.type)}`;
    case "ambiguous": {
      const [typeA, typeB] = invoker.candidateTypes;
      return `ambiguous (${formatTypeRef(typeA)} | ${formatTypeRef(typeB)}) declared by ${invoker.declaringType}`;
    }
  }
};
