/**
 * Property Model - the accessor table built for one type
 *
 * Construction is a single synchronous pass:
 * enumerate → classify → resolve getters → resolve setters → bind fields.
 * The returned model is frozen; every later operation is a read.
 */

import {
  createTypeCatalog,
  type ConstructorDescriptor,
  type TypeCatalog,
  type TypeDescriptor,
  type TypeRef,
} from "@proplens/metadata";
import { classifyAccessors } from "./accessor-classifier.js";
import {
  InvocationFailure,
  NoDefaultConstructorError,
  NoSuchPropertyError,
  type AccessorKind,
} from "./errors.js";
import type { Invoker } from "./invokers/types.js";
import { enumerateFieldLevels, enumerateMethods } from "./member-enumerator.js";
import type { InvokerTable, ResolutionContext } from "./resolution/context.js";
import { bindFields } from "./resolution/field-binding.js";
import { resolveGetters } from "./resolution/getter-resolution.js";
import { resolveSetters } from "./resolution/setter-resolution.js";

export type BuildOptions = {
  /** Types reachable through heritage; defaults to the subject alone */
  readonly catalog?: TypeCatalog;
  /** Allow non-public members to be invoked; on unless set to false */
  readonly canBypassVisibility?: boolean;
};

export type DefaultConstructor = {
  readonly declaringType: TypeDescriptor;
  readonly descriptor: ConstructorDescriptor;
  readonly newInstance: () => unknown;
};

export type PropertyModel = {
  readonly type: () => TypeDescriptor;
  readonly readablePropertyNames: () => readonly string[];
  readonly writablePropertyNames: () => readonly string[];
  readonly hasGetter: (name: string) => boolean;
  readonly hasSetter: (name: string) => boolean;
  readonly getterType: (name: string) => TypeRef;
  readonly setterType: (name: string) => TypeRef;
  readonly getterInvoker: (name: string) => Invoker;
  readonly setterInvoker: (name: string) => Invoker;
  /** Canonical spelling of a property name, matched case-insensitively */
  readonly findCanonicalName: (name: string) => string | undefined;
  readonly hasDefaultConstructor: () => boolean;
  readonly defaultConstructor: () => DefaultConstructor;
  readonly canBypassVisibility: () => boolean;
};

const defaultConstructorOf = (
  subject: TypeDescriptor,
  canBypassVisibility: boolean
): DefaultConstructor | undefined => {
  const descriptor = subject.constructors.find((c) => c.parameters.length === 0);
  if (!descriptor) return undefined;

  const member = `constructor of '${subject.name}'`;
  const newInstance = (): unknown => {
    if (descriptor.accessibility !== "public" && !canBypassVisibility) {
      throw new InvocationFailure(
        member,
        subject.name,
        new Error(
          `constructor is ${descriptor.accessibility} and visibility bypass is disabled`
        )
      );
    }
    const runtime = subject.runtime;
    if (!runtime) {
      throw new InvocationFailure(
        member,
        subject.name,
        new Error("no runtime constructor is bound to the type")
      );
    }
    try {
      return Reflect.construct(runtime, []);
    } catch (cause) {
      throw new InvocationFailure(member, subject.name, cause);
    }
  };

  return Object.freeze({ declaringType: subject, descriptor, newInstance });
};

/**
 * Build the property model of `subject`.
 *
 * Never throws for ambiguous accessors: they are recorded as ambiguous
 * invokers and surface when invoked.
 */
export const buildPropertyModel = (
  subject: TypeDescriptor,
  options: BuildOptions = {}
): PropertyModel => {
  const canBypassVisibility = options.canBypassVisibility ?? true;
  const ctx: ResolutionContext = {
    catalog: options.catalog ?? createTypeCatalog([subject]),
    subject,
    canBypassVisibility,
  };

  const { getters, setters } = classifyAccessors(enumerateMethods(ctx.catalog, subject));
  const readers = resolveGetters(ctx, getters);
  const writers = resolveSetters(ctx, setters, readers);
  bindFields(ctx, enumerateFieldLevels(ctx.catalog, subject), readers, writers);

  const readable = Object.freeze([...readers.keys()]);
  const writable = Object.freeze([...writers.keys()]);

  const caseInsensitive = new Map<string, string>();
  for (const name of [...readable, ...writable]) {
    caseInsensitive.set(name.toUpperCase(), name);
  }

  const constructorHandle = defaultConstructorOf(subject, canBypassVisibility);

  const lookup = (table: InvokerTable, name: string, kind: AccessorKind): Invoker => {
    const invoker = table.get(name);
    if (!invoker) {
      throw new NoSuchPropertyError(name, kind, subject.name);
    }
    return invoker;
  };

  return Object.freeze({
    type: () => subject,
    readablePropertyNames: () => readable,
    writablePropertyNames: () => writable,
    hasGetter: (name: string) => readers.has(name),
    hasSetter: (name: string) => writers.has(name),
    getterType: (name: string) => lookup(readers, name, "getter").type,
    setterType: (name: string) => lookup(writers, name, "setter").type,
    getterInvoker: (name: string) => lookup(readers, name, "getter"),
    setterInvoker: (name: string) => lookup(writers, name, "setter"),
    findCanonicalName: (name: string) => caseInsensitive.get(name.toUpperCase()),
    hasDefaultConstructor: () => constructorHandle !== undefined,
    defaultConstructor: () => {
      if (!constructorHandle) {
        throw new NoDefaultConstructorError(subject.name);
      }
      return constructorHandle;
    },
    canBypassVisibility: () => canBypassVisibility,
  });
};
