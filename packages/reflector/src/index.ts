/**
 * @proplens/reflector - Public API
 */

export { buildPropertyModel } from "./property-model.js";
export type {
  BuildOptions,
  DefaultConstructor,
  PropertyModel,
} from "./property-model.js";

export type {
  Invoker,
  MethodCallInvoker,
  FieldAccessInvoker,
  FieldAccessMode,
  AmbiguousInvoker,
} from "./invokers/types.js";
export { invoke, describeInvoker } from "./invokers/invoke.js";

export {
  ReflectionError,
  NoSuchPropertyError,
  AmbiguityError,
  NoDefaultConstructorError,
  InvocationFailure,
} from "./errors.js";
export type { AccessorKind, ReflectionErrorCode } from "./errors.js";

export {
  isValidPropertyName,
  isGetterName,
  isSetterName,
  methodToProperty,
} from "./property-namer.js";
export { enumerateMethods, enumerateFieldLevels } from "./member-enumerator.js";
export type { EnumeratedMethod, FieldLevel } from "./member-enumerator.js";
export { classifyAccessors } from "./accessor-classifier.js";
export type {
  AccessorCandidate,
  CandidateGroups,
  ClassifiedAccessors,
} from "./accessor-classifier.js";
