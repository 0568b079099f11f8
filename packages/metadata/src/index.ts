/**
 * @proplens/metadata - Public API
 */

export type {
  TypeRef,
  PrimitiveName,
  PrimitiveTypeRef,
  ReferenceTypeRef,
  TypeParameterTypeRef,
  ArrayTypeRef,
  VoidTypeRef,
} from "./types/type-ref.js";
export { ROOT_TYPE_NAME, isPrimitiveName } from "./types/type-ref.js";

export type {
  Accessibility,
  ConstructorDescriptor,
  DescriptorKind,
  FieldDescriptor,
  MethodDescriptor,
  RuntimeConstructor,
  TypeDescriptor,
  TypeParameterDescriptor,
} from "./types/descriptor.js";

export {
  primitive,
  ref,
  typeParam,
  arrayOf,
  voidType,
  method,
  field,
  ctor,
  defineClass,
  defineInterface,
} from "./types/builders.js";
export type {
  MethodOptions,
  FieldOptions,
  TypeDefinition,
} from "./types/builders.js";

export type { Result } from "./types/result.js";
export { ok, error, map, flatMap } from "./types/result.js";
export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  SourceLocation,
} from "./types/diagnostic.js";
export {
  createDiagnostic,
  formatDiagnostic,
  isError,
} from "./types/diagnostic.js";

export { createTypeCatalog, ROOT_TYPE } from "./catalog.js";
export type { TypeCatalog } from "./catalog.js";

export {
  typeRefsEqual,
  stableTypeKey,
  formatTypeRef,
  isBooleanType,
} from "./relations/type-ops.js";
export {
  substituteTypeRef,
  eraseType,
  boundsOf,
  EMPTY_ENV,
} from "./relations/substitution.js";
export type {
  InstantiationEnv,
  BoundLookup,
} from "./relations/substitution.js";
export {
  heritageEdges,
  getInstantiation,
  supertypeNames,
  isAssignableFrom,
  resolveMemberType,
} from "./relations/hierarchy.js";

export {
  DESCRIPTOR_FILE_SUFFIX,
  parseDescriptorDocument,
  loadDescriptorFile,
  loadDescriptorDirectory,
} from "./loader/descriptor-loader.js";

export {
  extractDescriptorsFromSource,
  extractDescriptorsFromFile,
} from "./extractor/source-extractor.js";
export type { ExtractionResult } from "./extractor/source-extractor.js";

export { bindRuntimeTypes } from "./runtime-binding.js";
export type { RuntimeBindings } from "./runtime-binding.js";
