/**
 * Descriptor JSON loader - Reads and validates .descriptors.json files.
 *
 * This module provides pure functions to load type descriptor documents
 * and normalize them into TypeDescriptors. Optional member attributes fall
 * back to the same defaults as the builders.
 *
 * Document shape:
 * ```json
 * { "types": [{ "name": "User", "kind": "class", "methods": [...] }] }
 * ```
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import type {
  Accessibility,
  ConstructorDescriptor,
  DescriptorKind,
  FieldDescriptor,
  MethodDescriptor,
  TypeDescriptor,
  TypeParameterDescriptor,
} from "../types/descriptor.js";
import type { ReferenceTypeRef, TypeRef } from "../types/type-ref.js";
import { isPrimitiveName } from "../types/type-ref.js";

export const DESCRIPTOR_FILE_SUFFIX = ".descriptors.json";

const fail = <T>(code: DiagnosticCode, message: string): Result<T, Diagnostic[]> => ({
  ok: false,
  error: [{ code, message, severity: "error", location: undefined }],
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Collects diagnostics while a document is walked.
 */
type Validation = {
  readonly diagnostics: Diagnostic[];
  readonly report: (code: DiagnosticCode, message: string) => void;
};

const createValidation = (): Validation => {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    report: (code, message) => {
      diagnostics.push({ code, message, severity: "error", location: undefined });
    },
  };
};

const parseTypeRef = (
  data: unknown,
  context: string,
  v: Validation
): TypeRef | undefined => {
  if (!isRecord(data)) {
    v.report("PLN9009", `Invalid type reference in ${context}: must be an object`);
    return undefined;
  }

  switch (data.kind) {
    case "primitiveType":
      if (typeof data.name === "string" && isPrimitiveName(data.name)) {
        return { kind: "primitiveType", name: data.name };
      }
      v.report("PLN9009", `Invalid primitive type name in ${context}`);
      return undefined;

    case "referenceType":
      return parseReferenceRef(data, context, v);

    case "typeParameterType":
      if (typeof data.name === "string") {
        return { kind: "typeParameterType", name: data.name };
      }
      v.report("PLN9009", `Invalid type parameter reference in ${context}`);
      return undefined;

    case "arrayType": {
      const elementType = parseTypeRef(data.elementType, context, v);
      return elementType ? { kind: "arrayType", elementType } : undefined;
    }

    case "voidType":
      return { kind: "voidType" };

    default:
      v.report(
        "PLN9009",
        `Invalid type reference in ${context}: unknown kind '${String(data.kind)}'`
      );
      return undefined;
  }
};

const parseReferenceRef = (
  data: unknown,
  context: string,
  v: Validation
): ReferenceTypeRef | undefined => {
  if (!isRecord(data) || data.kind !== "referenceType" || typeof data.name !== "string") {
    v.report("PLN9009", `Invalid reference type in ${context}`);
    return undefined;
  }
  if (data.typeArguments === undefined) {
    return { kind: "referenceType", name: data.name };
  }
  if (!Array.isArray(data.typeArguments)) {
    v.report("PLN9009", `Invalid 'typeArguments' in ${context}: must be an array`);
    return undefined;
  }
  const typeArguments = parseTypeRefList(data.typeArguments, context, v);
  return typeArguments ? { kind: "referenceType", name: data.name, typeArguments } : undefined;
};

const parseTypeRefList = (
  data: readonly unknown[],
  context: string,
  v: Validation
): readonly TypeRef[] | undefined => {
  const refs: TypeRef[] = [];
  for (const item of data) {
    const parsed = parseTypeRef(item, context, v);
    if (!parsed) return undefined;
    refs.push(parsed);
  }
  return refs;
};

const parseAccessibility = (
  data: unknown,
  context: string,
  v: Validation
): Accessibility => {
  if (data === undefined) return "public";
  if (data === "public" || data === "protected" || data === "private") {
    return data;
  }
  v.report(
    "PLN9011",
    `Invalid ${context}: 'accessibility' must be one of public, protected, private`
  );
  return "public";
};

const parseFlag = (
  data: Record<string, unknown>,
  key: string,
  context: string,
  v: Validation
): boolean => {
  const value = data[key];
  if (value === undefined) return false;
  if (typeof value === "boolean") return value;
  v.report("PLN9010", `Invalid ${context}: '${key}' must be a boolean`);
  return false;
};

const parseList = <T>(
  data: Record<string, unknown>,
  key: string,
  context: string,
  v: Validation,
  parseItem: (item: unknown, itemContext: string) => T | undefined
): readonly T[] => {
  const value = data[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    v.report("PLN9007", `Invalid ${context}: '${key}' must be an array`);
    return [];
  }
  const items: T[] = [];
  value.forEach((item, i) => {
    const parsed = parseItem(item, `${key}[${i}] of ${context}`);
    if (parsed) items.push(parsed);
  });
  return items;
};

const parseTypeParameter = (
  data: unknown,
  context: string,
  v: Validation
): TypeParameterDescriptor | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    v.report("PLN9010", `Invalid ${context}: type parameter needs a 'name'`);
    return undefined;
  }
  if (data.constraint === undefined) {
    return { name: data.name };
  }
  const constraint = parseTypeRef(data.constraint, context, v);
  return constraint ? { name: data.name, constraint } : undefined;
};

const parseParameters = (
  data: Record<string, unknown>,
  context: string,
  v: Validation
): readonly TypeRef[] | undefined => {
  if (data.parameters === undefined) return [];
  if (!Array.isArray(data.parameters)) {
    v.report("PLN9010", `Invalid ${context}: 'parameters' must be an array`);
    return undefined;
  }
  return parseTypeRefList(data.parameters, context, v);
};

const parseMethod = (
  data: unknown,
  context: string,
  v: Validation
): MethodDescriptor | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    v.report("PLN9010", `Invalid ${context}: method needs a 'name'`);
    return undefined;
  }
  const parameters = parseParameters(data, context, v);
  if (!parameters) return undefined;
  const returnType =
    data.returnType === undefined
      ? ({ kind: "voidType" } as const)
      : parseTypeRef(data.returnType, context, v);
  if (!returnType) return undefined;

  return {
    name: data.name,
    typeParameters: parseList(data, "typeParameters", context, v, (item, c) =>
      parseTypeParameter(item, c, v)
    ),
    parameters,
    returnType,
    accessibility: parseAccessibility(data.accessibility, context, v),
    isStatic: parseFlag(data, "isStatic", context, v),
    isAbstract: parseFlag(data, "isAbstract", context, v),
    isBridge: parseFlag(data, "isBridge", context, v),
  };
};

const parseField = (
  data: unknown,
  context: string,
  v: Validation
): FieldDescriptor | undefined => {
  if (!isRecord(data) || typeof data.name !== "string") {
    v.report("PLN9010", `Invalid ${context}: field needs a 'name'`);
    return undefined;
  }
  const type = parseTypeRef(data.type, context, v);
  if (!type) return undefined;
  return {
    name: data.name,
    type,
    accessibility: parseAccessibility(data.accessibility, context, v),
    isStatic: parseFlag(data, "isStatic", context, v),
    isReadonly: parseFlag(data, "isReadonly", context, v),
  };
};

const parseConstructor = (
  data: unknown,
  context: string,
  v: Validation
): ConstructorDescriptor | undefined => {
  if (!isRecord(data)) {
    v.report("PLN9010", `Invalid ${context}: constructor must be an object`);
    return undefined;
  }
  const parameters = parseParameters(data, context, v);
  if (!parameters) return undefined;
  return {
    parameters,
    accessibility: parseAccessibility(data.accessibility, context, v),
  };
};

const parseTypeDescriptor = (
  data: unknown,
  context: string,
  v: Validation
): TypeDescriptor | undefined => {
  if (!isRecord(data)) {
    v.report("PLN9006", `Invalid ${context}: must be an object`);
    return undefined;
  }

  if (typeof data.name !== "string" || data.name.length === 0) {
    v.report("PLN9007", `Invalid ${context}: missing or invalid 'name'`);
    return undefined;
  }

  const validKinds: DescriptorKind[] = ["class", "interface"];
  const kind = validKinds.find((k) => k === data.kind);
  if (!kind) {
    v.report(
      "PLN9008",
      `Invalid ${context}: 'kind' must be one of ${validKinds.join(", ")}`
    );
    return undefined;
  }

  const named = `${context} (${data.name})`;
  const superclass =
    data.superclass === undefined
      ? undefined
      : parseReferenceRef(data.superclass, named, v);

  return {
    name: data.name,
    kind,
    typeParameters: parseList(data, "typeParameters", named, v, (item, c) =>
      parseTypeParameter(item, c, v)
    ),
    superclass,
    interfaces: parseList(data, "interfaces", named, v, (item, c) =>
      parseReferenceRef(item, c, v)
    ),
    methods: parseList(data, "methods", named, v, (item, c) =>
      parseMethod(item, c, v)
    ),
    fields: parseList(data, "fields", named, v, (item, c) =>
      parseField(item, c, v)
    ),
    constructors: parseList(data, "constructors", named, v, (item, c) =>
      parseConstructor(item, c, v)
    ),
    isAbstract: kind === "interface" || parseFlag(data, "isAbstract", named, v),
  };
};

/**
 * Validate a parsed descriptor document.
 *
 * @param data - Parsed JSON data
 * @param fileLabel - Name used in diagnostic messages
 */
export const parseDescriptorDocument = (
  data: unknown,
  fileLabel: string
): Result<readonly TypeDescriptor[], Diagnostic[]> => {
  if (!isRecord(data)) {
    return fail(
      "PLN9004",
      `Descriptor file must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
    );
  }

  if (!Array.isArray(data.types)) {
    return fail("PLN9005", `Missing or invalid 'types' field in ${fileLabel}`);
  }

  const v = createValidation();
  const descriptors: TypeDescriptor[] = [];
  data.types.forEach((item, i) => {
    const descriptor = parseTypeDescriptor(item, `type ${i} in ${fileLabel}`, v);
    if (descriptor) descriptors.push(descriptor);
  });

  if (v.diagnostics.length > 0) {
    return { ok: false, error: v.diagnostics };
  }

  return { ok: true, value: descriptors };
};

/**
 * Load and parse a .descriptors.json file.
 *
 * @param filePath - Path to the descriptor file
 * @returns Result containing descriptors or diagnostics
 */
export const loadDescriptorFile = (
  filePath: string
): Result<readonly TypeDescriptor[], Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return fail("PLN9001", `Descriptor file not found: ${filePath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return fail("PLN9002", `Failed to read descriptor file: ${String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return fail("PLN9003", `Invalid JSON in descriptor file: ${String(err)}`);
  }

  return parseDescriptorDocument(parsed, path.basename(filePath));
};

/**
 * Load every .descriptors.json file in a directory (non-recursive),
 * in file name order.
 */
export const loadDescriptorDirectory = (
  dirPath: string
): Result<readonly TypeDescriptor[], Diagnostic[]> => {
  if (!fs.existsSync(dirPath)) {
    return fail("PLN9016", `Descriptor directory not found: ${dirPath}`);
  }

  if (!fs.statSync(dirPath).isDirectory()) {
    return fail("PLN9017", `Not a directory: ${dirPath}`);
  }

  const files = fs
    .readdirSync(dirPath)
    .filter((file) => file.endsWith(DESCRIPTOR_FILE_SUFFIX))
    .sort();

  if (files.length === 0) {
    return fail("PLN9018", `No ${DESCRIPTOR_FILE_SUFFIX} files found in ${dirPath}`);
  }

  const descriptors: TypeDescriptor[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const file of files) {
    const result = loadDescriptorFile(path.join(dirPath, file));
    if (result.ok) {
      descriptors.push(...result.value);
    } else {
      diagnostics.push(...result.error);
    }
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: descriptors };
};
