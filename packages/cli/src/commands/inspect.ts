/**
 * proplens inspect command - print the property model of one type
 */

import { formatTypeRef, type TypeCatalog } from "@proplens/metadata";
import {
  buildPropertyModel,
  describeInvoker,
  type Invoker,
  type PropertyModel,
} from "@proplens/reflector";
import type { Result } from "../types.js";

export type AccessorReport = {
  readonly type: string;
  readonly invoker: string;
  readonly ambiguous: boolean;
};

export type PropertyReport = {
  readonly name: string;
  readonly getter?: AccessorReport;
  readonly setter?: AccessorReport;
};

export type TypeReport = {
  readonly name: string;
  readonly kind: "class" | "interface";
  readonly hasDefaultConstructor: boolean;
  readonly properties: readonly PropertyReport[];
};

const accessorReport = (invoker: Invoker): AccessorReport => ({
  type: formatTypeRef(invoker.type),
  invoker: describeInvoker(invoker),
  ambiguous: invoker.kind === "ambiguous",
});

/**
 * Readable names first, then names that are only writable.
 */
export const reportModel = (model: PropertyModel): TypeReport => {
  const names = [
    ...new Set([
      ...model.readablePropertyNames(),
      ...model.writablePropertyNames(),
    ]),
  ];
  const subject = model.type();

  return {
    name: subject.name,
    kind: subject.kind,
    hasDefaultConstructor: model.hasDefaultConstructor(),
    properties: names.map((name) => ({
      name,
      getter: model.hasGetter(name)
        ? accessorReport(model.getterInvoker(name))
        : undefined,
      setter: model.hasSetter(name)
        ? accessorReport(model.setterInvoker(name))
        : undefined,
    })),
  };
};

export const inspectCommand = (
  catalog: TypeCatalog,
  typeName: string,
  canBypassVisibility: boolean
): Result<TypeReport, string> => {
  const subject = catalog.get(typeName);
  if (!subject) {
    return { ok: false, error: `Type not found: ${typeName}` };
  }
  return {
    ok: true,
    value: reportModel(
      buildPropertyModel(subject, { catalog, canBypassVisibility })
    ),
  };
};

const accessorLine = (
  label: "get" | "set",
  name: string,
  accessor: AccessorReport
): string => `  ${label} ${name}: ${accessor.type}  [${accessor.invoker}]`;

export const formatTypeReport = (report: TypeReport): string => {
  const lines = [
    `${report.kind} ${report.name}`,
    `  default constructor: ${report.hasDefaultConstructor ? "yes" : "no"}`,
  ];
  for (const property of report.properties) {
    if (property.getter) lines.push(accessorLine("get", property.name, property.getter));
    if (property.setter) lines.push(accessorLine("set", property.name, property.setter));
  }
  return lines.join("\n");
};
