/**
 * proplens check command - report ambiguous accessors across the catalog
 */

import { ROOT_TYPE_NAME, type TypeCatalog } from "@proplens/metadata";
import { buildPropertyModel, type Invoker } from "@proplens/reflector";

export type AmbiguityReport = {
  readonly type: string;
  readonly property: string;
  readonly side: "getter" | "setter";
  readonly message: string;
};

const ambiguityOf = (
  type: string,
  property: string,
  side: AmbiguityReport["side"],
  invoker: Invoker
): AmbiguityReport[] =>
  invoker.kind === "ambiguous"
    ? [{ type, property, side, message: invoker.message }]
    : [];

export const checkCommand = (
  catalog: TypeCatalog,
  canBypassVisibility: boolean
): readonly AmbiguityReport[] =>
  catalog
    .all()
    .filter((d) => d.name !== ROOT_TYPE_NAME)
    .flatMap((subject) => {
      const model = buildPropertyModel(subject, { catalog, canBypassVisibility });
      return [
        ...model
          .readablePropertyNames()
          .flatMap((name) =>
            ambiguityOf(subject.name, name, "getter", model.getterInvoker(name))
          ),
        ...model
          .writablePropertyNames()
          .flatMap((name) =>
            ambiguityOf(subject.name, name, "setter", model.setterInvoker(name))
          ),
      ];
    });

export const formatAmbiguities = (
  ambiguities: readonly AmbiguityReport[]
): string =>
  ambiguities
    .map((a) => `${a.type}.${a.property} (${a.side}): ${a.message}`)
    .join("\n");
