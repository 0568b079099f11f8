/**
 * proplens list command - list catalog types
 */

import { ROOT_TYPE_NAME, type TypeCatalog } from "@proplens/metadata";

export type TypeSummary = {
  readonly name: string;
  readonly kind: "class" | "interface";
};

/**
 * Catalog types in load order, root type excluded
 */
export const listCommand = (catalog: TypeCatalog): readonly TypeSummary[] =>
  catalog
    .all()
    .filter((d) => d.name !== ROOT_TYPE_NAME)
    .map((d) => ({ name: d.name, kind: d.kind }));

export const formatTypeList = (types: readonly TypeSummary[]): string =>
  types.map((t) => `${t.kind} ${t.name}`).join("\n");
