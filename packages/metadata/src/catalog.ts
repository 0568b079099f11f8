/**
 * Type catalog - name → descriptor lookup
 *
 * INVARIANT: every catalog contains the root type `Object`, so heritage
 * walks and assignability checks always terminate at a known entry.
 */

import type { TypeDescriptor } from "./types/descriptor.js";
import { ROOT_TYPE_NAME } from "./types/type-ref.js";
import { defineClass, ctor } from "./types/builders.js";

export type TypeCatalog = {
  readonly get: (name: string) => TypeDescriptor | undefined;
  readonly has: (name: string) => boolean;
  /** Descriptors in insertion order, root type first */
  readonly all: () => readonly TypeDescriptor[];
};

export const ROOT_TYPE: TypeDescriptor = defineClass(ROOT_TYPE_NAME, {
  constructors: [ctor()],
  runtime: Object,
});

/**
 * Create a catalog from descriptors. A later descriptor replaces an
 * earlier one with the same name (including the root type).
 */
export const createTypeCatalog = (
  descriptors: readonly TypeDescriptor[]
): TypeCatalog => {
  const entries = new Map<string, TypeDescriptor>();
  entries.set(ROOT_TYPE.name, ROOT_TYPE);
  for (const descriptor of descriptors) {
    entries.set(descriptor.name, descriptor);
  }

  const snapshot = [...entries.values()];

  return {
    get: (name) => entries.get(name),
    has: (name) => entries.has(name),
    all: () => snapshot,
  };
};
