/**
 * Runtime binding - attach JavaScript constructors to catalog entries
 *
 * Descriptors loaded from JSON or extracted from source carry no runtime;
 * binding one makes their properties invocable.
 */

import { createTypeCatalog, type TypeCatalog } from "./catalog.js";
import type { RuntimeConstructor } from "./types/descriptor.js";

export type RuntimeBindings = Readonly<Record<string, RuntimeConstructor>>;

/**
 * Return a catalog whose named entries carry the given constructors.
 * Names without a catalog entry are ignored.
 */
export const bindRuntimeTypes = (
  catalog: TypeCatalog,
  bindings: RuntimeBindings
): TypeCatalog =>
  createTypeCatalog(
    catalog.all().map((descriptor) => {
      const runtime = bindings[descriptor.name];
      return runtime ? { ...descriptor, runtime } : descriptor;
    })
  );
