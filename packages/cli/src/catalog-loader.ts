/**
 * Builds the type catalog from configured descriptor and source inputs
 */

import { existsSync, statSync } from "node:fs";
import {
  createTypeCatalog,
  extractDescriptorsFromFile,
  loadDescriptorDirectory,
  loadDescriptorFile,
  map,
  type Diagnostic,
  type ExtractionResult,
  type TypeCatalog,
} from "@proplens/metadata";
import type { ResolvedConfig, Result } from "./types.js";

export type LoadedCatalog = {
  readonly catalog: TypeCatalog;
  /** Non-fatal extraction warnings */
  readonly warnings: readonly Diagnostic[];
  readonly inputCount: number;
};

const loadDescriptorPath = (
  inputPath: string
): Result<ExtractionResult, Diagnostic[]> => {
  const loaded =
    existsSync(inputPath) && statSync(inputPath).isDirectory()
      ? loadDescriptorDirectory(inputPath)
      : loadDescriptorFile(inputPath);
  return map(loaded, (descriptors) => ({ descriptors, diagnostics: [] }));
};

/**
 * Load every input; fails with the errors of all failing inputs.
 * Later inputs replace same-named types from earlier ones.
 */
export const loadCatalog = (
  config: ResolvedConfig
): Result<LoadedCatalog, Diagnostic[]> => {
  const results = [
    ...config.descriptors.map(loadDescriptorPath),
    ...config.sources.map(extractDescriptorsFromFile),
  ];

  const errors = results.flatMap((r) => (r.ok ? [] : r.error));
  if (errors.length > 0) {
    return { ok: false, error: errors };
  }

  const extracted = results.flatMap((r) => (r.ok ? [r.value] : []));
  return {
    ok: true,
    value: {
      catalog: createTypeCatalog(extracted.flatMap((e) => e.descriptors)),
      warnings: extracted.flatMap((e) => e.diagnostics),
      inputCount: results.length,
    },
  };
};
