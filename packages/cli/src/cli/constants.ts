/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);

// Sources sit two levels below the cli manifest; the build output in dist/
// sits four levels below the root manifest.
const MANIFEST_PATHS = ["../../package.json", "../../../../package.json"];

const loadManifest = (): unknown => {
  for (const manifestPath of MANIFEST_PATHS) {
    try {
      return require(manifestPath);
    } catch (error) {
      if (!isModuleNotFound(error)) throw error;
    }
  }
  return undefined;
};

const isModuleNotFound = (error: unknown): boolean =>
  error instanceof Error && Reflect.get(error, "code") === "MODULE_NOT_FOUND";

const packageJson = loadManifest();

const readVersion = (data: unknown): string => {
  const version: unknown =
    typeof data === "object" && data !== null ? Reflect.get(data, "version") : undefined;
  return typeof version === "string" ? version : "0.0.0";
};

export const VERSION = readVersion(packageJson);

/**
 * Process exit codes
 */
export const EXIT_OK = 0;
export const EXIT_LOAD_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_TYPE_NOT_FOUND = 3;
export const EXIT_AMBIGUITIES = 4;
