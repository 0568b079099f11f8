/**
 * Type definitions for CLI
 */

export type { Result } from "@proplens/metadata";

/**
 * Proplens configuration file (proplens.json)
 */
export type ProplensConfig = {
  readonly $schema?: string;
  /** Descriptor files or directories of .descriptors.json files */
  readonly descriptors?: readonly string[];
  /** TypeScript source files to extract descriptors from */
  readonly sources?: readonly string[];
  readonly canBypassVisibility?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  descriptors?: string[];
  sources?: string[];
  bypassVisibility?: boolean;
  json?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing proplens.json, or cwd
  readonly descriptors: readonly string[]; // Absolute paths
  readonly sources: readonly string[]; // Absolute paths
  readonly canBypassVisibility: boolean;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
