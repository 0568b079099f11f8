#!/usr/bin/env node
/**
 * proplens CLI - inspect accessor resolution of typed object models
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error("Fatal error:", error);
  process.exitCode = 1;
}

// Export for testing
export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
