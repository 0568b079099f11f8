/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@proplens/metadata";
import { loadCatalog } from "../catalog-loader.js";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import { formatTypeReport, inspectCommand } from "../commands/inspect.js";
import { formatTypeList, listCommand } from "../commands/list.js";
import { checkCommand, formatAmbiguities } from "../commands/check.js";
import type { ProplensConfig, ResolvedConfig } from "../types.js";
import {
  EXIT_AMBIGUITIES,
  EXIT_LOAD_FAILURE,
  EXIT_OK,
  EXIT_TYPE_NOT_FOUND,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

const COMMANDS: ReadonlySet<string> = new Set(["inspect", "list", "check"]);

const printJson = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

type ConfigLoad =
  | { readonly ok: true; readonly config: ResolvedConfig }
  | { readonly ok: false };

const loadResolvedConfig = (parsed: ParsedArgs, cwd: string): ConfigLoad => {
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: ProplensConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return { ok: false };
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing proplens.json
  const projectRoot = configPath ? dirname(configPath) : cwd;
  const config = resolveConfig(fileConfig, parsed.options, projectRoot, cwd);

  if (config.verbose) {
    console.error(`Config: ${configPath ?? "(none)"}`);
  }
  return { ok: true, config };
};

/**
 * Main CLI entry point
 */
export const runCli = (args: readonly string[], cwd: string = process.cwd()): number => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`proplens v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  if (!COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'proplens --help' for usage information");
    return EXIT_USAGE;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      console.error(`Error: ${message}`);
    }
    return EXIT_USAGE;
  }

  if (parsed.command === "inspect" && !parsed.typeName) {
    console.error("Error: Type name required");
    console.error("Usage: proplens inspect <Type>");
    return EXIT_USAGE;
  }

  const configLoad = loadResolvedConfig(parsed, cwd);
  if (!configLoad.ok) {
    return EXIT_LOAD_FAILURE;
  }
  const config = configLoad.config;

  if (config.descriptors.length === 0 && config.sources.length === 0) {
    console.error("Error: No descriptor or source inputs configured");
    console.error("Pass --descriptors or --source, or list them in proplens.json");
    return EXIT_LOAD_FAILURE;
  }

  const loaded = loadCatalog(config);
  if (!loaded.ok) {
    for (const diagnostic of loaded.error) {
      console.error(formatDiagnostic(diagnostic));
    }
    return EXIT_LOAD_FAILURE;
  }

  const { catalog, warnings, inputCount } = loaded.value;
  if (!config.quiet) {
    for (const warning of warnings) {
      console.error(formatDiagnostic(warning));
    }
  }
  if (config.verbose) {
    console.error(
      `Loaded ${catalog.all().length - 1} types from ${inputCount} inputs`
    );
  }

  // Dispatch to command handlers
  switch (parsed.command) {
    case "inspect": {
      const result = inspectCommand(
        catalog,
        parsed.typeName ?? "",
        config.canBypassVisibility
      );
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_TYPE_NOT_FOUND;
      }
      if (config.json) {
        printJson(result.value);
      } else {
        console.log(formatTypeReport(result.value));
      }
      return EXIT_OK;
    }

    case "list": {
      const types = listCommand(catalog);
      if (config.json) {
        printJson(types);
      } else if (types.length > 0) {
        console.log(formatTypeList(types));
      }
      return EXIT_OK;
    }

    case "check": {
      const ambiguities = checkCommand(catalog, config.canBypassVisibility);
      if (config.json) {
        printJson(ambiguities);
      } else if (ambiguities.length > 0) {
        console.log(formatAmbiguities(ambiguities));
      } else if (!config.quiet) {
        console.log("No ambiguous accessors found");
      }
      return ambiguities.length > 0 ? EXIT_AMBIGUITIES : EXIT_OK;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      return EXIT_USAGE;
  }
};
