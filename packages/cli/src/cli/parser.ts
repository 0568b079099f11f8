/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  typeName?: string; // Positional argument of inspect
  options: CliOptions;
  errors: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const errors: string[] = [];
  let command = "";
  let typeName: string | undefined;

  const takeValue = (flag: string, i: number): string | undefined => {
    const value = args[i];
    if (value === undefined || value.startsWith("-")) {
      errors.push(`Option '${flag}' requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (type name)
    if (command && !typeName && !arg.startsWith("-")) {
      typeName = arg;
      continue;
    }

    if (!arg.startsWith("-")) {
      errors.push(`Unexpected argument '${arg}'`);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "--bypass-visibility":
        options.bypassVisibility = true;
        break;
      case "--no-bypass-visibility":
        options.bypassVisibility = false;
        break;
      case "-c":
      case "--config": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.config = value;
          i++;
        }
        break;
      }
      case "-d":
      case "--descriptors": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.descriptors = [...(options.descriptors ?? []), value];
          i++;
        }
        break;
      }
      case "-s":
      case "--source": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.sources = [...(options.sources ?? []), value];
          i++;
        }
        break;
      }
      default:
        errors.push(`Unknown option '${arg}'`);
    }
  }

  return { command, typeName, options, errors };
};
