/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
proplens - accessor resolution for typed object models v${VERSION}

USAGE:
  proplens <command> [options]

COMMANDS:
  inspect <Type>            Print the property model of a type
  list                      List catalog types
  check                     Report ambiguous properties (exit 4 if any)
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress warnings
  -c, --config <file>       Config file path (default: nearest proplens.json)

INPUT OPTIONS:
  -d, --descriptors <path>  Descriptor file or directory (repeatable)
  -s, --source <file>       TypeScript source file (repeatable)
  --bypass-visibility       Allow non-public members to be invoked (default)
  --no-bypass-visibility    Treat non-public members as unreachable
  --json                    JSON output

EXIT CODES:
  0  success
  1  config or input failed to load
  2  unknown command or usage error
  3  type not found
  4  ambiguous accessors found

EXAMPLES:
  proplens list -d ./descriptors
  proplens inspect User -s src/models/user.ts
  proplens check --json
`);
};
