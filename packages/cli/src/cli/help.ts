/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
intguard - signed integer overflow checks for compiled code v${VERSION}

USAGE:
  intguard <command> <file.ts> [options] [-- args...]

COMMANDS:
  emit <file>               Print the instrumented IR
  check <file>              Report which operations are guarded, per module
  run <file> [-- args...]   Run the entry function with integer arguments

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Print only errors and faults
  -c, --config <file>       Config file path (default: intguard.json)

COMPILE OPTIONS:
  --package <path>          Package path of the file (default: from its directory)
  --no-instrument           Compile without overflow checks
  --multiply <strategy>     Multiplication check: widen or backDivide
  --exempt <entry>          Exempt a package path or prefix (repeatable)
  --entry <fn>              Function to run (default: main)

EXAMPLES:
  intguard emit src/main.ts
  intguard check src/main.ts --exempt 'vendor/*'
  intguard run src/main.ts -- 127 1
  intguard run src/main.ts --package internal/bits -- 127 1
`);
};
