/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  sourceFile?: string;
  options: CliOptions;
  programArgs?: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let sourceFile: string | undefined;
  const programArgs: string[] = [];
  let captureProgramArgs = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Separator for program arguments
    if (arg === "--") {
      captureProgramArgs = true;
      continue;
    }

    if (captureProgramArgs) {
      programArgs.push(arg);
      continue;
    }

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (source file)
    if (command && !sourceFile && !arg.startsWith("-")) {
      sourceFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--package":
        options.packagePath = args[++i] ?? "";
        break;
      case "--no-instrument":
        options.noInstrument = true;
        break;
      case "--multiply":
        options.multiply = args[++i] ?? "";
        break;
      case "--entry":
        options.entry = args[++i] ?? "";
        break;
      case "--exempt":
        {
          const entry = args[++i] ?? "";
          if (entry) {
            options.exempt = options.exempt || [];
            options.exempt.push(entry);
          }
        }
        break;
    }
  }

  return { command, sourceFile, options, programArgs };
};
