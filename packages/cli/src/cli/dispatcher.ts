/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { formatDiagnostics } from "../commands/compile.js";
import { emitCommand } from "../commands/emit.js";
import { checkCommand } from "../commands/check.js";
import { runCommand } from "../commands/run.js";
import type { IntguardConfig } from "../types.js";
import { EXIT_ERROR, EXIT_OK, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const COMMANDS: ReadonlySet<string> = new Set(["emit", "check", "run"]);

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`intguard v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  if (!COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'intguard --help' for usage information");
    return EXIT_ERROR;
  }

  if (!parsed.sourceFile) {
    console.error("Error: Source file required");
    console.error(`Usage: intguard ${parsed.command} <file.ts>`);
    return EXIT_ERROR;
  }

  // Load config; without one, defaults apply
  const cwd = process.cwd();
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: IntguardConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${formatDiagnostics(configResult.error)}`);
      return EXIT_ERROR;
    }
    fileConfig = configResult.value;
    if (parsed.options.verbose) {
      console.log(`Using config ${configPath}`);
    }
  }

  // Project root is the directory containing intguard.json
  const projectRoot = configPath ? dirname(configPath) : cwd;

  const configResult = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    parsed.sourceFile,
    cwd
  );
  if (!configResult.ok) {
    console.error(`Error: ${formatDiagnostics(configResult.error)}`);
    return EXIT_ERROR;
  }
  const config = configResult.value;

  // Dispatch to command handlers
  switch (parsed.command) {
    case "emit": {
      const result = emitCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_ERROR;
      }
      return EXIT_OK;
    }

    case "check": {
      const result = checkCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_ERROR;
      }
      return EXIT_OK;
    }

    default: {
      const result = runCommand(config, parsed.programArgs ?? []);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_ERROR;
      }
      return result.value.exitCode;
    }
  }
};
