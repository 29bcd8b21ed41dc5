/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  DEFAULT_EXEMPTION_SET,
  Diagnostic,
  MULTIPLY_STRATEGIES,
  MultiplyStrategy,
  Result,
  createDiagnostic,
  error,
  extendExemptionSet,
  ok,
} from "@intguard/frontend";
import type { CliOptions, IntguardConfig, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "intguard.json";

const DEFAULT_ENTRY = "main";

const invalidField = (
  configPath: string,
  field: string,
  expected: string
): Diagnostic =>
  createDiagnostic(
    "IG3003",
    "error",
    `${CONFIG_FILE_NAME}: '${field}' must be ${expected}`,
    { file: configPath, line: 1, column: 1, length: 1 }
  );

const parseMultiply = (value: unknown): MultiplyStrategy | undefined =>
  MULTIPLY_STRATEGIES.find((strategy) => strategy === value);

/**
 * Validate parsed JSON field by field
 */
export const parseConfig = (
  value: unknown,
  configPath: string
): Result<IntguardConfig, readonly Diagnostic[]> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return error([invalidField(configPath, "(root)", "an object")]);
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const diagnostics: Diagnostic[] = [];

  const stringField = (name: string): string | undefined => {
    const field = fields.get(name);
    if (field === undefined) return undefined;
    if (typeof field !== "string" || field.length === 0) {
      diagnostics.push(invalidField(configPath, name, "a non-empty string"));
      return undefined;
    }
    return field;
  };

  const exemptionsField = (): readonly string[] | undefined => {
    const field = fields.get("exemptions");
    if (field === undefined) return undefined;
    if (
      !Array.isArray(field) ||
      !field.every((entry): entry is string => typeof entry === "string")
    ) {
      diagnostics.push(
        invalidField(configPath, "exemptions", "an array of strings")
      );
      return undefined;
    }
    return field;
  };

  const multiplyField = (): MultiplyStrategy | undefined => {
    const field = fields.get("multiply");
    if (field === undefined) return undefined;
    const strategy = parseMultiply(field);
    if (strategy === undefined) {
      diagnostics.push(
        invalidField(configPath, "multiply", `one of ${MULTIPLY_STRATEGIES.join(", ")}`)
      );
    }
    return strategy;
  };

  const instrumentField = (): boolean | undefined => {
    const field = fields.get("instrument");
    if (field === undefined) return undefined;
    if (typeof field !== "boolean") {
      diagnostics.push(invalidField(configPath, "instrument", "a boolean"));
      return undefined;
    }
    return field;
  };

  const config: IntguardConfig = {
    $schema: stringField("$schema"),
    sourceRoot: stringField("sourceRoot"),
    packagePath: stringField("packagePath"),
    entry: stringField("entry"),
    exemptions: exemptionsField(),
    multiply: multiplyField(),
    instrument: instrumentField(),
  };

  return diagnostics.length > 0 ? error(diagnostics) : ok(config);
};

/**
 * Load intguard.json
 */
export const loadConfig = (
  configPath: string
): Result<IntguardConfig, readonly Diagnostic[]> => {
  const location = { file: configPath, line: 1, column: 1, length: 1 };
  if (!existsSync(configPath)) {
    return error([
      createDiagnostic(
        "IG3001",
        "error",
        `Config file not found: ${configPath}`,
        location
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return error([
      createDiagnostic(
        "IG3002",
        "error",
        `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`,
        location
      ),
    ]);
  }

  return parseConfig(parsed, configPath);
};

/**
 * Find intguard.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find intguard.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Hit root
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Paths in the file are relative to projectRoot; the source file given on
 * the command line is relative to cwd.
 */
export const resolveConfig = (
  config: IntguardConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  sourceFile: string,
  cwd: string = process.cwd()
): Result<ResolvedConfig, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];

  let multiply = config.multiply ?? "widen";
  if (cliOptions.multiply !== undefined) {
    const strategy = parseMultiply(cliOptions.multiply);
    if (strategy === undefined) {
      diagnostics.push(
        createDiagnostic(
          "IG3003",
          "error",
          `--multiply must be one of ${MULTIPLY_STRATEGIES.join(", ")}, got '${cliOptions.multiply}'`
        )
      );
    } else {
      multiply = strategy;
    }
  }

  const exemptions = extendExemptionSet(DEFAULT_EXEMPTION_SET, [
    ...(config.exemptions ?? []),
    ...(cliOptions.exempt ?? []),
  ]);
  if (!exemptions.ok) {
    diagnostics.push(...exemptions.error);
  }

  if (!exemptions.ok || diagnostics.length > 0) {
    return error(diagnostics);
  }

  const absoluteSource = resolve(cwd, sourceFile);

  return ok({
    projectRoot,
    sourceRoot:
      config.sourceRoot === undefined
        ? dirname(absoluteSource)
        : resolve(projectRoot, config.sourceRoot),
    sourceFile: absoluteSource,
    packagePath: cliOptions.packagePath ?? config.packagePath,
    entry: cliOptions.entry ?? config.entry ?? DEFAULT_ENTRY,
    exemptions: exemptions.value,
    multiply,
    instrument: cliOptions.noInstrument ? false : (config.instrument ?? true),
    // --quiet wins over --verbose
    verbose: (cliOptions.verbose ?? false) && !(cliOptions.quiet ?? false),
    quiet: cliOptions.quiet ?? false,
  });
};
