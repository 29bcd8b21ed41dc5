/**
 * Type definitions for CLI
 */

import type { ExemptionSet, MultiplyStrategy } from "@intguard/frontend";

/**
 * Configuration file (intguard.json)
 */
export type IntguardConfig = {
  readonly $schema?: string;
  /** Directory package paths are computed from, relative to the config file */
  readonly sourceRoot?: string;
  /** Package path for the compiled file, overriding the derived one */
  readonly packagePath?: string;
  /** Function `run` starts from */
  readonly entry?: string;
  /** Extra exemption entries, added to the defaults */
  readonly exemptions?: readonly string[];
  readonly multiply?: MultiplyStrategy;
  /** Set to false to compile without overflow checks */
  readonly instrument?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  packagePath?: string;
  noInstrument?: boolean;
  multiply?: string; // Validated during resolution
  exempt?: string[];
  entry?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing intguard.json, or cwd
  readonly sourceRoot: string;
  readonly sourceFile: string;
  readonly packagePath: string | undefined;
  readonly entry: string;
  readonly exemptions: ExemptionSet;
  readonly multiply: MultiplyStrategy;
  readonly instrument: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
