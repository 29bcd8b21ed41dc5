/**
 * Helpers for command tests: a throwaway source file and captured console
 * output.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { resolveConfig } from "./config.js";
import type { CliOptions, ResolvedConfig } from "./types.js";

/**
 * Write `source` to main.ts in a temporary directory and call `test` with
 * the resolved configuration for it.
 */
export const withSourceFile = (
  source: string,
  options: CliOptions,
  test: (config: ResolvedConfig) => void
): void => {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "intguard-cli-"));
  try {
    const sourceFile = path.join(tempDir, "main.ts");
    fs.writeFileSync(sourceFile, source);
    const config = resolveConfig({}, options, tempDir, sourceFile, tempDir);
    if (!config.ok) {
      throw new Error(`invalid config: ${config.error.map((d) => d.message).join("; ")}`);
    }
    test(config.value);
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
};

export type CapturedOutput = {
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
};

/**
 * Run `action` with console.log, console.error and process.stdout.write
 * redirected into arrays.
 */
export const captureOutput = (action: () => void): CapturedOutput => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const originalLog = console.log;
  const originalError = console.error;
  const originalWrite = process.stdout.write;

  console.log = (...args: unknown[]): void => {
    stdout.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]): void => {
    stderr.push(args.map(String).join(" "));
  };
  process.stdout.write = (chunk: string | Uint8Array): boolean => {
    stdout.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString());
    return true;
  };

  try {
    action();
  } finally {
    console.log = originalLog;
    console.error = originalError;
    process.stdout.write = originalWrite;
  }
  return { stdout, stderr };
};
