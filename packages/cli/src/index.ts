#!/usr/bin/env node
/**
 * intguard - signed integer overflow checks for a typed TypeScript subset
 */

import { runCli } from "./cli.js";

const main = async (): Promise<void> => {
  process.exitCode = await runCli(process.argv.slice(2));
};

main().catch((err: unknown) => {
  console.error("intguard: fatal:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});

export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
