/**
 * Program - Public API
 */

export type { CompilerOptions, SourceProgram } from "./types.js";
export { defaultTsConfig } from "./config.js";
export { collectTsDiagnostics, convertTsDiagnostic } from "./diagnostics.js";
export { createProgram, createProgramFromSources } from "./creation.js";
