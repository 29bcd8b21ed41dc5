/**
 * TypeScript program creation
 * Main dispatcher - re-exports from program/ subdirectory
 */

export type { CompilerOptions, SourceProgram } from "./program/index.js";
export { createProgram, createProgramFromSources } from "./program/index.js";
