/**
 * IR Builder - converts TypeScript AST to IR
 * Main dispatcher - re-exports from builder/ subdirectory
 */

export * from "./builder/index.js";
