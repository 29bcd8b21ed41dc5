/**
 * Intermediate Representation (IR) types
 * Main dispatcher - re-exports from types/ subdirectory
 */

export * from "./types/index.js";
