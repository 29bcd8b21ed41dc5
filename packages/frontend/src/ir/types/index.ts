/**
 * IR type exports
 */

export * from "./int-kind.js";
export * from "./ir-types.js";
export * from "./instructions.js";
export * from "./module.js";
