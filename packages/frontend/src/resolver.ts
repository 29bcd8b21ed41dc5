/**
 * Package path resolution
 * Main dispatcher - re-exports from resolver/ subdirectory
 */

export { ROOT_PACKAGE_PATH, getPackagePathFromFile } from "./resolver/index.js";
