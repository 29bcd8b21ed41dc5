/**
 * Module resolver - Public API
 */

export { ROOT_PACKAGE_PATH, getPackagePathFromFile } from "./package-path.js";
