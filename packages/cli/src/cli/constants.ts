/**
 * CLI constants
 */

import packageJson from "../../package.json" with { type: "json" };

export const VERSION: string = packageJson.version;

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
/** The program ran and panicked */
export const EXIT_PANIC = 2;
