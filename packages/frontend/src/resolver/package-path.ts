import { dirname, relative } from "node:path";

/** Package path of files directly in the source root */
export const ROOT_PACKAGE_PATH = "main";

/**
 * Compute a module's package path from its file path.
 *
 * Rules:
 * - Package path = directory of the file relative to the source root
 * - Path normalized with "/" separators after relative() call
 * - Empty path maps to "main"
 * - ".." components (files outside the source root) are dropped
 *
 * Examples:
 * - /project/src/internal/bits/ops.ts → internal/bits
 * - /project/src/main.ts → main
 */
export const getPackagePathFromFile = (
  filePath: string,
  sourceRoot: string
): string => {
  // Normalize AFTER relative(), not before (cross-platform)
  const relativePath = relative(sourceRoot, dirname(filePath)).replace(
    /\\/g,
    "/"
  );

  const parts = relativePath
    .split("/")
    .filter((p) => p !== "" && p !== "." && p !== "..");

  return parts.length === 0 ? ROOT_PACKAGE_PATH : parts.join("/");
};
