/**
 * Package exemptions for overflow instrumentation.
 *
 * An ExemptionSet is built once and frozen. It is shared by every
 * compilation in the process and never mutated afterwards.
 */

import {
  Diagnostic,
  createDiagnostic,
} from "../../types/diagnostic.js";
import { Result, ok, error } from "../../types/result.js";

export type ExemptionSet = {
  /** Paths exempted exactly */
  readonly literals: readonly string[];
  /** Paths exempted together with everything below them */
  readonly prefixes: readonly string[];
};

/**
 * Runtime internals, synchronization, OS/syscall layers, math, unsafe
 * memory, and everything under internal/.
 */
export const DEFAULT_EXEMPTION_ENTRIES: readonly string[] = [
  "runtime",
  "sync",
  "os",
  "syscall",
  "internal/*",
  "math",
  "unsafe",
];

const PREFIX_SUFFIX = "/*";

const invalidEntry = (entry: string, reason: string): Diagnostic =>
  createDiagnostic(
    "IG3004",
    "error",
    `Invalid exemption entry '${entry}': ${reason}`,
    undefined,
    "Use a package path such as 'math' or a prefix such as 'internal/*'."
  );

type ParsedEntry =
  | { readonly kind: "literal"; readonly path: string }
  | { readonly kind: "prefix"; readonly path: string };

const parseEntry = (entry: string): Result<ParsedEntry, Diagnostic> => {
  const isPrefix = entry.endsWith(PREFIX_SUFFIX);
  const path = isPrefix ? entry.slice(0, -PREFIX_SUFFIX.length) : entry;

  if (path.length === 0) {
    return error(invalidEntry(entry, "empty package path"));
  }
  if (path.includes("*")) {
    return error(
      invalidEntry(entry, "'*' is only allowed as a trailing '/*'")
    );
  }
  if (path.startsWith("/") || path.endsWith("/")) {
    return error(
      invalidEntry(entry, "package paths do not start or end with '/'")
    );
  }
  if (path.split("/").some((segment) => segment.length === 0)) {
    return error(invalidEntry(entry, "empty path segment"));
  }

  return ok(isPrefix ? { kind: "prefix", path } : { kind: "literal", path });
};

const freezeSet = (
  literals: Iterable<string>,
  prefixes: Iterable<string>
): ExemptionSet =>
  Object.freeze({
    literals: Object.freeze([...new Set(literals)]),
    prefixes: Object.freeze([...new Set(prefixes)]),
  });

/**
 * Build a frozen exemption set from entries such as "math" or "internal/*".
 */
export const createExemptionSet = (
  entries: readonly string[]
): Result<ExemptionSet, readonly Diagnostic[]> => {
  const literals: string[] = [];
  const prefixes: string[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const entry of entries) {
    const parsed = parseEntry(entry);
    if (!parsed.ok) {
      diagnostics.push(parsed.error);
      continue;
    }
    if (parsed.value.kind === "prefix") {
      prefixes.push(parsed.value.path);
    } else {
      literals.push(parsed.value.path);
    }
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }
  return ok(freezeSet(literals, prefixes));
};

/**
 * A new frozen set holding the base entries plus the extra ones.
 */
export const extendExemptionSet = (
  base: ExemptionSet,
  entries: readonly string[]
): Result<ExemptionSet, readonly Diagnostic[]> => {
  const extra = createExemptionSet(entries);
  if (!extra.ok) {
    return extra;
  }
  return ok(
    freezeSet(
      [...base.literals, ...extra.value.literals],
      [...base.prefixes, ...extra.value.prefixes]
    )
  );
};

const buildDefaultExemptionSet = (): ExemptionSet => {
  const result = createExemptionSet(DEFAULT_EXEMPTION_ENTRIES);
  if (!result.ok) {
    throw new Error(
      `Default exemption entries are invalid: ${result.error.map((d) => d.message).join("; ")}`
    );
  }
  return result.value;
};

/** Process-wide default, built at module load */
export const DEFAULT_EXEMPTION_SET: ExemptionSet = buildDefaultExemptionSet();

const isUnderPrefix = (packagePath: string, prefix: string): boolean =>
  packagePath === prefix || packagePath.startsWith(`${prefix}/`);

export const isExempt = (
  packagePath: string,
  exemptions: ExemptionSet
): boolean =>
  exemptions.literals.includes(packagePath) ||
  exemptions.prefixes.some((prefix) => isUnderPrefix(packagePath, prefix));

/**
 * Whether arithmetic in the given package is instrumented at all.
 */
export const shouldInstrument = (
  packagePath: string,
  exemptions: ExemptionSet = DEFAULT_EXEMPTION_SET
): boolean => !isExempt(packagePath, exemptions);
