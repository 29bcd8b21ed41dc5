/**
 * Diagnostic types for the intguard toolchain
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Input errors (IG1001-IG1099)
  | "IG1001" // Source file not found
  | "IG1002" // Failed to read source file
  | "IG1003" // TypeScript syntax error
  // Source language errors (IG2001-IG2099)
  | "IG2001" // Unsupported syntax
  | "IG2002" // Integer literal out of range for its type
  | "IG2003" // Operand types differ
  | "IG2004" // Unknown type name
  | "IG2005" // Unknown identifier
  | "IG2006" // Unknown function
  | "IG2007" // Wrong number of call arguments
  | "IG2008" // Assignment to const
  | "IG2009" // Duplicate declaration
  | "IG2010" // break/continue outside a loop
  | "IG2011" // Type mismatch
  // Configuration errors (IG3001-IG3099)
  | "IG3001" // Config file not found
  | "IG3002" // Invalid JSON in config file
  | "IG3003" // Invalid config field
  | "IG3004" // Invalid exemption entry
  // Internal errors
  | "IG6001"; // Internal compiler error

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatLocation = (location: SourceLocation): string =>
  `${location.file}:${location.line}:${location.column}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(formatLocation(diagnostic.location));
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const collectDiagnostics = (
  diagnostics: readonly Diagnostic[]
): DiagnosticsCollector => ({
  diagnostics,
  hasErrors: diagnostics.some(isError),
});
