/**
 * Diagnostic types for the query analyzer
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Semantic analysis (QCK1xxx expressions, QCK2xxx scoping)
  | "QCK1001" // Type mismatch
  | "QCK1002" // Bad call
  | "QCK1003" // Illegal expression
  | "QCK2001" // Ambiguous column access
  | "QCK2002" // Unresolved correlation name
  | "QCK2003" // Duplicate table name
  // Loading errors (QCK9001-QCK9012)
  | "QCK9001" // Program file not found
  | "QCK9002" // Failed to read program file
  | "QCK9003" // Invalid JSON in program file
  | "QCK9004" // Malformed program node
  | "QCK9005" // Signature file not found
  | "QCK9006" // Failed to read signature file
  | "QCK9007" // Invalid JSON in signature file
  | "QCK9008" // Malformed signature entry
  | "QCK9009" // Config file not found
  | "QCK9010" // Invalid JSON in config file
  | "QCK9011" // Invalid config field
  | "QCK9012"; // No program files to check

/**
 * Position of a node in its source program. Produced by the parser and
 * threaded through untouched.
 */
export type SourcePosition = {
  readonly line: number;
  readonly column: number;
};

export type SourceLocation = SourcePosition & {
  readonly file?: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  relatedLocations,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatLocation = (location: SourceLocation): string =>
  location.file
    ? `${location.file}:${location.line}:${location.column}`
    : `${location.line}:${location.column}`;

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
